import test from 'ava'
import {formatDuration, slugify} from '../utils.js'

// ---------------------------------------------------------------------------
// slugify
// ---------------------------------------------------------------------------

test('slugify converts accented characters', t => {
  t.is(slugify('Débian-Été'), 'debian-ete')
})

test('slugify replaces dots and special characters', t => {
  t.is(slugify('al2023-tomcat-10.1.18-build-0'), 'al2023-tomcat-10-1-18-build-0')
  t.is(slugify('tool@v2!'), 'tool-v2')
})

test('slugify collapses double hyphens', t => {
  t.is(slugify('a--b'), 'a-b')
})

test('slugify strips leading and trailing hyphens', t => {
  t.is(slugify('-hello-'), 'hello')
})

// ---------------------------------------------------------------------------
// formatDuration
// ---------------------------------------------------------------------------

test('formatDuration keeps short durations in milliseconds', t => {
  t.is(formatDuration(250), '250ms')
})

test('formatDuration shows seconds with one decimal', t => {
  t.is(formatDuration(1500), '1.5s')
})

test('formatDuration shows minutes and seconds', t => {
  t.is(formatDuration(125_000), '2m 5s')
})
