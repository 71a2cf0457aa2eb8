import test from 'ava'
import {imageRepository, imageTag, pinnedReference} from '../image-ref.js'

test('imageRepository strips the tag', t => {
  t.is(imageRepository('amazonlinux:2023'), 'amazonlinux')
  t.is(imageRepository('registry.test/team/app:1.2'), 'registry.test/team/app')
})

test('imageRepository keeps a registry port', t => {
  t.is(imageRepository('registry.test:5000/app'), 'registry.test:5000/app')
  t.is(imageRepository('registry.test:5000/app:1'), 'registry.test:5000/app')
})

test('imageRepository strips a digest', t => {
  t.is(imageRepository('alpine:3.19@sha256:abc'), 'alpine')
})

test('imageTag returns the tag or undefined', t => {
  t.is(imageTag('alpine:3.19'), '3.19')
  t.is(imageTag('registry.test:5000/app'), undefined)
})

test('pinnedReference uses the digest when known', t => {
  t.is(pinnedReference('amazonlinux:2023', 'sha256:abc'), 'amazonlinux@sha256:abc')
  t.is(pinnedReference('amazonlinux:2023'), 'amazonlinux:2023')
})
