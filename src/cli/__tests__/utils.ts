import test from 'ava'
import {InvalidArgumentError} from 'commander'
import {ConsoleReporter} from '../../core/reporter.js'
import {InteractiveReporter} from '../interactive-reporter.js'
import {createReporter, parseCount, parsePositive} from '../utils.js'

test('parseCount accepts non-negative integers', t => {
  t.is(parseCount('0'), 0)
  t.is(parseCount('3'), 3)
})

test('parseCount rejects other values', t => {
  for (const value of ['-1', '1.5', 'two']) {
    t.throws(() => parseCount(value), {instanceOf: InvalidArgumentError}, value)
  }
})

test('parsePositive rejects zero', t => {
  t.is(parsePositive('4'), 4)
  t.throws(() => parsePositive('0'), {instanceOf: InvalidArgumentError, message: 'Expected a positive integer.'})
})

test('createReporter picks JSON logs or the interactive UI', t => {
  t.true(createReporter({json: true, logLevel: 'info'}) instanceof ConsoleReporter)
  t.true(createReporter({logLevel: 'info'}) instanceof InteractiveReporter)
})
