import type {Level} from 'pino'
import {type Command, InvalidArgumentError} from 'commander'
import {ConsoleReporter, type Reporter} from '../core/reporter.js'
import {InteractiveReporter} from './interactive-reporter.js'

export const logLevels: Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace']

export type GlobalOptions = {
  config: string;
  lock: string;
  json?: boolean;
  logLevel: Level;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/** Commander argument parser for non-negative integers. */
export function parseCount(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.')
  }

  return parsed
}

export function parsePositive(value: string): number {
  const parsed = parseCount(value)
  if (parsed === 0) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }

  return parsed
}

export function createReporter({json, logLevel}: Pick<GlobalOptions, 'json' | 'logLevel'>): Reporter {
  return json ? new ConsoleReporter({level: logLevel}) : new InteractiveReporter()
}
