import {ValidationError} from '../errors.js'
import type {InstallStep, StepStage} from '../types.js'
import {
  type DocumentTable,
  type RawTable,
  expectString,
  expectStringArray,
  expectTable,
  optionalString,
  optionalStringArray,
  stringMap
} from './document.js'

/** Method whose step holds literal Dockerfile instructions. */
export const DIRECT_METHOD = 'docker'

const reservedKeys = new Set(['method', 'type', 'copy'])

function parseStage(table: RawTable, where: string): StepStage {
  const type = optionalString(table, 'type', where)
  switch (type) {
    case undefined:
    case 'install':
    case 'actual': {
      return 'install'
    }

    case 'build': {
      return 'build'
    }

    default: {
      throw new ValidationError(`Invalid ${where}: unknown step type "${type}"`)
    }
  }
}

/**
 * Reads a step table as written in the config (and in the lock):
 *
 * ```toml
 * [[feature.step]]
 * method = "rpm"
 * [feature.step.dnf]
 * script = ["dnf install -y tool"]
 * ```
 *
 * Any key besides `method`, `type` and `copy` names a package manager.
 */
export function parseStep(value: unknown, where: string): InstallStep {
  const table = expectTable(value, where)
  const method = expectString(table, 'method', where)
  const stage = parseStage(table, where)
  const copy = stringMap(table, 'copy', where)

  if (method === DIRECT_METHOD) {
    if (table.commands === undefined) {
      throw new ValidationError(`Invalid ${where}: method "${DIRECT_METHOD}" needs "commands"`)
    }

    return {
      kind: 'direct',
      stage,
      copy,
      commands: expectStringArray(table, 'commands', where),
      dependencies: optionalStringArray(table, 'dependencies', where)
    }
  }

  const scripts: Record<string, string[]> = {}
  for (const [packageManager, entry] of Object.entries(table)) {
    if (reservedKeys.has(packageManager)) {
      continue
    }

    scripts[packageManager] = expectStringArray(expectTable(entry, `${where} ${packageManager}`), 'script', `${where} ${packageManager}`)
  }

  return {kind: 'package-manager', stage, copy, method, scripts}
}

export function encodeStep(step: InstallStep): DocumentTable {
  const table: DocumentTable = {method: step.kind === 'direct' ? DIRECT_METHOD : step.method}
  if (step.stage === 'build') {
    table.type = 'build'
  }

  if (step.kind === 'direct') {
    table.commands = step.commands
    if (step.dependencies.length > 0) {
      table.dependencies = step.dependencies
    }
  } else {
    for (const [packageManager, script] of Object.entries(step.scripts)) {
      table[packageManager] = {script}
    }
  }

  if (Object.keys(step.copy).length > 0) {
    table.copy = {...step.copy}
  }

  return table
}
