import {extname} from 'node:path'
import {parse as parseToml, stringify as stringifyToml} from '@iarna/toml'
import {parse as parseYaml, stringify as stringifyYaml} from 'yaml'
import {ValidationError} from '../errors.js'

export type DocumentFormat = 'toml' | 'yaml' | 'json'

/** A value TOML, YAML and JSON can all hold. */
export type DocumentValue = string | number | boolean | string[] | DocumentTable | DocumentTable[]

export type DocumentTable = {[key: string]: DocumentValue}

/** Parsed, not yet validated table. */
export type RawTable = Record<string, unknown>

export function documentFormat(filePath: string): DocumentFormat {
  const ext = extname(filePath).toLowerCase()
  if (ext === '.yaml' || ext === '.yml') {
    return 'yaml'
  }

  if (ext === '.json') {
    return 'json'
  }

  return 'toml'
}

export function parseDocument(content: string, filePath: string): unknown {
  try {
    switch (documentFormat(filePath)) {
      case 'yaml': {
        return parseYaml(content)
      }

      case 'json': {
        return JSON.parse(content)
      }

      case 'toml': {
        return parseToml(content)
      }
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ValidationError(`Unable to parse ${filePath}: ${reason}`, {cause: error})
  }
}

export function stringifyDocument(table: DocumentTable, filePath: string): string {
  switch (documentFormat(filePath)) {
    case 'yaml': {
      return stringifyYaml(table)
    }

    case 'json': {
      return JSON.stringify(table, null, 2) + '\n'
    }

    case 'toml': {
      return stringifyToml(table)
    }
  }
}

// -- Validation helpers ------------------------------------------------------

export function isTable(value: unknown): value is RawTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
}

export function expectTable(value: unknown, where: string): RawTable {
  if (!isTable(value)) {
    throw new ValidationError(`Invalid ${where}: expected a table`)
  }

  return value
}

export function expectString(table: RawTable, key: string, where: string): string {
  const value = table[key]
  if (typeof value !== 'string') {
    throw new ValidationError(`Invalid ${where}: "${key}" must be a string`)
  }

  return value
}

export function optionalString(table: RawTable, key: string, where: string): string | undefined {
  return table[key] === undefined ? undefined : expectString(table, key, where)
}

export function expectStringArray(table: RawTable, key: string, where: string): string[] {
  const value = table[key]
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ValidationError(`Invalid ${where}: "${key}" must be a list of strings`)
  }

  return [...value]
}

export function optionalStringArray(table: RawTable, key: string, where: string): string[] {
  return table[key] === undefined ? [] : expectStringArray(table, key, where)
}

/** A string or a list of strings, as a list. */
export function expectStrings(table: RawTable, key: string, where: string): string[] {
  return typeof table[key] === 'string' ? [expectString(table, key, where)] : expectStringArray(table, key, where)
}

/** Array of tables; a missing key is an empty array. */
export function tableArray(table: RawTable, key: string, where: string): RawTable[] {
  const value = table[key]
  if (value === undefined) {
    return []
  }

  if (!Array.isArray(value)) {
    throw new ValidationError(`Invalid ${where}: "${key}" must be a list of tables`)
  }

  return value.map((item, index) => expectTable(item, `${where} ${key} #${index + 1}`))
}

export function stringMap(table: RawTable, key: string, where: string): Record<string, string> {
  const value = table[key]
  if (value === undefined) {
    return {}
  }

  const map = expectTable(value, `${where} ${key}`)
  const result: Record<string, string> = {}
  for (const [entry, target] of Object.entries(map)) {
    if (typeof target !== 'string') {
      throw new ValidationError(`Invalid ${where}: "${key}.${entry}" must be a string`)
    }

    result[entry] = target
  }

  return result
}
