import {readFile} from 'node:fs/promises'
import {ValidationError} from '../errors.js'
import type {
  BaseDefinition,
  BuildDefinition,
  BuildSelector,
  Config,
  FeatureDefinition,
  FetchStrategy,
  PinnedSelection,
  RefMode
} from '../types.js'
import {
  type RawTable,
  expectString,
  expectStringArray,
  expectStrings,
  expectTable,
  isTable,
  optionalString,
  parseDocument,
  tableArray
} from './document.js'
import {parseStep} from './steps.js'

const namePattern = /^[\w-]+$/
const reservedNames = new Set(['base', 'date'])

/**
 * Loads a config file (TOML, or YAML / JSON by extension) into definitions.
 * Keys are kebab-case as written; the result is validated as a whole.
 */
export class ConfigLoader {
  async load(filePath: string): Promise<Config> {
    const content = await readFile(filePath, 'utf8')
    return this.parse(content, filePath)
  }

  parse(content: string, filePath: string): Config {
    const document = expectTable(parseDocument(content, filePath), filePath)

    const config: Config = {
      bases: tableArray(document, 'base', filePath).map((table, index) => parseBase(table, `base #${index + 1}`)),
      features: tableArray(document, 'feature', filePath).map((table, index) => parseFeature(table, `feature #${index + 1}`)),
      builds: tableArray(document, 'build', filePath).map((table, index) => parseBuild(table, `build #${index + 1}`))
    }

    validateConfig(config)
    return config
  }
}

function parseRefMode(value: string | undefined, where: string): RefMode {
  switch (value) {
    case undefined:
    case 'tag':
    case 'tags': {
      return 'tags'
    }

    case 'branch':
    case 'branches': {
      return 'branches'
    }

    default: {
      throw new ValidationError(`Invalid ${where}: unknown version-from "${value}"`)
    }
  }
}

function parseFetchVersion(table: RawTable, where: string): FetchStrategy | undefined {
  if (table['fetch-version'] === undefined) {
    return undefined
  }

  const context = `${where} fetch-version`
  const strategy = expectTable(table['fetch-version'], context)
  const type = expectString(strategy, 'type', context)
  switch (type) {
    case 'docker': {
      return {
        type: 'docker',
        image: expectString(strategy, 'image', context),
        command: expectStringArray(strategy, 'command', context)
      }
    }

    case 'github': {
      return {
        type: 'github',
        org: expectString(strategy, 'org', context),
        project: expectString(strategy, 'project', context),
        versionFrom: parseRefMode(optionalString(strategy, 'version-from', context), context)
      }
    }

    default: {
      throw new ValidationError(`Invalid ${context}: unknown type "${type}"`)
    }
  }
}

function parseBase(table: RawTable, where: string): BaseDefinition {
  const name = expectString(table, 'name', where)
  const context = `base "${name}"`
  const fetchVersion = parseFetchVersion(table, context)
  return {
    name,
    versions: expectStringArray(table, 'versions', context),
    image: expectString(table, 'image', context),
    packageManager: expectString(table, 'package-manager', context),
    versionTag: expectString(table, 'version-tag', context),
    ...(fetchVersion ? {fetchVersion} : {})
  }
}

function parseFeature(table: RawTable, where: string): FeatureDefinition {
  const name = expectString(table, 'name', where)
  const context = `feature "${name}"`
  const fetchVersion = parseFetchVersion(table, context)
  return {
    name,
    versions: expectStringArray(table, 'versions', context),
    versionTag: table['version-tag'] === undefined ? [] : expectStrings(table, 'version-tag', context),
    ...(fetchVersion ? {fetchVersion} : {}),
    steps: tableArray(table, 'step', context).map((step, index) => parseStep(step, `${context} step #${index + 1}`))
  }
}

function parseSelector(value: unknown, where: string): BuildSelector {
  if (typeof value === 'string') {
    return {name: value}
  }

  if (!isTable(value)) {
    throw new ValidationError(`Invalid ${where}: expected a name or a {name, versions} table`)
  }

  const name = expectString(value, 'name', where)
  return value.versions === undefined ? {name} : {name, versions: expectStrings(value, 'versions', where)}
}

function parsePin(value: unknown, where: string): PinnedSelection {
  const table = expectTable(value, where)
  return {name: expectString(table, 'name', where), version: expectString(table, 'version', where)}
}

function expectList(table: RawTable, key: string, where: string): unknown[] {
  const value = table[key] ?? []
  if (!Array.isArray(value)) {
    throw new ValidationError(`Invalid ${where}: "${key}" must be a list`)
  }

  return value
}

function parseBuild(table: RawTable, where: string): BuildDefinition {
  const imageName = expectString(table, 'image-name', where)
  const imageTag = expectString(table, 'image-tag', where)

  if (table.bases !== undefined && table.base !== undefined) {
    throw new ValidationError(`Invalid ${where}: "bases" and "base" are exclusive`)
  }

  if (table.base !== undefined) {
    return {
      kind: 'pinned',
      base: parsePin(table.base, `${where} base`),
      features: expectList(table, 'features', where).map((pin, index) => parsePin(pin, `${where} feature #${index + 1}`)),
      imageName,
      imageTag
    }
  }

  const bases = expectList(table, 'bases', where).map((selector, index) => parseSelector(selector, `${where} base #${index + 1}`))
  const features = expectList(table, 'features', where).map((group, groupIndex) => {
    if (!Array.isArray(group)) {
      throw new ValidationError(`Invalid ${where}: feature group #${groupIndex + 1} must be a list`)
    }

    return group.map((selector, index) => parseSelector(selector, `${where} feature group #${groupIndex + 1} member #${index + 1}`))
  })

  return {kind: 'matrix', bases, features, imageName, imageTag}
}

// -- Validation --------------------------------------------------------------

function validateNames(entries: Array<{name: string}>, kind: string): void {
  for (const {name} of entries) {
    if (!namePattern.test(name)) {
      throw new ValidationError(`Invalid ${kind} name "${name}": only letters, digits, "_" and "-" are allowed`)
    }

    if (reservedNames.has(name)) {
      throw new ValidationError(`Invalid ${kind} name "${name}": the name is reserved`)
    }
  }
}

function validateClaims(entries: Array<{name: string; versions: string[]}>, kind: string): void {
  const claims = new Map<string, Set<string>>()
  for (const {name, versions} of entries) {
    if (versions.length === 0) {
      throw new ValidationError(`Invalid ${kind} "${name}": "versions" must not be empty`)
    }

    const claimed = claims.get(name) ?? new Set<string>()
    for (const version of versions) {
      if (claimed.has(version)) {
        throw new ValidationError(`Invalid ${kind} "${name}": version "${version}" is declared more than once`)
      }

      claimed.add(version)
    }

    claims.set(name, claimed)
  }
}

function validateReferences(config: Config, build: BuildDefinition, where: string): void {
  const bases = new Set(config.bases.map(base => base.name))
  const features = new Set(config.features.map(feature => feature.name))
  const baseNames = build.kind === 'matrix' ? build.bases.map(selector => selector.name) : [build.base.name]
  const featureNames = build.kind === 'matrix'
    ? build.features.flat().map(selector => selector.name)
    : build.features.map(pin => pin.name)

  for (const name of baseNames) {
    if (!bases.has(name)) {
      throw new ValidationError(`Invalid ${where}: unknown base "${name}"`)
    }
  }

  for (const name of featureNames) {
    if (!features.has(name)) {
      throw new ValidationError(`Invalid ${where}: unknown feature "${name}"`)
    }
  }
}

export function validateConfig(config: Config): void {
  validateNames(config.bases, 'base')
  validateNames(config.features, 'feature')
  validateClaims(config.bases, 'base')
  validateClaims(config.features, 'feature')

  const baseNames = new Set(config.bases.map(base => base.name))
  for (const feature of config.features) {
    if (baseNames.has(feature.name)) {
      throw new ValidationError(`Invalid feature "${feature.name}": a base has the same name`)
    }
  }

  for (const [index, build] of config.builds.entries()) {
    const where = `build #${index + 1}`
    if (build.kind === 'matrix') {
      if (build.bases.length === 0) {
        throw new ValidationError(`Invalid ${where}: at least one base is required`)
      }

      if (build.features.some(group => group.length === 0)) {
        throw new ValidationError(`Invalid ${where}: feature groups must not be empty`)
      }
    }

    const groups = build.kind === 'matrix'
      ? build.features.map(group => group.map(selector => selector.name))
      : build.features.map(pin => [pin.name])
    const claimed = new Set<string>()
    for (const group of groups) {
      for (const name of new Set(group)) {
        if (claimed.has(name)) {
          throw new ValidationError(`Invalid ${where}: feature "${name}" appears in more than one group`)
        }

        claimed.add(name)
      }
    }

    validateReferences(config, build, where)
  }
}
