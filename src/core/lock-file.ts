import {mkdir, readFile, writeFile} from 'node:fs/promises'
import {dirname, extname} from 'node:path'
import {ValidationError} from '../errors.js'
import type {ImageIdentifier, Lock, LockRef, LockedBase, LockedBuild, LockedFeature} from '../types.js'
import {
  type DocumentTable,
  type RawTable,
  expectString,
  expectTable,
  isTable,
  optionalString,
  parseDocument,
  stringifyDocument,
  tableArray
} from './document.js'
import {encodeStep, parseStep} from './steps.js'
import {splitVersion} from './version.js'

/** Build listing printed by the `images` command. */
export type ImageEntry = {
  target: string;
  image_name: string;
  image_tag: string;
}

// -- Encoding ----------------------------------------------------------------

function encodeRef(ref: LockRef): DocumentTable {
  return {name: ref.name, version: ref.version}
}

function encodeBase(base: LockedBase): DocumentTable {
  const table: DocumentTable = {
    name: base.name,
    placeholder: base.placeholder,
    version: base.version,
    image: base.image,
    tag: base.tag,
    package_manager: base.packageManager
  }
  if (base.identifier) {
    table.identifier = {type: base.identifier.type, digest: base.identifier.digest}
  }

  return table
}

function encodeFeature(feature: LockedFeature): DocumentTable {
  return {
    name: feature.name,
    placeholder: feature.placeholder,
    version: feature.version,
    tag: feature.tag,
    step: feature.steps.map(step => encodeStep(step))
  }
}

function encodeBuild(build: LockedBuild): DocumentTable {
  return {
    target: build.target,
    image_name: build.imageName,
    image_tag: build.imageTag,
    base: encodeRef(build.base),
    features: build.features.map(ref => encodeRef(ref))
  }
}

export function encodeLock(lock: Lock): DocumentTable {
  return {
    base: lock.bases.map(base => encodeBase(base)),
    feature: lock.features.map(feature => encodeFeature(feature)),
    build: lock.builds.map(build => encodeBuild(build))
  }
}

// -- Decoding ----------------------------------------------------------------

function decodeRef(value: unknown, where: string): LockRef {
  const table = expectTable(value, where)
  return {name: expectString(table, 'name', where), version: expectString(table, 'version', where)}
}

function decodeIdentifier(value: unknown, where: string): ImageIdentifier {
  const table = expectTable(value, `${where} identifier`)
  const type = expectString(table, 'type', `${where} identifier`)
  if (type !== 'Digest') {
    throw new ValidationError(`Invalid ${where}: unknown identifier type "${type}"`)
  }

  return {type, digest: expectString(table, 'digest', `${where} identifier`)}
}

function decodeBase(table: RawTable, where: string): LockedBase {
  const version = expectString(table, 'version', where)
  const base: LockedBase = {
    name: expectString(table, 'name', where),
    placeholder: optionalString(table, 'placeholder', where) ?? version,
    version,
    versions: splitVersion(version),
    packageManager: expectString(table, 'package_manager', where),
    tag: expectString(table, 'tag', where),
    image: expectString(table, 'image', where)
  }
  if (table.identifier !== undefined) {
    base.identifier = decodeIdentifier(table.identifier, where)
  }

  return base
}

function decodeFeature(table: RawTable, where: string): LockedFeature {
  const version = expectString(table, 'version', where)
  return {
    name: expectString(table, 'name', where),
    placeholder: optionalString(table, 'placeholder', where) ?? version,
    version,
    versions: splitVersion(version),
    tag: optionalString(table, 'tag', where) ?? '',
    steps: tableArray(table, 'step', where).map((step, index) => parseStep(step, `${where} step #${index + 1}`))
  }
}

function decodeBuild(table: RawTable, where: string): LockedBuild {
  const features = table.features ?? []
  if (!Array.isArray(features)) {
    throw new ValidationError(`Invalid ${where}: "features" must be a list`)
  }

  return {
    target: expectString(table, 'target', where),
    imageName: expectString(table, 'image_name', where),
    imageTag: expectString(table, 'image_tag', where),
    base: decodeRef(table.base, `${where} base`),
    features: features.map((ref, index) => decodeRef(ref, `${where} feature #${index + 1}`))
  }
}

export function decodeLock(value: unknown, where = 'lock'): Lock {
  if (!isTable(value)) {
    throw new ValidationError(`Invalid ${where}: expected a table`)
  }

  return {
    bases: tableArray(value, 'base', where).map((table, index) => decodeBase(table, `${where} base #${index + 1}`)),
    features: tableArray(value, 'feature', where).map((table, index) => decodeFeature(table, `${where} feature #${index + 1}`)),
    builds: tableArray(value, 'build', where).map((table, index) => decodeBuild(table, `${where} build #${index + 1}`))
  }
}

// -- Files -------------------------------------------------------------------

/** Path of the target list written beside a lock: its extension becomes `.txt`. */
export function targetsPath(lockPath: string): string {
  const ext = extname(lockPath)
  return `${ext ? lockPath.slice(0, -ext.length) : lockPath}.txt`
}

export async function readLock(lockPath: string): Promise<Lock> {
  const content = await readFile(lockPath, 'utf8')
  return decodeLock(parseDocument(content, lockPath), lockPath)
}

/** Reads a lock, or returns undefined when the file does not exist. */
export async function readLockIfExists(lockPath: string): Promise<Lock | undefined> {
  try {
    return await readLock(lockPath)
  } catch (error: unknown) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return undefined
    }

    throw error
  }
}

export async function writeLock(lockPath: string, lock: Lock): Promise<void> {
  await mkdir(dirname(lockPath), {recursive: true})
  await writeFile(lockPath, stringifyDocument(encodeLock(lock), lockPath), 'utf8')
  await writeFile(targetsPath(lockPath), lock.builds.map(build => `${build.target}\n`).join(''), 'utf8')
}

export function listImages(lock: Lock): ImageEntry[] {
  return lock.builds.map(build => ({target: build.target, image_name: build.imageName, image_tag: build.imageTag}))
}
