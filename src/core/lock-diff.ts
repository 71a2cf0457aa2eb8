import {isEqual} from 'lodash-es'
import type {Lock, LockedBase, LockedBuild, LockedFeature} from '../types.js'

export type ChangeKind = 'added' | 'removed' | 'changed'

export type EntryChange = {
  kind: ChangeKind;
  subject: 'base' | 'feature';
  name: string;
  placeholder: string;
  /** Version in the previous lock. */
  from?: string;
  /** Version in the new lock. */
  to?: string;
}

export type BuildChange = {
  kind: ChangeKind;
  target: string;
}

export type LockDiff = {
  entries: EntryChange[];
  builds: BuildChange[];
}

type Entry = LockedBase | LockedFeature

function entryKey(entry: Entry): string {
  return `${entry.name}#${entry.placeholder}`
}

function diffEntries<T extends Entry>(subject: 'base' | 'feature', previous: T[], next: T[]): EntryChange[] {
  const before = new Map(previous.map(entry => [entryKey(entry), entry]))
  const after = new Map(next.map(entry => [entryKey(entry), entry]))
  const changes: EntryChange[] = []

  for (const [key, entry] of after) {
    const old = before.get(key)
    if (!old) {
      changes.push({kind: 'added', subject, name: entry.name, placeholder: entry.placeholder, to: entry.version})
    } else if (!isEqual(old, entry)) {
      changes.push({kind: 'changed', subject, name: entry.name, placeholder: entry.placeholder, from: old.version, to: entry.version})
    }
  }

  for (const [key, entry] of before) {
    if (!after.has(key)) {
      changes.push({kind: 'removed', subject, name: entry.name, placeholder: entry.placeholder, from: entry.version})
    }
  }

  return changes
}

function diffBuilds(previous: LockedBuild[], next: LockedBuild[]): BuildChange[] {
  const before = new Map(previous.map(build => [build.target, build]))
  const after = new Map(next.map(build => [build.target, build]))
  const changes: BuildChange[] = []

  for (const [target, build] of after) {
    const old = before.get(target)
    if (!old) {
      changes.push({kind: 'added', target})
    } else if (!isEqual(old, build)) {
      changes.push({kind: 'changed', target})
    }
  }

  for (const target of before.keys()) {
    if (!after.has(target)) {
      changes.push({kind: 'removed', target})
    }
  }

  return changes
}

/**
 * Changes between two locks. Bases and features are matched by name and
 * placeholder, builds by target; unchanged entries are left out.
 */
export function diffLocks(previous: Lock | undefined, next: Lock): LockDiff {
  const before = previous ?? {bases: [], features: [], builds: []}
  return {
    entries: [
      ...diffEntries('base', before.bases, next.bases),
      ...diffEntries('feature', before.features, next.features)
    ],
    builds: diffBuilds(before.builds, next.builds)
  }
}

export function isEmptyDiff(diff: LockDiff): boolean {
  return diff.entries.length === 0 && diff.builds.length === 0
}

/** One line per change, e.g. `~ feature corretto "21": 21.0.1 -> 21.0.2`. */
export function describeChange(change: EntryChange | BuildChange): string {
  const symbol = change.kind === 'added' ? '+' : (change.kind === 'removed' ? '-' : '~')
  if ('target' in change) {
    return `${symbol} build ${change.target}`
  }

  const label = `${symbol} ${change.subject} ${change.name} "${change.placeholder}"`
  switch (change.kind) {
    case 'added': {
      return `${label}: ${change.to ?? ''}`
    }

    case 'removed': {
      return `${label}: ${change.from ?? ''}`
    }

    case 'changed': {
      return `${label}: ${change.from ?? ''} -> ${change.to ?? ''}`
    }
  }
}
