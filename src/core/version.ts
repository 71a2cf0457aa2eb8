import semver from 'semver'

/**
 * Splits a version string into its fields. Any run of characters other than
 * word characters and `*` delimits fields; empty fields are dropped.
 *
 * @example
 * splitVersion('17.0.9 (build 17.0.9+8)') // ['17', '0', '9', 'build', '17', '0', '9', '8']
 */
export function splitVersion(version: string): string[] {
  return version.split(/[^\w*]+/).filter(field => field.length > 0)
}

/** True for placeholders that must be looked up rather than used as written. */
export function isWildcard(placeholder: string): boolean {
  return placeholder === 'latest' || placeholder.includes('*')
}

/**
 * Field-by-field match of a candidate against a pattern. A `*` field matches
 * anything, and the candidate may carry more fields than the pattern.
 */
export function versionMatches(pattern: string, candidate: string): boolean {
  if (pattern === 'latest') {
    return true
  }

  const expected = splitVersion(pattern)
  const actual = splitVersion(candidate)
  if (actual.length < expected.length) {
    return false
  }

  return expected.every((field, index) => field === '*' || field === actual[index])
}

function compareFields(a: string[], b: string[]): number {
  for (let index = 0; index < Math.min(a.length, b.length); index++) {
    const left = a[index]
    const right = b[index]
    if (left === right) {
      continue
    }

    if (/^\d+$/.test(left) && /^\d+$/.test(right)) {
      return Number(left) - Number(right)
    }

    return left < right ? -1 : 1
  }

  return a.length - b.length
}

/**
 * Orders versions oldest first. Versions that coerce to semver compare by
 * semver and rank above those that do not; remaining ties fall back to a
 * field-wise comparison and then to lexical order.
 */
export function compareVersions(a: string, b: string): number {
  const left = semver.coerce(a, {loose: true, includePrerelease: true})
  const right = semver.coerce(b, {loose: true, includePrerelease: true})

  if (left && right) {
    const bySemver = semver.compare(left, right)
    if (bySemver !== 0) {
      return bySemver
    }
  } else if (left) {
    return 1
  } else if (right) {
    return -1
  }

  const byFields = compareFields(splitVersion(a), splitVersion(b))
  if (byFields !== 0) {
    return Math.sign(byFields)
  }

  if (a === b) {
    return 0
  }

  return a < b ? -1 : 1
}

/** Newest candidate matching the pattern, or undefined when none does. */
export function findNewest(pattern: string, candidates: string[]): string | undefined {
  let newest: string | undefined
  for (const candidate of candidates) {
    if (versionMatches(pattern, candidate) && (newest === undefined || compareVersions(candidate, newest) > 0)) {
      newest = candidate
    }
  }

  return newest
}
