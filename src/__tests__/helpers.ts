import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {ContainerExecutor, type ExecOptions, type ExecResult} from '../engine/executor.js'
import {SourceHost} from '../engine/source-host.js'
import type {Reporter, ResolutionEvent} from '../core/reporter.js'
import {DigestNotFoundError} from '../errors.js'
import type {InstallStep, LockedBase, LockedFeature, RefMode} from '../types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'imagewright-test-'))
}

/**
 * Returns a reporter that records emit() calls for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: ResolutionEvent[]} {
  const events: ResolutionEvent[] = []
  const reporter: Reporter = {
    emit(event: ResolutionEvent) {
      events.push(event)
    }
  }

  return {reporter, events}
}

export type FakeExecHandler = (image: string, command: string[], options?: ExecOptions) => ExecResult | Promise<ExecResult>

/**
 * In-process stand-in for the Docker CLI. Exec calls go to `handler`;
 * digests come from `digests`, keyed by image.
 */
export class FakeExecutor extends ContainerExecutor {
  readonly calls: Array<{image: string; command: string[]}> = []
  readonly digestCalls: string[] = []

  constructor(
    private readonly handler: FakeExecHandler = () => ({exitCode: 0, stdout: [], stderr: []}),
    private readonly digests: Record<string, string> = {}
  ) {
    super()
  }

  async check(): Promise<void> {
    // Always available
  }

  async exec(image: string, command: string[], options?: ExecOptions): Promise<ExecResult> {
    this.calls.push({image, command})
    return this.handler(image, command, options)
  }

  async digest(image: string): Promise<string> {
    this.digestCalls.push(image)
    const digest = this.digests[image]
    if (!digest) {
      throw new DigestNotFoundError(image)
    }

    return digest
  }
}

/** Stdout-only exec result. */
export function output(...lines: string[]): ExecResult {
  return {exitCode: 0, stdout: lines, stderr: []}
}

export type FakeListHandler = (org: string, project: string, mode: RefMode, options?: {signal?: AbortSignal}) => string[] | Promise<string[]>

/** In-process source host answering from a fixed listing per `org/project`. */
export class FakeSourceHost extends SourceHost {
  readonly name = 'fake'
  readonly calls: Array<{org: string; project: string; mode: RefMode}> = []

  private readonly handler: FakeListHandler

  constructor(refs: Record<string, string[]> | FakeListHandler = {}) {
    super()
    this.handler = typeof refs === 'function' ? refs : (org, project) => refs[`${org}/${project}`] ?? []
  }

  async listRefs(org: string, project: string, mode: RefMode, options?: {signal?: AbortSignal}): Promise<string[]> {
    this.calls.push({org, project, mode})
    return this.handler(org, project, mode, options)
  }
}

/** Promise with its resolve function exposed. */
export function deferred<T>(): {promise: Promise<T>; resolve: (value: T) => void} {
  let resolve: (value: T) => void = () => {/* replaced below */}
  const promise = new Promise<T>(done => {
    resolve = done
  })
  return {promise, resolve}
}

// -- Lock fixtures -----------------------------------------------------------

export function lockedBase(overrides: Partial<LockedBase> & {name: string; version: string}): LockedBase {
  return {
    placeholder: overrides.version,
    versions: overrides.version.split('.'),
    packageManager: 'dnf',
    tag: `${overrides.name}${overrides.version}`,
    image: `registry.test/${overrides.name}:${overrides.version}`,
    ...overrides
  }
}

export function lockedFeature(overrides: Partial<LockedFeature> & {name: string; version: string}): LockedFeature {
  return {
    placeholder: overrides.version,
    versions: overrides.version.split('.'),
    tag: `${overrides.name}${overrides.version}`,
    steps: [],
    ...overrides
  }
}

export function rpmStep(scripts: Record<string, string[]>, extra?: Partial<Pick<InstallStep, 'stage' | 'copy'>>): InstallStep {
  return {kind: 'package-manager', method: 'rpm', stage: 'install', copy: {}, scripts, ...extra}
}

export function dockerStep(commands: string[], dependencies: string[] = [], extra?: Partial<Pick<InstallStep, 'stage' | 'copy'>>): InstallStep {
  return {kind: 'direct', stage: 'install', copy: {}, commands, dependencies, ...extra}
}
