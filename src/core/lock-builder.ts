import {setTimeout} from 'node:timers/promises'
import pLimit from 'p-limit'
import {ResolutionError, ImagewrightError} from '../errors.js'
import type {ContainerExecutor} from '../engine/executor.js'
import type {
  BaseDefinition,
  Config,
  FeatureDefinition,
  FetchStrategy,
  InstallStep,
  Lock,
  LockedBase,
  LockedFeature
} from '../types.js'
import {assertUniqueBaseTags, createCatalog, expandBuilds} from './matrix.js'
import {type Reporter, type SubjectRef, noopReporter} from './reporter.js'
import {type TemplateContext, TemplateEngine} from './template.js'
import {type VersionResolver, type VersionResult, versionContext} from './version-resolver.js'

export type LockBuilderOptions = {
  /** Placeholders resolved at once. */
  concurrency?: number;
  /** Extra attempts on transient errors. */
  retries?: number;
  /** First retry delay, doubled on every further attempt. */
  retryDelayMs?: number;
  /** Look up registry digests of base images. */
  digests?: boolean;
  reporter?: Reporter;
  engine?: TemplateEngine;
}

type ResolvedBase = {definition: BaseDefinition; result: VersionResult; digest?: string}
type ResolvedFeature = {definition: FeatureDefinition; result: VersionResult}

type Task<T extends {result: VersionResult}> = {
  subject: SubjectRef;
  run: (signal: AbortSignal) => Promise<T>;
}

function renderStep(engine: TemplateEngine, step: InstallStep, context: TemplateContext): InstallStep {
  const copy = Object.fromEntries(Object.entries(step.copy).map(([source, destination]) => [
    engine.render(source, context),
    engine.render(destination, context)
  ]))

  if (step.kind === 'direct') {
    return {
      ...step,
      copy,
      commands: engine.renderAll(step.commands, context),
      dependencies: engine.renderAll(step.dependencies, context)
    }
  }

  const scripts: Record<string, string[]> = {}
  for (const [packageManager, lines] of Object.entries(step.scripts)) {
    scripts[packageManager] = engine.renderAll(lines, context)
  }

  return {...step, copy, scripts}
}

function keepFirst<T extends {name: string; version: string}>(entries: T[]): T[] {
  const seen = new Set<string>()
  return entries.filter(entry => {
    const key = `${entry.name}@${entry.version}`
    if (seen.has(key)) {
      return false
    }

    seen.add(key)
    return true
  })
}

/**
 * Resolves a config into a lock.
 *
 * Every placeholder is resolved on a bounded worker pool. The first fatal
 * error aborts the pass: in-flight container and HTTP calls are cancelled,
 * queued tasks never start and no partial lock is returned.
 */
export class LockBuilder {
  private readonly concurrency: number
  private readonly retries: number
  private readonly retryDelayMs: number
  private readonly digests: boolean
  private readonly reporter: Reporter
  private readonly engine: TemplateEngine

  constructor(
    private readonly resolver: VersionResolver,
    private readonly executor: ContainerExecutor,
    options: LockBuilderOptions = {}
  ) {
    this.concurrency = options.concurrency ?? 4
    this.retries = options.retries ?? 2
    this.retryDelayMs = options.retryDelayMs ?? 1000
    this.digests = options.digests ?? true
    this.reporter = options.reporter ?? noopReporter
    this.engine = options.engine ?? new TemplateEngine()
  }

  async build(config: Config): Promise<Lock> {
    const startedAt = Date.now()
    this.reporter.emit({
      event: 'RESOLUTION_START',
      bases: config.bases.length,
      features: config.features.length,
      builds: config.builds.length
    })

    try {
      const lock = await this.assemble(config)
      this.reporter.emit({event: 'RESOLUTION_FINISHED', builds: lock.builds.length, durationMs: Date.now() - startedAt})
      return lock
    } catch (error) {
      this.reporter.emit({
        event: 'RESOLUTION_FAILED',
        ...(error instanceof ResolutionError ? {subject: {kind: error.kind, name: error.entry, placeholder: error.placeholder}} : {}),
        code: error instanceof ImagewrightError ? error.code : 'UNKNOWN',
        message: error instanceof Error ? error.message : String(error)
      })
      throw error
    }
  }

  private async assemble(config: Config): Promise<Lock> {
    const baseTasks: Array<Task<ResolvedBase>> = config.bases.flatMap(definition => definition.versions.map(placeholder => ({
      subject: {kind: 'base' as const, name: definition.name, placeholder},
      run: async (signal: AbortSignal) => this.resolveBase(definition, placeholder, signal)
    })))
    const featureTasks: Array<Task<ResolvedFeature>> = config.features.flatMap(definition => definition.versions.map(placeholder => ({
      subject: {kind: 'feature' as const, name: definition.name, placeholder},
      run: async (signal: AbortSignal) => ({definition, result: await this.resolveVersion(placeholder, definition.fetchVersion, signal)})
    })))

    const controller = new AbortController()
    const limit = pLimit(this.concurrency)
    let failure: ResolutionError | undefined
    const schedule = async <T extends {result: VersionResult}>(task: Task<T>): Promise<T> => limit(async () => {
      try {
        controller.signal.throwIfAborted()
        return await this.runWithRetries(task, controller.signal)
      } catch (error) {
        failure ??= error instanceof ResolutionError ? error : new ResolutionError(task.subject.kind, task.subject.name, task.subject.placeholder, error)
        controller.abort(failure)
        throw error
      }
    })

    const basesPending = baseTasks.map(schedule)
    const featuresPending = featureTasks.map(schedule)
    // Queued tasks settle right away once aborted, so this returns promptly.
    await Promise.allSettled([...basesPending, ...featuresPending])
    if (failure) {
      throw failure
    }

    const resolvedBases = await Promise.all(basesPending)
    const resolvedFeatures = await Promise.all(featuresPending)
    const bases = resolvedBases.map(resolved => this.lockBase(resolved))
    const features = resolvedFeatures.map(resolved => this.lockFeature(resolved))
    assertUniqueBaseTags(bases)

    const builds = expandBuilds(config.builds, createCatalog(bases, features), this.engine)
    return {bases: keepFirst(bases), features: keepFirst(features), builds}
  }

  private async runWithRetries<T extends {result: VersionResult}>(task: Task<T>, signal: AbortSignal): Promise<T> {
    const startedAt = Date.now()
    this.reporter.emit({event: 'VERSION_RESOLVING', subject: task.subject})

    for (let attempt = 0; ; attempt++) {
      try {
        const resolved = await task.run(signal)
        this.reporter.emit({event: 'VERSION_RESOLVED', subject: task.subject, version: resolved.result.version, durationMs: Date.now() - startedAt})
        return resolved
      } catch (error) {
        if (!(error instanceof ImagewrightError && error.transient) || attempt >= this.retries || signal.aborted) {
          throw error
        }

        this.reporter.emit({
          event: 'VERSION_RETRYING',
          subject: task.subject,
          attempt: attempt + 1,
          maxRetries: this.retries,
          reason: error.message
        })
        await setTimeout(this.retryDelayMs * (2 ** attempt), undefined, {signal})
      }
    }
  }

  private async resolveVersion(placeholder: string, strategy: FetchStrategy | undefined, signal: AbortSignal): Promise<VersionResult> {
    return this.resolver.resolve(placeholder, strategy, {signal})
  }

  private async resolveBase(definition: BaseDefinition, placeholder: string, signal: AbortSignal): Promise<ResolvedBase> {
    const result = await this.resolveVersion(placeholder, definition.fetchVersion, signal)
    if (!this.digests) {
      return {definition, result}
    }

    const image = this.engine.render(definition.image, versionContext(result.version))
    try {
      return {definition, result, digest: await this.executor.digest(image, {signal})}
    } catch (error) {
      if (signal.aborted || (error instanceof ImagewrightError && error.transient)) {
        throw error
      }

      this.reporter.emit({
        event: 'DIGEST_MISSING',
        subject: {kind: 'base', name: definition.name, placeholder},
        image,
        reason: error instanceof Error ? error.message : String(error)
      })
      return {definition, result}
    }
  }

  private lockBase({definition, result, digest}: ResolvedBase): LockedBase {
    const context = versionContext(result.version)
    try {
      return {
        name: definition.name,
        placeholder: result.placeholder,
        version: result.version,
        versions: result.versions,
        packageManager: definition.packageManager,
        tag: this.engine.render(definition.versionTag, context),
        image: this.engine.render(definition.image, context),
        ...(digest ? {identifier: {type: 'Digest' as const, digest}} : {})
      }
    } catch (error) {
      throw new ResolutionError('base', definition.name, result.placeholder, error)
    }
  }

  private lockFeature({definition, result}: ResolvedFeature): LockedFeature {
    const context = versionContext(result.version)
    try {
      return {
        name: definition.name,
        placeholder: result.placeholder,
        version: result.version,
        versions: result.versions,
        tag: this.engine.renderAll(definition.versionTag, context).filter(tag => tag.length > 0).join('-'),
        steps: definition.steps.map(step => renderStep(this.engine, step, context))
      }
    } catch (error) {
      throw new ResolutionError('feature', definition.name, result.placeholder, error)
    }
  }
}
