import {stat} from 'node:fs/promises'
import {resolve} from 'node:path'
import {MissingDependencyError, NoScriptForPackageManagerError, ValidationError} from '../errors.js'
import {pinnedReference} from '../engine/image-ref.js'
import type {InstallStep, Lock, LockRef, LockedBase, LockedBuild, LockedFeature} from '../types.js'
import {slugify} from './utils.js'

export type GeneratedScript = {
  script: string;
  /** Direct-step dependencies, relative to the build context, in first-use order. */
  dependencies: string[];
}

export type GenerateOptions = {
  /** Directory direct-step dependencies are resolved against. */
  contextDir: string;
}

type Stage = {
  name: string;
  lines: string[];
}

/** `RUN a && \` + newline + `b`; nothing for an empty script. */
export function runInstruction(lines: string[]): string[] {
  return lines.length > 0 ? [`RUN ${lines.join(' && \\\n')}`] : []
}

export function buildStageName(base: LockedBase, feature: LockedFeature, index: number): string {
  return slugify(`${base.tag}-${feature.name}-${feature.version}-build-${index}`)
}

function findByRef<T extends {name: string; version: string}>(entries: T[], ref: LockRef, kind: string, target: string): T {
  const entry = entries.find(candidate => candidate.name === ref.name && candidate.version === ref.version)
  if (!entry) {
    throw new ValidationError(`Build ${target} references ${kind} ${ref.name}@${ref.version}, which is missing from the lock`)
  }

  return entry
}

function stepLines(step: InstallStep, feature: LockedFeature, base: LockedBase): string[] {
  if (step.kind === 'direct') {
    return step.commands
  }

  const script = step.scripts[base.packageManager]
  if (!script) {
    throw new NoScriptForPackageManagerError(`${feature.name}@${feature.version}`, base.packageManager)
  }

  return runInstruction(script)
}

function render(stages: Stage[]): string {
  return stages.map(stage => stage.lines.join('\n')).join('\n\n') + '\n'
}

/**
 * Renders a lock into a multi-stage Dockerfile.
 *
 * One stage per locked base, then per build the ephemeral stages of its
 * features' build steps and the build stage itself, named after the target.
 */
export async function generateScript(lock: Lock, options: GenerateOptions): Promise<GeneratedScript> {
  const resolved = lock.builds.map(build => ({
    build,
    base: findByRef(lock.bases, build.base, 'base', build.target),
    features: build.features.map(ref => findByRef(lock.features, ref, 'feature', build.target))
  }))

  const dependencies = await checkDependencies(resolved.flatMap(({features}) => features), options.contextDir)

  const stages: Stage[] = lock.bases.map(base => ({
    name: base.tag,
    lines: [`FROM ${pinnedReference(base.image, base.identifier?.digest)} AS ${base.tag}`]
  }))
  const emitted = new Set(stages.map(stage => stage.name))

  for (const {build, base, features} of resolved) {
    for (const stage of buildStepStages(base, features)) {
      if (!emitted.has(stage.name)) {
        emitted.add(stage.name)
        stages.push(stage)
      }
    }

    if (features.length === 0 && build.target === base.tag) {
      continue
    }

    if (emitted.has(build.target)) {
      continue
    }

    emitted.add(build.target)
    stages.push(targetStage(build, base, features))
  }

  return {script: render(stages), dependencies}
}

function buildStepStages(base: LockedBase, features: LockedFeature[]): Stage[] {
  return features.flatMap(feature => feature.steps.flatMap((step, index) => {
    if (step.stage !== 'build') {
      return []
    }

    const name = buildStageName(base, feature, index)
    return [{name, lines: [`FROM ${base.tag} AS ${name}`, ...stepLines(step, feature, base)]}]
  }))
}

function targetStage(build: LockedBuild, base: LockedBase, features: LockedFeature[]): Stage {
  const lines = [`FROM ${base.tag} AS ${build.target}`]
  for (const feature of features) {
    for (const [index, step] of feature.steps.entries()) {
      if (step.stage === 'build') {
        const from = buildStageName(base, feature, index)
        lines.push(...Object.entries(step.copy).map(([source, destination]) => `COPY --from=${from} ${source} ${destination}`))
      }
    }

    for (const step of feature.steps) {
      if (step.stage === 'install') {
        lines.push(...stepLines(step, feature, base))
      }
    }
  }

  return {name: build.target, lines}
}

async function checkDependencies(features: LockedFeature[], contextDir: string): Promise<string[]> {
  const dependencies: string[] = []
  const owners = new Map<string, string>()
  for (const feature of features) {
    for (const step of feature.steps) {
      if (step.kind !== 'direct') {
        continue
      }

      for (const dependency of step.dependencies) {
        if (!owners.has(dependency)) {
          owners.set(dependency, `${feature.name}@${feature.version}`)
          dependencies.push(dependency)
        }
      }
    }
  }

  for (const dependency of dependencies) {
    try {
      await stat(resolve(contextDir, dependency))
    } catch (error: unknown) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new MissingDependencyError(owners.get(dependency) ?? 'unknown', dependency, {cause: error})
      }

      throw error
    }
  }

  return dependencies
}
