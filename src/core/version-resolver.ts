import {VersionError} from '../errors.js'
import type {ContainerExecutor} from '../engine/executor.js'
import type {SourceHost} from '../engine/source-host.js'
import type {DockerFetchVersion, FetchStrategy, GithubFetchVersion} from '../types.js'
import {ResolutionCache} from './resolution-cache.js'
import {type TemplateContext, type TemplateEngine, type TemplateNode, list, object, scalar} from './template.js'
import {findNewest, isWildcard, splitVersion} from './version.js'

export type VersionResult = {
  placeholder: string;
  version: string;
  /** Fields of `version`, exposed to templates as `versions.N`. */
  versions: string[];
}

export type ResolveOptions = {
  signal?: AbortSignal;
}

/** Template context of one version: `version` and its fields as `versions`. */
export function versionContext(version: string, extra?: Record<string, string>): TemplateContext {
  const fields: Record<string, TemplateNode> = {
    version: scalar(version),
    versions: list(splitVersion(version).map(field => scalar(field)))
  }
  for (const [key, value] of Object.entries(extra ?? {})) {
    fields[key] = scalar(value)
  }

  return object(fields)
}

function toResult(placeholder: string, version: string): VersionResult {
  return {placeholder, version, versions: splitVersion(version)}
}

/**
 * Turns a version placeholder into a concrete version under a fetch strategy.
 *
 * - no strategy: the placeholder is the version
 * - `docker`: last non-empty stdout line of a command run in the rendered image
 * - `github`: newest tag or branch matching a wildcard placeholder; literal
 *   placeholders are returned as written
 */
export class VersionResolver {
  constructor(
    private readonly executor: ContainerExecutor,
    private readonly sourceHost: SourceHost,
    private readonly engine: TemplateEngine,
    private readonly cache: ResolutionCache = new ResolutionCache()
  ) {}

  async resolve(placeholder: string, strategy?: FetchStrategy, options?: ResolveOptions): Promise<VersionResult> {
    if (!strategy) {
      return toResult(placeholder, placeholder)
    }

    switch (strategy.type) {
      case 'docker': {
        return this.resolveFromDocker(placeholder, strategy, options)
      }

      case 'github': {
        return this.resolveFromSource(placeholder, strategy, options)
      }
    }
  }

  private async resolveFromDocker(placeholder: string, strategy: DockerFetchVersion, options?: ResolveOptions): Promise<VersionResult> {
    const context = versionContext(placeholder)
    const image = this.engine.render(strategy.image, context)
    const command = this.engine.renderAll(strategy.command, context)

    let result: Awaited<ReturnType<ContainerExecutor['exec']>>
    try {
      result = await this.executor.exec(image, command, {signal: options?.signal})
    } catch (error) {
      if (error instanceof VersionError) {
        throw error
      }

      const reason = error instanceof Error ? error.message : String(error)
      throw new VersionError('NetworkFailure', `Unable to run version command in "${image}": ${reason}`, {cause: error})
    }

    if (result.exitCode !== 0) {
      const detail = result.stderr.filter(line => line.trim()).at(-1)
      throw new VersionError('NotFound', `Version command ${JSON.stringify(command)} failed in "${image}" with exit code ${result.exitCode}${detail ? `: ${detail}` : ''}`)
    }

    const line = result.stdout.map(output => output.trim()).filter(output => output.length > 0).at(-1)
    if (line === undefined) {
      throw new VersionError('NotFound', `No response from version command ${JSON.stringify(command)} in "${image}"`)
    }

    if (splitVersion(line).length === 0) {
      throw new VersionError('AmbiguousOutput', `Version command in "${image}" printed "${line}", which holds no version`)
    }

    return toResult(placeholder, line)
  }

  private async resolveFromSource(placeholder: string, strategy: GithubFetchVersion, options?: ResolveOptions): Promise<VersionResult> {
    if (!isWildcard(placeholder)) {
      return toResult(placeholder, placeholder)
    }

    const context = versionContext(placeholder)
    const org = this.engine.render(strategy.org, context)
    const project = this.engine.render(strategy.project, context)
    const mode = strategy.versionFrom

    const refs = await this.cache.getOrFetch(
      {org, project, mode},
      async () => this.sourceHost.listRefs(org, project, mode, {signal: options?.signal})
    )

    const newest = findNewest(placeholder, refs)
    if (newest === undefined) {
      throw new VersionError('NotFound', `No ${mode} of ${this.sourceHost.name}:${org}/${project} match "${placeholder}"`)
    }

    return toResult(placeholder, newest)
  }
}
