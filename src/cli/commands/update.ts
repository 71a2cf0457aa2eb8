import process from 'node:process'
import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {ConfigLoader} from '../../core/config-loader.js'
import {LockBuilder} from '../../core/lock-builder.js'
import {type LockDiff, describeChange, diffLocks, isEmptyDiff} from '../../core/lock-diff.js'
import {readLockIfExists, writeLock} from '../../core/lock-file.js'
import {JsonFileCacheStore, ResolutionCache} from '../../core/resolution-cache.js'
import {TemplateEngine} from '../../core/template.js'
import {VersionResolver} from '../../core/version-resolver.js'
import {DockerCliExecutor} from '../../engine/docker-executor.js'
import {GithubSourceHost} from '../../engine/github-source-host.js'
import type {Config} from '../../types.js'
import {createReporter, getGlobalOptions, parseCount, parsePositive} from '../utils.js'

type UpdateOptions = {
  dryRun?: boolean;
  concurrency: number;
  retries: number;
  retryDelay: number;
  digest: boolean;
  cache?: string;
  cacheTtl: number;
  githubToken?: string;
}

function needsDocker(config: Config, digests: boolean): boolean {
  return (digests && config.bases.length > 0)
    || [...config.bases, ...config.features].some(entry => entry.fetchVersion?.type === 'docker')
}

function printDiff(diff: LockDiff, json: boolean | undefined): void {
  if (json) {
    console.log(JSON.stringify(diff))
    return
  }

  if (isEmptyDiff(diff)) {
    console.log(chalk.gray('Lock is up to date.'))
    return
  }

  for (const change of [...diff.entries, ...diff.builds]) {
    const line = describeChange(change)
    const color = change.kind === 'added' ? chalk.green : (change.kind === 'removed' ? chalk.red : chalk.yellow)
    console.log(color(line))
  }
}

export function registerUpdateCommand(program: Command): void {
  program
    .command('update')
    .description('Resolve every version of the config and write the lock')
    .option('--dry-run', 'Resolve and show changes without writing the lock')
    .option('-c, --concurrency <number>', 'Placeholders resolved at once', parsePositive, 4)
    .option('--retries <number>', 'Retries of a transient failure', parseCount, 2)
    .option('--retry-delay <ms>', 'Delay before the first retry, doubled on each one', parseCount, 1000)
    .option('--no-digest', 'Lock base images by tag instead of registry digest')
    .option('--cache <file>', 'Keep GitHub listings in this JSON file between runs')
    .option('--cache-ttl <seconds>', 'Max age of kept GitHub listings', parseCount, 3600)
    .option('--github-token <token>', 'GitHub API token', process.env.GITHUB_TOKEN ?? process.env.GH_TOKEN)
    .action(async (options: UpdateOptions, cmd: Command) => {
      const {config: configPath, lock: lockPath, json, logLevel} = getGlobalOptions(cmd)
      const config = await new ConfigLoader().load(resolve(configPath))

      const executor = new DockerCliExecutor()
      if (needsDocker(config, options.digest)) {
        await executor.check()
      }

      const engine = new TemplateEngine()
      const cache = new ResolutionCache(options.cache ? new JsonFileCacheStore(resolve(options.cache), options.cacheTtl * 1000) : undefined)
      await cache.load()

      const resolver = new VersionResolver(executor, new GithubSourceHost({token: options.githubToken}), engine, cache)
      const builder = new LockBuilder(resolver, executor, {
        concurrency: options.concurrency,
        retries: options.retries,
        retryDelayMs: options.retryDelay,
        digests: options.digest,
        reporter: createReporter({json, logLevel}),
        engine
      })

      const lock = await builder.build(config)
      await cache.save()

      const previous = await readLockIfExists(resolve(lockPath))
      printDiff(diffLocks(previous, lock), json)

      if (!options.dryRun) {
        await writeLock(resolve(lockPath), lock)
      }
    })
}
