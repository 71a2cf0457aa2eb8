export {TemplateEngine, parseTemplate, formatDate, scalar, list, object, toNode, toContext} from './template.js'
export type {TemplateNode, TemplateContext, PlainValue} from './template.js'
export {splitVersion, isWildcard, versionMatches, compareVersions, findNewest} from './version.js'
export {ResolutionCache, JsonFileCacheStore, cacheKey} from './resolution-cache.js'
export type {CacheKey, CacheEntry, CacheStore} from './resolution-cache.js'
export {VersionResolver, versionContext} from './version-resolver.js'
export type {VersionResult, ResolveOptions} from './version-resolver.js'
export {expandBuilds, createCatalog, buildContext, targetName} from './matrix.js'
export type {Catalog} from './matrix.js'
export {LockBuilder} from './lock-builder.js'
export type {LockBuilderOptions} from './lock-builder.js'
export {generateScript, runInstruction, buildStageName} from './script-generator.js'
export type {GeneratedScript, GenerateOptions} from './script-generator.js'
export {writeBuildContext} from './build-context.js'
export type {BuildContext, BuildContextOptions} from './build-context.js'
export {ConfigLoader, validateConfig} from './config-loader.js'
export {encodeLock, decodeLock, readLock, readLockIfExists, writeLock, listImages, targetsPath} from './lock-file.js'
export type {ImageEntry} from './lock-file.js'
export {diffLocks, isEmptyDiff, describeChange} from './lock-diff.js'
export type {LockDiff, EntryChange, BuildChange, ChangeKind} from './lock-diff.js'
export {ConsoleReporter, noopReporter, describeSubject} from './reporter.js'
export type {
  Reporter,
  SubjectRef,
  ResolutionEvent,
  ResolutionStartEvent,
  VersionResolvingEvent,
  VersionRetryingEvent,
  VersionResolvedEvent,
  DigestMissingEvent,
  ResolutionFinishedEvent,
  ResolutionFailedEvent
} from './reporter.js'
export {slugify, formatDuration} from './utils.js'
