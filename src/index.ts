/**
 * Library exports for programmatic use. For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {ConfigLoader, DockerCliExecutor, GithubSourceHost, LockBuilder, TemplateEngine, VersionResolver, generateScript} from 'imagewright'
 *
 * const config = await new ConfigLoader().load('imagewright.toml')
 * const engine = new TemplateEngine()
 * const executor = new DockerCliExecutor()
 * const resolver = new VersionResolver(executor, new GithubSourceHost(), engine)
 * const lock = await new LockBuilder(resolver, executor, {engine}).build(config)
 *
 * const {script} = await generateScript(lock, {contextDir: process.cwd()})
 * ```
 */

export {
  ContainerExecutor,
  DockerCliExecutor,
  SourceHost,
  GithubSourceHost,
  imageRepository,
  imageTag,
  pinnedReference,
  type ExecOptions,
  type ExecResult,
  type GithubSourceHostOptions
} from './engine/index.js'

export * from './core/index.js'
export type * from './types.js'
export {isPinnedBuild} from './types.js'

export {
  ImagewrightError,
  TemplateError,
  VersionError,
  ResolutionError,
  ExpansionError,
  DuplicateTargetError,
  UnresolvedPinError,
  BuildRenderError,
  GenerationError,
  NoScriptForPackageManagerError,
  MissingDependencyError,
  ValidationError,
  DockerError,
  DockerNotAvailableError,
  ImagePullError,
  DigestNotFoundError,
  type TemplateErrorKind,
  type VersionErrorKind
} from './errors.js'
