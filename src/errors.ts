export class ImagewrightError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'ImagewrightError'
  }

  get transient(): boolean {
    return false
  }
}

// -- Template errors ---------------------------------------------------------

export type TemplateErrorKind = 'UnknownField' | 'IndexOutOfRange' | 'MalformedExpression'

export class TemplateError extends ImagewrightError {
  constructor(
    readonly kind: TemplateErrorKind,
    readonly path: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super('TEMPLATE_ERROR', message, options)
    this.name = 'TemplateError'
  }
}

// -- Version errors ----------------------------------------------------------

export type VersionErrorKind = 'NotFound' | 'AmbiguousOutput' | 'NetworkFailure' | 'RateLimited'

const versionErrorCodes: Record<VersionErrorKind, string> = {
  NotFound: 'VERSION_NOT_FOUND',
  AmbiguousOutput: 'VERSION_AMBIGUOUS_OUTPUT',
  NetworkFailure: 'VERSION_NETWORK_FAILURE',
  RateLimited: 'VERSION_RATE_LIMITED'
}

export class VersionError extends ImagewrightError {
  constructor(
    readonly kind: VersionErrorKind,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(versionErrorCodes[kind], message, options)
    this.name = 'VersionError'
  }

  override get transient(): boolean {
    return this.kind === 'NetworkFailure' || this.kind === 'RateLimited'
  }
}

/**
 * A failure while resolving one placeholder of a base or feature.
 * Keeps the code of the underlying error so callers can still branch on it.
 */
export class ResolutionError extends ImagewrightError {
  constructor(
    readonly kind: 'base' | 'feature',
    readonly entry: string,
    readonly placeholder: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(
      cause instanceof ImagewrightError ? cause.code : 'RESOLUTION_FAILED',
      `Unable to resolve ${kind} ${entry} version "${placeholder}": ${reason}`,
      {cause}
    )
    this.name = 'ResolutionError'
  }

  get subject(): string {
    return `${this.kind} ${this.entry}`
  }
}

// -- Expansion errors --------------------------------------------------------

export class ExpansionError extends ImagewrightError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'ExpansionError'
  }
}

export class DuplicateTargetError extends ExpansionError {
  constructor(readonly target: string, detail: string, options?: {cause?: unknown}) {
    super('DUPLICATE_TARGET', `Duplicate build target "${target}": ${detail}`, options)
    this.name = 'DuplicateTargetError'
  }
}

export class UnresolvedPinError extends ExpansionError {
  constructor(readonly subject: string, readonly version: string, options?: {cause?: unknown}) {
    super('UNRESOLVED_PIN', `Build pins ${subject} to version "${version}", which is not declared for it`, options)
    this.name = 'UnresolvedPinError'
  }
}

/** Image name or tag of one expanded build failed to render. */
export class BuildRenderError extends ExpansionError {
  constructor(readonly build: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(
      cause instanceof ImagewrightError ? cause.code : 'BUILD_RENDER_FAILED',
      `Unable to render ${build}: ${reason}`,
      {cause}
    )
    this.name = 'BuildRenderError'
  }
}

// -- Generation errors -------------------------------------------------------

export class GenerationError extends ImagewrightError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'GenerationError'
  }
}

export class NoScriptForPackageManagerError extends GenerationError {
  constructor(readonly feature: string, readonly packageManager: string, options?: {cause?: unknown}) {
    super('NO_SCRIPT_FOR_PACKAGE_MANAGER', `Feature ${feature} has no installation script for package manager "${packageManager}"`, options)
    this.name = 'NoScriptForPackageManagerError'
  }
}

export class MissingDependencyError extends GenerationError {
  constructor(readonly feature: string, readonly dependency: string, options?: {cause?: unknown}) {
    super('MISSING_DEPENDENCY', `Feature ${feature} depends on "${dependency}", which does not exist in the build context`, options)
    this.name = 'MissingDependencyError'
  }
}

// -- Config errors -----------------------------------------------------------

export class ValidationError extends ImagewrightError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('VALIDATION_ERROR', message, options)
    this.name = 'ValidationError'
  }
}

// -- Docker errors -----------------------------------------------------------

export class DockerError extends ImagewrightError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'DockerError'
  }
}

export class DockerNotAvailableError extends DockerError {
  constructor(options?: {cause?: unknown}) {
    super('DOCKER_NOT_AVAILABLE', 'Docker CLI not found. Please install Docker.', options)
    this.name = 'DockerNotAvailableError'
  }

  override get transient(): boolean {
    return true
  }
}

export class ImagePullError extends DockerError {
  constructor(image: string, options?: {cause?: unknown}) {
    super('IMAGE_PULL_FAILED', `Failed to pull image "${image}"`, options)
    this.name = 'ImagePullError'
  }

  override get transient(): boolean {
    return true
  }
}

export class DigestNotFoundError extends DockerError {
  constructor(image: string, options?: {cause?: unknown}) {
    super('DIGEST_NOT_FOUND', `"${image}" has no registry digest`, options)
    this.name = 'DigestNotFoundError'
  }
}
