import pino, {type Level} from 'pino'

/** Identifies the base or feature entry a placeholder belongs to. */
export type SubjectRef = {
  kind: 'base' | 'feature';
  name: string;
  placeholder: string;
}

/**
 * Discriminated union of resolution events.
 *
 * Lifecycle:
 * 1. RESOLUTION_START - Resolution pass begins
 * 2. For each placeholder:
 *    a. VERSION_RESOLVING - Resolution of the placeholder begins
 *    b. VERSION_RETRYING - A transient failure is retried (zero or more)
 *    c. VERSION_RESOLVED - The placeholder has a version
 *    d. DIGEST_MISSING - A base locks without a registry digest
 * 3. RESOLUTION_FINISHED - Lock assembled
 *    OR RESOLUTION_FAILED - Pass aborted on the first fatal error
 */
export type ResolutionStartEvent = {
  event: 'RESOLUTION_START';
  bases: number;
  features: number;
  builds: number;
}

export type VersionResolvingEvent = {
  event: 'VERSION_RESOLVING';
  subject: SubjectRef;
}

export type VersionRetryingEvent = {
  event: 'VERSION_RETRYING';
  subject: SubjectRef;
  attempt: number;
  maxRetries: number;
  reason: string;
}

export type VersionResolvedEvent = {
  event: 'VERSION_RESOLVED';
  subject: SubjectRef;
  version: string;
  durationMs: number;
}

export type DigestMissingEvent = {
  event: 'DIGEST_MISSING';
  subject: SubjectRef;
  image: string;
  reason: string;
}

export type ResolutionFinishedEvent = {
  event: 'RESOLUTION_FINISHED';
  builds: number;
  durationMs: number;
}

export type ResolutionFailedEvent = {
  event: 'RESOLUTION_FAILED';
  subject?: SubjectRef;
  code: string;
  message: string;
}

export type ResolutionEvent =
  | ResolutionStartEvent
  | VersionResolvingEvent
  | VersionRetryingEvent
  | VersionResolvedEvent
  | DigestMissingEvent
  | ResolutionFinishedEvent
  | ResolutionFailedEvent

/**
 * Interface for reporting resolution progress.
 */
export type Reporter = {
  emit(event: ResolutionEvent): void;
}

/**
 * Silent reporter, the default of the core classes.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */}
}

export function describeSubject(subject: SubjectRef): string {
  return `${subject.kind} ${subject.name} "${subject.placeholder}"`
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger: pino.Logger

  constructor(options?: {level?: Level; destination?: pino.DestinationStream}) {
    const settings = {level: options?.level ?? 'info'}
    this.logger = options?.destination ? pino(settings, options.destination) : pino(settings)
  }

  emit(event: ResolutionEvent): void {
    switch (event.event) {
      case 'RESOLUTION_FAILED': {
        this.logger.error(event)
        break
      }

      case 'VERSION_RETRYING':
      case 'DIGEST_MISSING': {
        this.logger.warn(event)
        break
      }

      case 'VERSION_RESOLVING': {
        this.logger.debug(event)
        break
      }

      default: {
        this.logger.info(event)
      }
    }
  }
}
