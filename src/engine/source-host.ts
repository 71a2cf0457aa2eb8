import type {RefMode} from '../types.js'

/**
 * A source-control host listing the tags or branches of a repository.
 *
 * Implementations map their failures to `VersionError`: a missing repository
 * is `NotFound`, throttling is `RateLimited`, anything else on the wire is
 * `NetworkFailure`.
 */
export abstract class SourceHost {
  /** Host name shown in messages (e.g. "github"). */
  abstract readonly name: string

  /** Lists ref names, newest first where the host knows an order. */
  abstract listRefs(org: string, project: string, mode: RefMode, options?: {signal?: AbortSignal}): Promise<string[]>
}
