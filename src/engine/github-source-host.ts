import {VersionError} from '../errors.js'
import type {RefMode} from '../types.js'
import {SourceHost} from './source-host.js'

const DEFAULT_BASE_URL = 'https://api.github.com'
const DEFAULT_TIMEOUT_MS = 30_000
const USER_AGENT = 'imagewright'

export type GithubSourceHostOptions = {
  token?: string;
  baseUrl?: string;
  /** Refs requested per page (GitHub caps this at 100). */
  perPage?: number;
  /** Stop after this many pages. */
  maxPages?: number;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

type RefEntry = {name: string}

function isRefEntry(value: unknown): value is RefEntry {
  return typeof value === 'object' && value !== null && 'name' in value && typeof value.name === 'string'
}

/**
 * Lists tags or branches through the GitHub REST API.
 *
 * Tags come back newest first. Pages are fetched until one is short or
 * `maxPages` is reached.
 */
export class GithubSourceHost extends SourceHost {
  readonly name = 'github'

  private readonly baseUrl: string
  private readonly token: string | undefined
  private readonly perPage: number
  private readonly maxPages: number
  private readonly timeoutMs: number
  private readonly fetch: typeof fetch

  constructor(options: GithubSourceHostOptions = {}) {
    super()
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')
    this.token = options.token
    this.perPage = options.perPage ?? 100
    this.maxPages = options.maxPages ?? 10
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.fetch = options.fetch ?? globalThis.fetch
  }

  async listRefs(org: string, project: string, mode: RefMode, options?: {signal?: AbortSignal}): Promise<string[]> {
    const names: string[] = []
    for (let page = 1; page <= this.maxPages; page++) {
      const entries = await this.getPage(org, project, mode, page, options?.signal)
      names.push(...entries.map(entry => entry.name))
      if (entries.length < this.perPage) {
        break
      }
    }

    return names
  }

  private async getPage(org: string, project: string, mode: RefMode, page: number, signal?: AbortSignal): Promise<RefEntry[]> {
    const url = `${this.baseUrl}/repos/${encodeURIComponent(org)}/${encodeURIComponent(project)}/${mode}?per_page=${this.perPage}&page=${page}`
    const headers: Record<string, string> = {
      accept: 'application/vnd.github+json',
      'user-agent': USER_AGENT
    }
    if (this.token) {
      headers.authorization = `Bearer ${this.token}`
    }

    const timeout = AbortSignal.timeout(this.timeoutMs)
    let response: Response
    try {
      response = await this.fetch(url, {headers, signal: signal ? AbortSignal.any([signal, timeout]) : timeout})
    } catch (error) {
      throw new VersionError('NetworkFailure', `Unable to reach GitHub for ${org}/${project}`, {cause: error})
    }

    if (response.status === 404) {
      throw new VersionError('NotFound', `Repository ${org}/${project} was not found on GitHub`)
    }

    if (response.status === 429 || (response.status === 403 && response.headers.get('x-ratelimit-remaining') === '0')) {
      const header = response.headers.get('x-ratelimit-reset')
      const reset = header ? Number(header) : Number.NaN
      const until = Number.isFinite(reset) ? ` until ${new Date(reset * 1000).toISOString()}` : ''
      throw new VersionError('RateLimited', `GitHub rate limit exceeded${until} while listing ${mode} of ${org}/${project}`)
    }

    if (!response.ok) {
      throw new VersionError('NetworkFailure', `GitHub answered ${response.status} while listing ${mode} of ${org}/${project}`)
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (error) {
      throw new VersionError('NetworkFailure', `Invalid response from GitHub for ${org}/${project}`, {cause: error})
    }

    if (!Array.isArray(body)) {
      throw new VersionError('NetworkFailure', `Unexpected response from GitHub for ${org}/${project}`)
    }

    return body.filter(isRefEntry)
  }
}
