import {mkdir, readFile, writeFile} from 'node:fs/promises'
import {dirname} from 'node:path'
import type {RefMode} from '../types.js'

export type CacheKey = {
  org: string;
  project: string;
  mode: RefMode;
}

export type CacheEntry = {
  refs: string[];
  /** ISO timestamp of the fetch. */
  fetchedAt: string;
}

/**
 * Persistent backing store for a {@link ResolutionCache}.
 * Expiry across runs is the store's business.
 */
export type CacheStore = {
  load(): Promise<Record<string, CacheEntry>>;
  save(entries: Record<string, CacheEntry>): Promise<void>;
}

export function cacheKey({org, project, mode}: CacheKey): string {
  return `${org}/${project}#${mode}`
}

/**
 * Memoizes source-host listings for one resolution pass.
 *
 * Concurrent lookups of the same key share a single in-flight fetch; distinct
 * keys never wait on each other. Failed fetches are forgotten so a retry
 * reaches the host again. Entries never expire while the cache is alive.
 */
export class ResolutionCache {
  private readonly entries = new Map<string, CacheEntry>()
  private readonly inFlight = new Map<string, Promise<string[]>>()

  constructor(private readonly store?: CacheStore, private readonly clock: () => Date = () => new Date()) {}

  /** Loads persisted entries, if a store is configured. */
  async load(): Promise<void> {
    if (!this.store) {
      return
    }

    for (const [key, entry] of Object.entries(await this.store.load())) {
      this.entries.set(key, entry)
    }
  }

  /** Persists current entries, if a store is configured. */
  async save(): Promise<void> {
    await this.store?.save(Object.fromEntries(this.entries))
  }

  has(key: CacheKey): boolean {
    return this.entries.has(cacheKey(key))
  }

  async getOrFetch(key: CacheKey, fetch: () => Promise<string[]>): Promise<string[]> {
    const id = cacheKey(key)
    const cached = this.entries.get(id)
    if (cached) {
      return cached.refs
    }

    const pending = this.inFlight.get(id)
    if (pending) {
      return pending
    }

    const request = (async () => {
      try {
        const refs = await fetch()
        this.entries.set(id, {refs, fetchedAt: this.clock().toISOString()})
        return refs
      } finally {
        this.inFlight.delete(id)
      }
    })()
    this.inFlight.set(id, request)
    return request
  }
}

function isCacheEntry(value: unknown): value is CacheEntry {
  return typeof value === 'object' && value !== null
    && 'refs' in value && Array.isArray(value.refs) && value.refs.every(ref => typeof ref === 'string')
    && 'fetchedAt' in value && typeof value.fetchedAt === 'string'
}

/**
 * Stores cache entries in a JSON file. Entries older than `ttlMs` are dropped
 * on load; a missing or unreadable file is an empty cache.
 */
export class JsonFileCacheStore implements CacheStore {
  constructor(
    private readonly path: string,
    private readonly ttlMs: number,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async load(): Promise<Record<string, CacheEntry>> {
    let content: string
    try {
      content = await readFile(this.path, 'utf8')
    } catch (error: unknown) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return {}
      }

      throw error
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(content)
    } catch {
      return {}
    }

    if (typeof parsed !== 'object' || parsed === null) {
      return {}
    }

    const now = this.clock().getTime()
    const entries: Record<string, CacheEntry> = {}
    for (const [key, entry] of Object.entries(parsed)) {
      if (isCacheEntry(entry) && now - Date.parse(entry.fetchedAt) <= this.ttlMs) {
        entries[key] = entry
      }
    }

    return entries
  }

  async save(entries: Record<string, CacheEntry>): Promise<void> {
    await mkdir(dirname(this.path), {recursive: true})
    await writeFile(this.path, JSON.stringify(entries, null, 2), 'utf8')
  }
}
