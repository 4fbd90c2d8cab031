/**
 * RepoService - what the CLI and the HTTP API call.
 *
 * Opens repositories through the git adapter, serves reads through the
 * metadata cache, and serializes access per repository: reads share a lock,
 * anything that changes the repository takes it exclusively and drops the
 * repository's cache partition afterwards.
 */

import type { Logger } from '@shared/logger'
import { silentLogger } from '@shared/logger'
import type {
  BranchInfo,
  BranchListOptions,
  CloneOptions,
  CommitInfo,
  DiffOptions,
  ExecResult,
  FetchOptions,
  LogOptions,
  PullOptions,
  PushOptions,
  RemoteInfo,
  Repo,
  RepoStatus
} from '@shared/types/repo'
import crypto from 'crypto'
import fs from 'fs'
import path from 'path'
import type { CallOptions, GitAdapter } from '../adapters/git/interface'
import { listCapabilities, requireCapability } from '../adapters/git/interface'
import { DEFAULT_LOG_MAX_COUNT } from '../shared/constants'
import { CacheError } from '../shared/errors'
import { KeyedRwLock } from '../utils/rw-lock'
import type { CacheLookup, MetadataCache } from './MetadataCache'

export type RepoServiceOptions = {
  git: GitAdapter
  /** Omit to disable caching. */
  cache?: MetadataCache
  logger?: Logger
}

/** Skip the cache and re-query git. The fresh result is still stored. */
export type ReadOptions = CallOptions & { refresh?: boolean }

export type CapabilityReport = {
  backend: string
  operations: Record<string, boolean>
}

type CacheSlot<T> = {
  lookup: () => Promise<CacheLookup<T>>
  store: (value: T) => Promise<void>
}

/**
 * Cache key for a log query. The default query shares one key; anything
 * else gets a key derived from its options.
 */
export function commitCacheKey(options: LogOptions): string {
  const maxCount = options.maxCount ?? DEFAULT_LOG_MAX_COUNT
  if (options.ref === undefined && maxCount === DEFAULT_LOG_MAX_COUNT && !options.oneline) {
    return 'commits'
  }
  const fingerprint = JSON.stringify([options.ref ?? 'HEAD', maxCount, options.oneline === true])
  return `commits-${crypto.createHash('sha256').update(fingerprint).digest('hex').slice(0, 12)}`
}

export class RepoService {
  private readonly git: GitAdapter
  private readonly cache: MetadataCache | undefined
  private readonly logger: Logger
  private readonly locks = new KeyedRwLock()

  constructor(options: RepoServiceOptions) {
    this.git = options.git
    this.cache = options.cache
    this.logger = (options.logger ?? silentLogger).child('RepoService')
  }

  // ============================================================================
  // Handles
  // ============================================================================

  open(repoPath: string, options: CallOptions = {}): Promise<Repo> {
    return this.git.open(repoPath, options)
  }

  discover(repoPath: string, options: CallOptions = {}): Promise<Repo> {
    return this.git.discover(repoPath, options)
  }

  /**
   * Destinations are not locked; concurrent init or clone into the same
   * path is a caller error.
   */
  init(repoPath: string, options: CallOptions & { bare?: boolean } = {}): Promise<Repo> {
    return this.git.init(repoPath, options)
  }

  clone(options: CloneOptions, call: CallOptions = {}): Promise<Repo> {
    return this.git.clone(options, call)
  }

  // ============================================================================
  // Reads
  // ============================================================================

  async status(repoPath: string, options: ReadOptions = {}): Promise<RepoStatus> {
    const repo = await this.git.open(repoPath, options)
    const cache = this.cache
    return this.locks.withRead(repo.path, () =>
      this.readThrough<RepoStatus>(
        repo,
        'status',
        cache && {
          lookup: () => cache.getCachedStatus(repo.path),
          store: (value) => cache.cacheStatus(repo.path, value)
        },
        () => this.git.getStatus(repo, options),
        options.refresh
      )
    )
  }

  async log(repoPath: string, options: LogOptions & ReadOptions = {}): Promise<CommitInfo[]> {
    const repo = await this.git.open(repoPath, options)
    const key = commitCacheKey(options)
    const cache = this.cache
    return this.locks.withRead(repo.path, () =>
      this.readThrough<CommitInfo[]>(
        repo,
        key,
        cache && {
          lookup: () => cache.getCachedCommits(repo.path, key),
          store: (value) => cache.cacheCommits(repo.path, value, key)
        },
        () => this.git.log(repo, options),
        options.refresh
      )
    )
  }

  async branches(repoPath: string, options: BranchListOptions & ReadOptions = {}): Promise<BranchInfo[]> {
    const repo = await this.git.open(repoPath, options)
    const key = options.all ? 'branches-all' : 'branches'
    const cache = this.cache
    return this.locks.withRead(repo.path, () =>
      this.readThrough<BranchInfo[]>(
        repo,
        key,
        cache && {
          lookup: () => cache.getCachedBranches(repo.path, key),
          store: (value) => cache.cacheBranches(repo.path, value, key)
        },
        () => this.git.listBranches(repo, options),
        options.refresh
      )
    )
  }

  async remotes(repoPath: string, options: ReadOptions = {}): Promise<RemoteInfo[]> {
    const repo = await this.git.open(repoPath, options)
    const cache = this.cache
    return this.locks.withRead(repo.path, () =>
      this.readThrough<RemoteInfo[]>(
        repo,
        'remotes',
        cache && {
          lookup: () => cache.getCachedRemotes(repo.path),
          store: (value) => cache.cacheRemotes(repo.path, value)
        },
        () => this.git.listRemotes(repo, options),
        options.refresh
      )
    )
  }

  async diff(repoPath: string, options: DiffOptions & CallOptions = {}): Promise<string> {
    const repo = await this.git.open(repoPath, options)
    return this.locks.withRead(repo.path, () => this.git.diff(repo, options))
  }

  // ============================================================================
  // Writes
  // ============================================================================

  async fetch(repoPath: string, options: FetchOptions & CallOptions = {}): Promise<void> {
    await this.mutate(repoPath, options, (repo) => this.git.fetch(repo, options))
  }

  async pull(repoPath: string, options: PullOptions & CallOptions = {}): Promise<void> {
    await this.mutate(repoPath, options, (repo) => this.git.pull(repo, options))
  }

  async push(repoPath: string, options: PushOptions & CallOptions = {}): Promise<void> {
    await this.mutate(repoPath, options, (repo) => this.git.push(repo, options))
  }

  async merge(repoPath: string, ref: string, options: CallOptions = {}): Promise<void> {
    const git = requireCapability(this.git, 'merge')
    await this.mutate(repoPath, options, (repo) => git.merge(repo, ref, options))
  }

  async rebase(repoPath: string, onto: string, options: CallOptions = {}): Promise<void> {
    const git = requireCapability(this.git, 'rebase')
    await this.mutate(repoPath, options, (repo) => git.rebase(repo, onto, options))
  }

  /**
   * Arbitrary git arguments may change anything, so this runs exclusively
   * and invalidates the cache.
   */
  async raw(repoPath: string, args: readonly string[], options: CallOptions = {}): Promise<ExecResult> {
    return this.mutate(repoPath, options, (repo) => this.git.runRaw(repo, args, options))
  }

  // ============================================================================
  // Introspection and maintenance
  // ============================================================================

  capabilities(): CapabilityReport {
    return { backend: this.git.name, operations: listCapabilities(this.git) }
  }

  /**
   * Drops cached metadata for one repository. The path does not need to be a
   * repository any more.
   */
  async clearCache(repoPath: string): Promise<void> {
    const cache = this.cache
    if (!cache) return
    const key = await fs.promises.realpath(repoPath).catch(() => path.resolve(repoPath))
    await this.locks.withWrite(key, () => cache.clear(key))
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private async mutate<T>(
    repoPath: string,
    options: CallOptions,
    operation: (repo: Repo) => Promise<T>
  ): Promise<T> {
    const repo = await this.git.open(repoPath, options)
    return this.locks.withWrite(repo.path, async () => {
      try {
        return await operation(repo)
      } finally {
        await this.invalidate(repo)
      }
    })
  }

  private async invalidate(repo: Repo): Promise<void> {
    if (!this.cache) return
    try {
      await this.cache.clear(repo.path)
    } catch (error) {
      if (!(error instanceof CacheError)) throw error
      this.logger.warn('Failed to invalidate cache', { path: repo.path, error })
    }
  }

  private async readThrough<T>(
    repo: Repo,
    key: string,
    slot: CacheSlot<T> | undefined,
    load: () => Promise<T>,
    refresh = false
  ): Promise<T> {
    if (!slot) return load()

    if (!refresh) {
      try {
        const cached = await slot.lookup()
        if (cached.found) {
          this.logger.debug('Cache hit', { path: repo.path, key })
          return cached.value
        }
      } catch (error) {
        if (!(error instanceof CacheError)) throw error
        this.logger.warn('Cache read failed, querying git', { path: repo.path, key, error })
      }
    }

    const value = await load()
    try {
      await slot.store(value)
    } catch (error) {
      if (!(error instanceof CacheError)) throw error
      this.logger.warn('Cache write failed', { path: repo.path, key, error })
    }
    return value
  }
}
