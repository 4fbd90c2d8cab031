/**
 * MetadataCache - file-backed TTL cache of repository metadata.
 *
 * Layout: `<root>/<sha256(repoPath)>/<key>.json`, one partition per
 * repository. Each file holds `{ payload, timestamp, ttl }` in milliseconds.
 * Writes go to a temp file first and are renamed into place, so readers see
 * either the old entry or the new one. Each partition has its own
 * readers/writer lock: lookups share it, while writes, expiry purges,
 * deletes and clears hold it exclusively.
 *
 * A miss (absent or expired) is `{ found: false }`. Only I/O and decode
 * failures throw, always as CacheError.
 */

import type { Logger } from '@shared/logger'
import { silentLogger } from '@shared/logger'
import type { BranchInfo, CommitInfo, RemoteInfo, RepoStatus } from '@shared/types/repo'
import crypto from 'crypto'
import fs from 'fs'
import path from 'path'
import type { z } from 'zod'
import { CACHE_TTL_MS } from '../shared/constants'
import { CacheError, ValidationError } from '../shared/errors'
import { KeyedRwLock } from '../utils/rw-lock'
import {
  branchListSchema,
  cacheEnvelopeSchema,
  commitListSchema,
  remoteListSchema,
  repoStatusSchema,
  type CacheEnvelope
} from './cache-schemas'

const CACHE_KEY = /^[A-Za-z0-9][A-Za-z0-9._-]*$/
const FILE_MODE = 0o600
const DIR_MODE = 0o700

export type CacheLookup<T> = { found: false } | { found: true; value: T }

export type MetadataCacheOptions = {
  root: string
  /** Clock in epoch milliseconds. */
  now?: () => number
  logger?: Logger
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

function assertKey(key: string): void {
  if (!CACHE_KEY.test(key)) {
    throw new ValidationError(`invalid cache key: ${JSON.stringify(key)}`, 'key')
  }
}

export class MetadataCache {
  readonly root: string
  private readonly now: () => number
  private readonly logger: Logger
  private readonly locks = new KeyedRwLock()

  constructor(options: MetadataCacheOptions) {
    this.root = path.resolve(options.root)
    this.now = options.now ?? Date.now
    this.logger = (options.logger ?? silentLogger).child('MetadataCache')
  }

  /**
   * Partition directory for a repository. Same path in, same directory out.
   */
  partitionFor(repoPath: string): string {
    const digest = crypto.createHash('sha256').update(path.resolve(repoPath)).digest('hex')
    return path.join(this.root, digest)
  }

  async set<T>(repoPath: string, key: string, payload: T, ttlMs: number): Promise<void> {
    assertKey(key)
    if (!Number.isFinite(ttlMs) || ttlMs < 0) {
      throw new ValidationError('ttl must be a non-negative number of milliseconds', 'ttl')
    }

    const dir = this.partitionFor(repoPath)
    const file = path.join(dir, `${key}.json`)
    const temp = `${file}.${process.pid}.${crypto.randomUUID()}.tmp`
    const envelope: CacheEnvelope = { payload, timestamp: this.now(), ttl: ttlMs }

    await this.locks.withWrite(dir, async () => {
      try {
        await fs.promises.mkdir(dir, { recursive: true, mode: DIR_MODE })
        await fs.promises.writeFile(temp, JSON.stringify(envelope), { mode: FILE_MODE })
        await fs.promises.rename(temp, file)
      } catch (error) {
        await fs.promises.rm(temp, { force: true })
        throw new CacheError(`failed to write cache entry ${key}`, 'write', error)
      }
    })
    this.logger.debug('Cached', { key, repoPath, ttlMs })
  }

  async get<T>(repoPath: string, key: string, schema: z.ZodType<T>): Promise<CacheLookup<T>> {
    assertKey(key)
    const dir = this.partitionFor(repoPath)
    const file = path.join(dir, `${key}.json`)

    const envelope = await this.locks.withRead(dir, () => this.readEnvelope(file, key))
    if (!envelope) return { found: false }

    if (this.isExpired(envelope)) {
      this.logger.debug('Expired', { key, repoPath })
      await this.locks.withWrite(dir, () => this.purgeIfExpired(file, key))
      return { found: false }
    }

    const payload = schema.safeParse(envelope.payload)
    if (!payload.success) {
      throw new CacheError(`cache entry ${key} has an unexpected shape`, 'read', payload.error)
    }
    return { found: true, value: payload.data }
  }

  async delete(repoPath: string, key: string): Promise<void> {
    assertKey(key)
    const dir = this.partitionFor(repoPath)
    await this.locks.withWrite(dir, () => this.removeFile(path.join(dir, `${key}.json`), key))
  }

  /**
   * Drops every entry for one repository.
   */
  async clear(repoPath: string): Promise<void> {
    const dir = this.partitionFor(repoPath)
    await this.locks.withWrite(dir, async () => {
      try {
        await fs.promises.rm(dir, { recursive: true, force: true })
      } catch (error) {
        throw new CacheError('failed to clear cache partition', 'clear', error)
      }
    })
    this.logger.debug('Cleared partition', { repoPath })
  }

  // ============================================================================
  // Typed helpers
  // ============================================================================

  cacheStatus(repoPath: string, status: RepoStatus): Promise<void> {
    return this.set(repoPath, 'status', status, CACHE_TTL_MS.status)
  }

  getCachedStatus(repoPath: string): Promise<CacheLookup<RepoStatus>> {
    return this.get(repoPath, 'status', repoStatusSchema)
  }

  cacheBranches(repoPath: string, branches: BranchInfo[], key = 'branches'): Promise<void> {
    return this.set(repoPath, key, branches, CACHE_TTL_MS.branches)
  }

  getCachedBranches(repoPath: string, key = 'branches'): Promise<CacheLookup<BranchInfo[]>> {
    return this.get(repoPath, key, branchListSchema)
  }

  cacheRemotes(repoPath: string, remotes: RemoteInfo[]): Promise<void> {
    return this.set(repoPath, 'remotes', remotes, CACHE_TTL_MS.remotes)
  }

  getCachedRemotes(repoPath: string): Promise<CacheLookup<RemoteInfo[]>> {
    return this.get(repoPath, 'remotes', remoteListSchema)
  }

  cacheCommits(repoPath: string, commits: CommitInfo[], key = 'commits'): Promise<void> {
    return this.set(repoPath, key, commits, CACHE_TTL_MS.commits)
  }

  getCachedCommits(repoPath: string, key = 'commits'): Promise<CacheLookup<CommitInfo[]>> {
    return this.get(repoPath, key, commitListSchema)
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private isExpired(envelope: CacheEnvelope): boolean {
    return this.now() - envelope.timestamp > envelope.ttl
  }

  private async readEnvelope(file: string, key: string): Promise<CacheEnvelope | null> {
    let raw: string
    try {
      raw = await fs.promises.readFile(file, 'utf-8')
    } catch (error) {
      if (isMissing(error)) return null
      throw new CacheError(`failed to read cache entry ${key}`, 'read', error)
    }
    return this.decode(raw, key)
  }

  /**
   * Another caller may have stored a fresh entry since the expired one was
   * read; only an entry that is still expired is removed.
   */
  private async purgeIfExpired(file: string, key: string): Promise<void> {
    const current = await this.readEnvelope(file, key)
    if (current && this.isExpired(current)) {
      await this.removeFile(file, key)
    }
  }

  private decode(raw: string, key: string): CacheEnvelope {
    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (error) {
      throw new CacheError(`cache entry ${key} is not valid JSON`, 'read', error)
    }
    const envelope = cacheEnvelopeSchema.safeParse(parsed)
    if (!envelope.success) {
      throw new CacheError(`cache entry ${key} is malformed`, 'read', envelope.error)
    }
    return envelope.data
  }

  private async removeFile(file: string, key: string): Promise<void> {
    try {
      await fs.promises.unlink(file)
    } catch (error) {
      if (isMissing(error)) return
      throw new CacheError(`failed to delete cache entry ${key}`, 'delete', error)
    }
  }
}
