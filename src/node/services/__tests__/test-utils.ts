/**
 * Test utilities for the service layer.
 *
 * Provides a mock clock and a fixture that wires RepoService to a
 * FakeExecutor and a MetadataCache in temporary directories.
 */

import type { LogEntry } from '@shared/logger'
import { ExecGitAdapter } from '../../adapters/git/ExecGitAdapter'
import {
  createCapturingLogger,
  createTempDir,
  FakeExecutor,
  removeTempDir,
  stubOpen
} from '../../adapters/git/__tests__/test-utils'
import { MetadataCache } from '../MetadataCache'
import { RepoService } from '../RepoService'

/**
 * Clock the cache can be driven with.
 *
 * @example
 * ```typescript
 * const clock = createMockClock(1_000_000)
 * const cache = new MetadataCache({ root, now: clock.now })
 *
 * // Let a status entry expire
 * clock.advance(CACHE_TTL_MS.status + 1)
 * ```
 */
export interface MockClock {
  now(): number
  advance(ms: number): void
  set(timestamp: number): void
}

export function createMockClock(initialTime = Date.now()): MockClock {
  let time = initialTime
  return {
    now: () => time,
    advance: (ms: number) => {
      time += ms
    },
    set: (timestamp: number) => {
      time = timestamp
    }
  }
}

/**
 * Time constants for test readability.
 */
export const TIME = {
  SECOND: 1000,
  MINUTE: 60 * 1000,
  HOUR: 60 * 60 * 1000
} as const

export type ServiceFixture = {
  /** Existing directory that `open` accepts as a work tree. */
  repoPath: string
  cacheRoot: string
  executor: FakeExecutor
  cache: MetadataCache
  service: RepoService
  clock: MockClock
  logs: LogEntry[]
  cleanup: () => Promise<void>
}

export type ServiceFixtureOptions = {
  executor?: FakeExecutor
  /** Build the service without a cache. */
  withoutCache?: boolean
}

export async function createServiceFixture(options: ServiceFixtureOptions = {}): Promise<ServiceFixture> {
  const repoPath = await createTempDir('repokeeper-repo-')
  const cacheRoot = await createTempDir('repokeeper-cache-')
  const executor = stubOpen(options.executor ?? new FakeExecutor())
  const clock = createMockClock(1_000_000)
  const { logger, entries } = createCapturingLogger()

  const cache = new MetadataCache({ root: cacheRoot, now: clock.now, logger })
  const service = new RepoService({
    git: new ExecGitAdapter({ executor, logger }),
    cache: options.withoutCache ? undefined : cache,
    logger
  })

  return {
    repoPath,
    cacheRoot,
    executor,
    cache,
    service,
    clock,
    logs: entries,
    cleanup: async () => {
      await removeTempDir(repoPath)
      await removeTempDir(cacheRoot)
    }
  }
}
