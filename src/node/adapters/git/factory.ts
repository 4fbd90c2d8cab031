/**
 * Git Adapter Factory
 *
 * Wires an executor and an adapter together from configuration. There is no
 * shared instance: each consumer (CLI run, HTTP server) builds its own.
 */

import type { Logger } from '@shared/logger'
import { silentLogger } from '@shared/logger'
import { ExecGitAdapter } from './ExecGitAdapter'
import type { GitAdapter } from './interface'
import { type GitExecutor, SecureExecutor } from './SecureExecutor'

/**
 * Supported Git adapter types
 */
export type GitAdapterType = 'exec'

/**
 * Configuration for adapter creation
 */
export interface GitAdapterConfig {
  type?: GitAdapterType
  /** git executable; resolved against `searchPath` */
  binary?: string
  timeoutMs?: number
  searchPath?: readonly string[]
  logger?: Logger
  /**
   * Pre-built executor. When set, `binary`, `timeoutMs` and `searchPath`
   * are ignored.
   */
  executor?: GitExecutor
}

export function createGitAdapter(config: GitAdapterConfig = {}): GitAdapter {
  const logger = config.logger ?? silentLogger
  const executor =
    config.executor ??
    new SecureExecutor({
      binary: config.binary,
      timeoutMs: config.timeoutMs,
      searchPath: config.searchPath,
      logger: logger.child('SecureExecutor')
    })

  const adapter = new ExecGitAdapter({ executor, logger })
  logger.debug('Created git adapter', { type: config.type ?? 'exec', name: adapter.name })
  return adapter
}
