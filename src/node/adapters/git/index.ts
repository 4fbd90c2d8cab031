/**
 * Git Adapter Module
 *
 * Usage:
 * ```typescript
 * import { createGitAdapter } from '../adapters/git'
 *
 * const git = createGitAdapter({ logger })
 * const repo = await git.open('/srv/checkouts/project')
 * const status = await git.getStatus(repo)
 * ```
 */

export { createGitAdapter } from './factory'
export type { GitAdapterConfig, GitAdapterType } from './factory'

export {
  EXTENDED_OPERATIONS,
  hasCapability,
  listCapabilities,
  requireCapability,
  supportsMerge,
  supportsRebase,
  supportsWorktrees
} from './interface'
export type { CallOptions, ExtendedOperation, GitAdapter, WithCapability } from './interface'

export { ExecGitAdapter } from './ExecGitAdapter'
export { SecureExecutor } from './SecureExecutor'
export type { ExecOptions, GitExecutor, SecureExecutorOptions } from './SecureExecutor'

export { redactUrl, redactUrls, sanitizeArgs, sanitizeOutput } from './sanitize'
