/**
 * Git Adapter Interface
 *
 * The operation layer: typed repository operations built on top of a
 * {@link GitExecutor}. Core operations are required members; extended ones are
 * optional so a backend can omit them, and callers probe with the
 * `supportsX` guards or {@link requireCapability}.
 */

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
  RepoStatus,
  TagOptions,
  WorktreeInfo
} from '@shared/types/repo'
import { UnsupportedOperationError } from '../../shared/errors'
import type { ExecOptions } from './SecureExecutor'

/**
 * Per-call settings. `signal` bounds every git invocation the call makes.
 */
export type CallOptions = Pick<ExecOptions, 'signal'>

/**
 * Main Git adapter interface
 *
 * Failures surface as errors from `src/node/shared/errors`:
 * ValidationError before anything runs, GitProcessError for a non-zero exit,
 * GitTransportError when git could not be run, ParseError for unexpected output.
 */
export interface GitAdapter {
  /**
   * Backend name for logs and capability reports
   */
  readonly name: string

  // ============================================================================
  // Repository handles
  // ============================================================================

  /**
   * Resolves `path` to a repository handle.
   *
   * @throws NotARepositoryError when the path does not exist or is not in a repository
   */
  open(path: string, options?: CallOptions): Promise<Repo>

  /**
   * Creates a repository at `path` (parents included) and opens it.
   */
  init(path: string, options?: CallOptions & { bare?: boolean }): Promise<Repo>

  /**
   * Opens the repository containing `path`, walking up to its top level.
   */
  discover(path: string, options?: CallOptions): Promise<Repo>

  /**
   * Clones `options.url` into `options.path` and opens the result.
   */
  clone(options: CloneOptions, call?: CallOptions): Promise<Repo>

  // ============================================================================
  // Inspection
  // ============================================================================

  getStatus(repo: Repo, options?: CallOptions): Promise<RepoStatus>

  log(repo: Repo, options?: LogOptions & CallOptions): Promise<CommitInfo[]>

  /**
   * Raw diff text (patch, or summary when `stat` is set).
   */
  diff(repo: Repo, options?: DiffOptions & CallOptions): Promise<string>

  listRemotes(repo: Repo, options?: CallOptions): Promise<RemoteInfo[]>

  listBranches(repo: Repo, options?: BranchListOptions & CallOptions): Promise<BranchInfo[]>

  /**
   * Value of a config key, or undefined when it is not set.
   */
  getConfig(repo: Repo, key: string, options?: CallOptions): Promise<string | undefined>

  // ============================================================================
  // Mutation
  // ============================================================================

  setConfig(repo: Repo, key: string, value: string, options?: CallOptions): Promise<void>

  addRemote(repo: Repo, name: string, url: string, options?: CallOptions): Promise<void>

  removeRemote(repo: Repo, name: string, options?: CallOptions): Promise<void>

  setRemoteUrl(repo: Repo, name: string, url: string, options?: CallOptions): Promise<void>

  createBranch(repo: Repo, name: string, options?: CallOptions & { startPoint?: string }): Promise<void>

  /**
   * @param options.force - delete even when not merged (`-D`)
   */
  deleteBranch(repo: Repo, name: string, options?: CallOptions & { force?: boolean }): Promise<void>

  /**
   * @param options.create - create the branch first (`-b`)
   */
  checkout(repo: Repo, ref: string, options?: CallOptions & { create?: boolean }): Promise<void>

  // ============================================================================
  // Network
  // ============================================================================

  fetch(repo: Repo, options?: FetchOptions & CallOptions): Promise<void>

  pull(repo: Repo, options?: PullOptions & CallOptions): Promise<void>

  push(repo: Repo, options?: PushOptions & CallOptions): Promise<void>

  // ============================================================================
  // Escape hatch
  // ============================================================================

  /**
   * Runs arbitrary (sanitized) git arguments and returns the result verbatim.
   * A non-zero exit is not an error here.
   */
  runRaw(repo: Repo, args: readonly string[], options?: CallOptions): Promise<ExecResult>

  // ============================================================================
  // Extended operations (optional)
  // ============================================================================

  /**
   * Resolves a ref to a full commit SHA.
   */
  revParse?(repo: Repo, ref: string, options?: CallOptions): Promise<string>

  /**
   * Output of `git show` for a ref.
   */
  show?(repo: Repo, ref: string, options?: CallOptions): Promise<string>

  tag?(repo: Repo, name: string, options?: TagOptions & CallOptions): Promise<void>

  deleteTag?(repo: Repo, name: string, options?: CallOptions): Promise<void>

  /**
   * Stash entries, newest first, as git prints them.
   */
  stashList?(repo: Repo, options?: CallOptions): Promise<string[]>

  listWorktrees?(repo: Repo, options?: CallOptions): Promise<WorktreeInfo[]>

  merge?(repo: Repo, ref: string, options?: CallOptions): Promise<void>

  rebase?(repo: Repo, onto: string, options?: CallOptions): Promise<void>

  cherryPick?(repo: Repo, commits: string[], options?: CallOptions): Promise<void>

  revert?(repo: Repo, commit: string, options?: CallOptions): Promise<void>

  blame?(repo: Repo, file: string, options?: CallOptions): Promise<string>
}

/**
 * Names of the optional members of {@link GitAdapter}.
 */
export const EXTENDED_OPERATIONS = [
  'revParse',
  'show',
  'tag',
  'deleteTag',
  'stashList',
  'listWorktrees',
  'merge',
  'rebase',
  'cherryPick',
  'revert',
  'blame'
] as const satisfies ReadonlyArray<keyof GitAdapter>

export type ExtendedOperation = (typeof EXTENDED_OPERATIONS)[number]

/**
 * An adapter narrowed to one that implements `operation`.
 */
export type WithCapability<K extends ExtendedOperation> = GitAdapter & Required<Pick<GitAdapter, K>>

export function hasCapability<K extends ExtendedOperation>(
  adapter: GitAdapter,
  operation: K
): adapter is WithCapability<K> {
  return typeof adapter[operation] === 'function'
}

/**
 * Narrows the adapter, or throws UnsupportedOperationError naming the
 * operation and the backend.
 */
export function requireCapability<K extends ExtendedOperation>(
  adapter: GitAdapter,
  operation: K
): WithCapability<K> {
  if (!hasCapability(adapter, operation)) {
    throw new UnsupportedOperationError(operation, adapter.name)
  }
  return adapter
}

/**
 * Every extended operation with whether the adapter provides it.
 */
export function listCapabilities(adapter: GitAdapter): Record<string, boolean> {
  return Object.fromEntries(
    EXTENDED_OPERATIONS.map((operation) => [operation, hasCapability(adapter, operation)])
  )
}

/**
 * Type guard to check if an adapter supports listing worktrees
 */
export function supportsWorktrees(adapter: GitAdapter): adapter is WithCapability<'listWorktrees'> {
  return hasCapability(adapter, 'listWorktrees')
}

/**
 * Type guard to check if an adapter supports merge
 */
export function supportsMerge(adapter: GitAdapter): adapter is WithCapability<'merge'> {
  return hasCapability(adapter, 'merge')
}

/**
 * Type guard to check if an adapter supports rebase
 */
export function supportsRebase(adapter: GitAdapter): adapter is WithCapability<'rebase'> {
  return hasCapability(adapter, 'rebase')
}
