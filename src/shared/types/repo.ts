/**
 * Repository data model shared by the core, the HTTP API and the CLI.
 *
 * Every type here is plain JSON so it can round-trip through the metadata
 * cache and over the wire without conversion.
 */

export type Repo = {
  /** Absolute, symlink-resolved path of the repository (work tree root, or the bare dir). */
  path: string
  /** Absolute path of the metadata directory (usually `<path>/.git`). */
  gitDir: string
  isBare: boolean
  /** True when `path` lies inside a working tree. */
  isWorktree: boolean
}

/**
 * Outcome of a single git invocation. A non-zero exit code is data, not an error.
 */
export type ExecResult = {
  exitCode: number
  stdout: string
  /** Captured stderr with credentials masked. */
  stderr: string
  durationMs: number
}

export type FileStatus = {
  path: string
  /** Two-character porcelain code, e.g. ` M`, `A `, `??`. */
  status: string
  staged: boolean
  modified: boolean
  /** Source path for renames and copies. */
  originalPath?: string
}

/**
 * How much we know about the current branch's upstream.
 *
 * - `none`: no branch, or no upstream configured
 * - `unknown`: an upstream is (probably) configured but the query for it failed
 * - `tracked`: `ahead`/`behind` are real counts
 */
export type TrackingState = 'none' | 'unknown' | 'tracked'

export type RepoStatus = {
  /** Empty when HEAD is detached. */
  branch: string
  /** Upstream ref such as `origin/main`, empty when there is none. */
  upstream: string
  ahead: number
  behind: number
  tracking: TrackingState
  files: FileStatus[]
  /** True iff `files` is empty. */
  clean: boolean
}

export type BranchInfo = {
  name: string
  current: boolean
  /** Owning remote for remote-tracking branches. */
  remote?: string
  upstream?: string
  ahead: number
  behind: number
  sha: string
  subject: string
}

export type RemoteInfo = {
  name: string
  fetchUrl: string
  pushUrl: string
}

export type CommitInfo = {
  hash: string
  shortHash: string
  author: string
  email: string
  /** ISO-8601 timestamp, or null when git printed something we could not read. */
  date: string | null
  subject: string
  body: string
}

export type WorktreeInfo = {
  path: string
  headSha: string
  /** Branch name without `refs/heads/`, or null when detached. */
  branch: string | null
  isBare: boolean
  isPrunable: boolean
}

// ============================================================================
// Operation options
// ============================================================================

export type CloneOptions = {
  url: string
  path: string
  branch?: string
  depth?: number
  bare?: boolean
  mirror?: boolean
  recursive?: boolean
  progress?: boolean
}

export type LogOptions = {
  /** Starting ref, defaults to HEAD. */
  ref?: string
  maxCount?: number
  /** Only hash and subject are filled in. */
  oneline?: boolean
}

export type DiffOptions = {
  base?: string
  head?: string
  /** Summary (`--stat`) instead of the full patch. */
  stat?: boolean
}

export type BranchListOptions = {
  /** Include remote-tracking branches. */
  all?: boolean
}

export type FetchOptions = {
  remote?: string
  prune?: boolean
  tags?: boolean
}

export type PullOptions = {
  remote?: string
  branch?: string
  rebase?: boolean
}

export type PushOptions = {
  remote?: string
  branch?: string
  /** Uses `--force-with-lease`, never a bare `--force`. */
  force?: boolean
  tags?: boolean
  setUpstream?: boolean
}

export type TagOptions = {
  ref?: string
  /** Creates an annotated tag when set. */
  message?: string
}
