/**
 * Node-specific constants for the backend.
 */

/**
 * Default deadline for a single git invocation when the caller supplies none.
 */
export const DEFAULT_GIT_TIMEOUT_MS = 2 * 60 * 1000

/**
 * Canonical git install locations. The child process sees only these on PATH.
 */
export const SECURE_SEARCH_PATH = ['/usr/bin', '/usr/local/bin', '/opt/homebrew/bin', '/bin'] as const

/**
 * Time-to-live per cached entity. Status changes most often and drives what
 * the user sees, so it expires first.
 */
export const CACHE_TTL_MS = {
  status: 30 * 1000,
  branches: 5 * 60 * 1000,
  remotes: 10 * 60 * 1000,
  commits: 2 * 60 * 1000
} as const

/**
 * Entry count used by `log` when the caller does not pass one.
 */
export const DEFAULT_LOG_MAX_COUNT = 10

/**
 * Per-route deadlines for the HTTP API.
 */
export const REQUEST_TIMEOUT_MS = {
  query: 30 * 1000,
  clone: 5 * 60 * 1000,
  sync: 2 * 60 * 1000
} as const
