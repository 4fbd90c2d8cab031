/**
 * GitFailureClassifier - maps stderr of a failed git invocation to a reason
 * callers can branch on, and to a message a user can act on.
 *
 * Pure functions; no I/O.
 */

import type { GitFailureReason } from '../shared/errors'

const REASON_MARKERS: ReadonlyArray<[GitFailureReason, readonly string[]]> = [
  ['conflict', ['merge conflict', 'conflict (', 'automatic merge failed']],
  ['non-fast-forward', ['non-fast-forward', '[rejected]', 'fetch first']],
  [
    'auth',
    [
      'authentication failed',
      'permission denied',
      'could not read username',
      'authentication required',
      'host key verification failed'
    ]
  ],
  ['already-exists', ['already exists']],
  ['not-fully-merged', ['not fully merged']],
  ['local-changes', ['would be overwritten', 'please commit your changes or stash them']],
  ['not-found', ['repository not found', 'does not appear to be a git repository', 'not found']]
]

/**
 * First matching reason wins; order above is significant.
 */
export function classifyGitFailure(stderr: string): GitFailureReason {
  const lower = stderr.toLowerCase()
  for (const [reason, markers] of REASON_MARKERS) {
    if (markers.some((marker) => lower.includes(marker))) {
      return reason
    }
  }
  return 'unknown'
}

/**
 * Short human-readable hint for a reason, or null when the raw stderr is
 * the best we have.
 */
export function describeGitFailure(reason: GitFailureReason, url?: string): string | null {
  switch (reason) {
    case 'auth':
      if (url === undefined) return 'Authentication failed. Check your credentials for this remote.'
      return url.startsWith('https://')
        ? 'Authentication failed. For private repositories use an SSH URL or configure git credentials.'
        : 'Authentication failed. Check that your SSH key is loaded and authorised for this host.'
    case 'not-found':
      return 'Repository not found. Check the URL, or your access if it is private.'
    case 'non-fast-forward':
      return 'The remote has commits you do not have. Pull first, or push with force.'
    case 'conflict':
      return 'The operation stopped on conflicts. Resolve them and continue.'
    case 'local-changes':
      return 'Local changes would be overwritten. Commit or stash them first.'
    case 'not-fully-merged':
      return 'The branch is not fully merged. Delete it with force to discard it.'
    case 'already-exists':
      return 'The target already exists.'
    case 'unknown':
      return null
  }
}
