/**
 * GitUrlParser - Pure functions for clone sources.
 *
 * No I/O; used by the CLI to pick a destination and by the HTTP API to reject
 * obviously bad input before anything is spawned.
 */

const URL_SCHEMES = /^(https?|ssh|git|file):\/\//i
const SCP_LIKE = /^[\w.-]+@[\w.-]+:.+/

/**
 * Final path segment of a clone source, without `.git` or trailing slashes.
 *
 * - https://example.com/team/project.git -> project
 * - git@example.com:team/project -> project
 * - /srv/git/project.git/ -> project
 */
export function extractRepoName(url: string): string | null {
  const stripped = url.trim().replace(/\/+$/, '').replace(/\.git$/, '')
  if (!stripped) return null

  const separator = Math.max(stripped.lastIndexOf('/'), stripped.lastIndexOf(':'))
  if (separator === -1) return null

  const name = stripped.slice(separator + 1)
  return name || null
}

/**
 * Accepts URL-style sources (`https://`, `ssh://`, `git://`, `file://`),
 * scp-style `user@host:path`, and absolute local paths.
 *
 * Anything starting with `-` is rejected so it can never be read as an option.
 */
export function isValidGitUrl(url: string): boolean {
  const trimmed = url.trim()
  if (!trimmed || trimmed.startsWith('-')) return false

  if (URL_SCHEMES.test(trimmed)) {
    return trimmed.replace(URL_SCHEMES, '').length > 0
  }
  return SCP_LIKE.test(trimmed) || trimmed.startsWith('/')
}
