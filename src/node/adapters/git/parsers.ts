/**
 * Parsers for git's machine-readable output.
 *
 * Pure string-in, records-out functions. They never spawn anything, so the
 * operation layer can be tested against canned output.
 */

import type {
  BranchInfo,
  CommitInfo,
  FileStatus,
  RemoteInfo,
  WorktreeInfo
} from '@shared/types/repo'
import { ParseError } from '../../shared/errors'

// ============================================================================
// Log format
// ============================================================================

/** Unit separator: never appears in names, emails or one-line subjects. */
export const LOG_FIELD_DELIMITER = '\x1f'
/** Record separator, emitted after every commit so bodies may span lines. */
export const LOG_RECORD_TERMINATOR = '\x1e'

const LOG_FIELDS = ['%H', '%h', '%an', '%ae', '%ai', '%s', '%b'] as const
const MIN_LOG_FIELDS = 6

/**
 * `--pretty=format:` value matching {@link parseLog}.
 */
export function buildLogFormat(delimiter: string = LOG_FIELD_DELIMITER): string {
  return `--pretty=format:${LOG_FIELDS.join(delimiter)}${LOG_RECORD_TERMINATOR}`
}

export type ParseLogOptions = {
  delimiter?: string
  /** Input is `<shortHash> <subject>` per line. */
  oneline?: boolean
}

const GIT_DATE = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2}) ([+-])(\d{2})(\d{2})$/

/**
 * Converts git's `%ai` format (`2025-01-01 10:00:00 +0000`) to ISO-8601 UTC.
 */
export function parseGitDate(text: string): string | null {
  const match = GIT_DATE.exec(text.trim())
  if (!match) return null
  const [, day, time, sign, hours, minutes] = match
  const ms = Date.parse(`${day}T${time}${sign}${hours}:${minutes}`)
  return Number.isNaN(ms) ? null : new Date(ms).toISOString()
}

/**
 * Parses delimited commit records.
 *
 * Records are split on {@link LOG_RECORD_TERMINATOR} when present, otherwise
 * one per line. Records with too few fields are skipped; if the output had
 * content but nothing parsed, the format is wrong and a ParseError is raised.
 */
export function parseLog(output: string, options: ParseLogOptions = {}): CommitInfo[] {
  if (options.oneline) return parseOnelineLog(output)

  const delimiter = options.delimiter ?? LOG_FIELD_DELIMITER
  const records = output.includes(LOG_RECORD_TERMINATOR)
    ? output.split(LOG_RECORD_TERMINATOR)
    : output.split('\n')

  const commits: CommitInfo[] = []
  for (const raw of records) {
    const record = raw.replace(/^\n+/, '')
    if (!record.trim()) continue

    const fields = record.split(delimiter)
    if (fields.length < MIN_LOG_FIELDS) continue

    const [hash = '', shortHash = '', author = '', email = '', date = '', subject = ''] = fields
    commits.push({
      hash,
      shortHash,
      author,
      email,
      date: parseGitDate(date),
      subject,
      body: fields.slice(MIN_LOG_FIELDS).join(delimiter).trim()
    })
  }

  if (commits.length === 0 && output.trim()) {
    throw new ParseError('unrecognized log output', 'log')
  }
  return commits
}

function parseOnelineLog(output: string): CommitInfo[] {
  const commits: CommitInfo[] = []
  for (const line of output.split('\n')) {
    const trimmed = line.trim()
    if (!trimmed) continue
    const space = trimmed.indexOf(' ')
    const shortHash = space === -1 ? trimmed : trimmed.slice(0, space)
    commits.push({
      hash: shortHash,
      shortHash,
      author: '',
      email: '',
      date: null,
      subject: space === -1 ? '' : trimmed.slice(space + 1),
      body: ''
    })
  }
  return commits
}

// ============================================================================
// Status
// ============================================================================

const C_ESCAPES: Record<string, number> = {
  a: 7,
  b: 8,
  t: 9,
  n: 10,
  v: 11,
  f: 12,
  r: 13,
  '"': 34,
  '\\': 92
}

function findClosingQuote(text: string): number {
  for (let i = 1; i < text.length; i++) {
    if (text[i] === '\\') {
      i++
    } else if (text[i] === '"') {
      return i
    }
  }
  return -1
}

/**
 * Undoes git's C-style path quoting (`"caf\303\251.txt"` -> `café.txt`).
 * Unquoted input is returned unchanged.
 */
export function unquotePath(text: string): string {
  if (text.length < 2 || !text.startsWith('"') || findClosingQuote(text) !== text.length - 1) {
    return text
  }

  const chunks: Buffer[] = []
  let plain = ''
  const flush = (): void => {
    if (plain) chunks.push(Buffer.from(plain, 'utf8'))
    plain = ''
  }

  for (let i = 1; i < text.length - 1; i++) {
    const ch = text[i] ?? ''
    if (ch !== '\\') {
      plain += ch
      continue
    }
    flush()
    const octal = /^[0-7]{3}/.exec(text.slice(i + 1, i + 4))
    if (octal) {
      chunks.push(Buffer.from([parseInt(octal[0], 8)]))
      i += 3
      continue
    }
    const next = text[i + 1] ?? ''
    const code = C_ESCAPES[next]
    chunks.push(code === undefined ? Buffer.from(next, 'utf8') : Buffer.from([code]))
    i++
  }
  flush()

  return Buffer.concat(chunks).toString('utf8')
}

function splitRename(rest: string): [string, string] | null {
  if (rest.startsWith('"')) {
    const end = findClosingQuote(rest)
    if (end === -1) return null
    const after = rest.slice(end + 1)
    return after.startsWith(' -> ') ? [rest.slice(0, end + 1), after.slice(4)] : null
  }
  const arrow = rest.indexOf(' -> ')
  return arrow === -1 ? null : [rest.slice(0, arrow), rest.slice(arrow + 4)]
}

function isChangeMarker(ch: string): boolean {
  return ch !== ' ' && ch !== '?' && ch !== '!'
}

/**
 * Parses `git status --porcelain` (v1).
 *
 * `staged` reflects the index column, `modified` the work-tree column.
 * Untracked (`??`) and ignored (`!!`) entries are neither.
 */
export function parsePorcelainStatus(output: string): FileStatus[] {
  const files: FileStatus[] = []

  for (const line of output.split('\n')) {
    if (line.length < 4) continue

    const status = line.slice(0, 2)
    const rest = line.slice(3)
    const index = status[0] ?? ' '
    const worktree = status[1] ?? ' '

    const entry: FileStatus = {
      path: unquotePath(rest),
      status,
      staged: isChangeMarker(index),
      modified: isChangeMarker(worktree)
    }

    if ('RC'.includes(index) || 'RC'.includes(worktree)) {
      const pair = splitRename(rest)
      if (pair) {
        entry.originalPath = unquotePath(pair[0])
        entry.path = unquotePath(pair[1])
      }
    }

    files.push(entry)
  }

  return files
}

/**
 * Parses `rev-list --count --left-right <branch>...<upstream>` output.
 */
export function parseAheadBehind(output: string): { ahead: number; behind: number } | null {
  const match = /^(\d+)\s+(\d+)$/.exec(output.trim())
  if (!match) return null
  return { ahead: Number(match[1]), behind: Number(match[2]) }
}

// ============================================================================
// Remotes
// ============================================================================

const REMOTE_LINE = /^(\S+)\s+(.+?)\s+\((fetch|push)\)$/

/**
 * Parses `git remote -v`, merging the fetch and push lines of each remote.
 * Remotes come back in the order git listed them.
 */
export function parseRemotes(output: string): RemoteInfo[] {
  const remotes = new Map<string, RemoteInfo>()
  let sawContent = false

  for (const line of output.split('\n')) {
    const trimmed = line.trim()
    if (!trimmed) continue
    sawContent = true

    const match = REMOTE_LINE.exec(trimmed)
    if (!match) continue
    const [, name = '', url = '', kind] = match

    const remote = remotes.get(name) ?? { name, fetchUrl: '', pushUrl: '' }
    if (kind === 'fetch') {
      remote.fetchUrl = url
    } else {
      remote.pushUrl = url
    }
    remotes.set(name, remote)
  }

  if (sawContent && remotes.size === 0) {
    throw new ParseError('unrecognized remote output', 'listRemotes')
  }
  return [...remotes.values()]
}

// ============================================================================
// Branches
// ============================================================================

const REMOTE_BRANCH_PREFIX = 'remotes/'
const BRANCH_LINE = /^(\S+)\s+(\S+)(?:\s+(.*))?$/
const TRACKING = /^\[([^\]\s:]+)(?::\s*([^\]]*))?\]\s*(.*)$/

function parseTrackingCounts(text: string): { ahead: number; behind: number } {
  const ahead = /ahead (\d+)/.exec(text)
  const behind = /behind (\d+)/.exec(text)
  return {
    ahead: ahead ? Number(ahead[1]) : 0,
    behind: behind ? Number(behind[1]) : 0
  }
}

/**
 * Parses `git branch -vv [-a]`.
 *
 * The first column marks the current branch (`*`) or a branch checked out in
 * another worktree (`+`). Remote-tracking branches appear as
 * `remotes/<remote>/<name>`. Symbolic `HEAD -> ...` lines and detached-HEAD
 * entries are not branches and are skipped.
 */
export function parseBranches(output: string): BranchInfo[] {
  const branches: BranchInfo[] = []

  for (const line of output.split('\n')) {
    if (line.trim().length === 0) continue

    const current = line[0] === '*'
    const rest = line.slice(2).trimStart()
    if (rest.startsWith('(')) continue

    const match = BRANCH_LINE.exec(rest)
    if (!match) continue
    const [, rawName = '', sha = '', tail = ''] = match
    if (sha === '->') continue

    const branch: BranchInfo = {
      name: rawName,
      current,
      ahead: 0,
      behind: 0,
      sha,
      subject: tail.trim()
    }

    if (rawName.startsWith(REMOTE_BRANCH_PREFIX)) {
      const qualified = rawName.slice(REMOTE_BRANCH_PREFIX.length)
      const slash = qualified.indexOf('/')
      if (slash > 0) {
        branch.remote = qualified.slice(0, slash)
        branch.name = qualified.slice(slash + 1)
      }
    } else {
      const tracking = TRACKING.exec(tail.trim())
      if (tracking) {
        const [, upstream = '', counts = '', subject = ''] = tracking
        branch.upstream = upstream
        Object.assign(branch, parseTrackingCounts(counts))
        branch.subject = subject
      }
    }

    branches.push(branch)
  }

  return branches
}

// ============================================================================
// Worktrees
// ============================================================================

/**
 * Parses `git worktree list --porcelain`.
 */
export function parseWorktrees(output: string): WorktreeInfo[] {
  const worktrees: WorktreeInfo[] = []

  for (const block of output.trim().split('\n\n')) {
    if (!block.trim()) continue

    const worktree: WorktreeInfo = {
      path: '',
      headSha: '',
      branch: null,
      isBare: false,
      isPrunable: false
    }

    for (const line of block.split('\n')) {
      if (line.startsWith('worktree ')) {
        worktree.path = line.slice('worktree '.length)
      } else if (line.startsWith('HEAD ')) {
        worktree.headSha = line.slice('HEAD '.length)
      } else if (line.startsWith('branch ')) {
        worktree.branch = line.slice('branch '.length).replace(/^refs\/heads\//, '')
      } else if (line === 'bare') {
        worktree.isBare = true
      } else if (line === 'prunable' || line.startsWith('prunable ')) {
        worktree.isPrunable = true
      }
    }

    if (worktree.path) worktrees.push(worktree)
  }

  return worktrees
}

/**
 * Splits line-oriented output (stash list, tag list) into non-empty lines.
 */
export function parseLines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0)
}
