/**
 * Exec Git Adapter
 *
 * Git adapter implementation that drives the git CLI through a
 * {@link GitExecutor}. Every operation builds an argument list, runs it,
 * and turns the exit code and output into typed results or typed errors.
 */

import type { Logger } from '@shared/logger'
import { silentLogger } from '@shared/logger'
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
import fs from 'fs'
import path from 'path'
import { classifyGitFailure, describeGitFailure } from '../../domain/GitFailureClassifier'
import { DEFAULT_LOG_MAX_COUNT } from '../../shared/constants'
import {
  GitError,
  GitProcessError,
  NotARepositoryError,
  NotFoundError,
  ValidationError
} from '../../shared/errors'
import type { CallOptions, GitAdapter } from './interface'
import {
  buildLogFormat,
  parseAheadBehind,
  parseBranches,
  parseLines,
  parseLog,
  parsePorcelainStatus,
  parseRemotes,
  parseWorktrees
} from './parsers'
import { hasShellMetacharacters, redactUrl, redactUrls } from './sanitize'
import type { GitExecutor } from './SecureExecutor'

export type ExecGitAdapterOptions = {
  executor: GitExecutor
  logger?: Logger
}

/**
 * Values placed by position in an argument list must survive the executor's
 * argument filter unchanged, or git would run a different command.
 */
function assertPlain(value: string, field: string): void {
  if (hasShellMetacharacters(value)) {
    throw new ValidationError(`${field} must not contain any of ; | & $ \``, field)
  }
}

/**
 * Refs, branch names, remote names and URLs: non-empty, plain, and never
 * readable as an option.
 */
function assertName(value: string | undefined, field: string): asserts value is string {
  if (value === undefined || value.trim() === '') {
    throw new ValidationError(`${field} must not be empty`, field)
  }
  if (value.startsWith('-')) {
    throw new ValidationError(`${field} must not start with "-": ${value}`, field)
  }
  assertPlain(value, field)
}

function assertOptionalName(value: string | undefined, field: string): void {
  if (value !== undefined) assertName(value, field)
}

function assertPath(value: string, field: string): void {
  if (value.trim() === '') {
    throw new ValidationError(`${field} must not be empty`, field)
  }
}

/** Operations whose classified failures are reported by cause, not by stderr. */
const CAUSE_REPORTED = new Set(['clone', 'fetch', 'pull', 'push'])

function describeFailure(result: ExecResult): string {
  return result.stderr.trim() || `exit code ${result.exitCode}`
}

export class ExecGitAdapter implements GitAdapter {
  readonly name = 'exec'

  private readonly executor: GitExecutor
  private readonly logger: Logger

  constructor(options: ExecGitAdapterOptions) {
    this.executor = options.executor
    this.logger = (options.logger ?? silentLogger).child('ExecGitAdapter')
  }

  // ============================================================================
  // Repository handles
  // ============================================================================

  async open(input: string, options: CallOptions = {}): Promise<Repo> {
    assertPath(input, 'path')
    const resolved = await this.realpathOrNotARepo(input)

    const result = await this.run(
      resolved,
      ['rev-parse', '--git-dir', '--is-bare-repository', '--is-inside-work-tree'],
      'open',
      options
    )
    if (result.exitCode !== 0) {
      throw new NotARepositoryError(input)
    }

    const [gitDir = '', isBare = '', isInsideWorkTree = ''] = result.stdout.split('\n').map((l) => l.trim())
    return {
      path: resolved,
      gitDir: path.resolve(resolved, gitDir),
      isBare: isBare === 'true',
      isWorktree: isInsideWorkTree === 'true'
    }
  }

  async init(input: string, options: CallOptions & { bare?: boolean } = {}): Promise<Repo> {
    assertPath(input, 'path')
    const target = path.resolve(input)
    assertPlain(target, 'path')
    const parent = path.dirname(target)
    await this.ensureDirectory(target, 'init')

    const args = ['init']
    if (options.bare) args.push('--bare')
    args.push(target)
    await this.runOk(parent, args, 'init', options)

    this.logger.info('Initialized repository', { path: target, bare: options.bare === true })
    return this.open(target, options)
  }

  async discover(input: string, options: CallOptions = {}): Promise<Repo> {
    assertPath(input, 'path')
    const resolved = await this.realpathOrNotARepo(input)

    const result = await this.run(resolved, ['rev-parse', '--show-toplevel'], 'discover', options)
    const topLevel = result.stdout.trim()
    if (result.exitCode === 0 && topLevel) {
      return this.open(topLevel, options)
    }
    // Bare repositories and .git directories have no top level.
    return this.open(resolved, options)
  }

  async clone(options: CloneOptions, call: CallOptions = {}): Promise<Repo> {
    assertName(options.url, 'url')
    assertPath(options.path, 'path')
    assertOptionalName(options.branch, 'branch')
    if (options.depth !== undefined && (!Number.isInteger(options.depth) || options.depth < 1)) {
      throw new ValidationError('depth must be a positive integer', 'depth')
    }

    const target = path.resolve(options.path)
    assertPlain(target, 'path')
    const parent = path.dirname(target)
    await this.ensureDirectory(parent, 'clone')

    const args = ['clone']
    if (options.branch) args.push('--branch', options.branch)
    if (options.depth !== undefined) args.push('--depth', String(options.depth))
    if (options.bare) args.push('--bare')
    if (options.mirror) args.push('--mirror')
    if (options.recursive) args.push('--recurse-submodules')
    if (options.progress) args.push('--progress')
    args.push('--', options.url, target)

    const safeUrl = redactUrl(options.url)
    this.logger.info('Cloning repository', { url: safeUrl, path: target })

    const result = await this.run(parent, args, 'clone', call)
    if (result.exitCode !== 0) {
      throw this.processError('clone', result, options.url)
    }

    return this.open(target, call)
  }

  // ============================================================================
  // Inspection
  // ============================================================================

  async getStatus(repo: Repo, options: CallOptions = {}): Promise<RepoStatus> {
    const [porcelain, currentBranch] = await Promise.all([
      this.runOk(repo.path, ['status', '--porcelain'], 'status', options),
      this.runOk(repo.path, ['branch', '--show-current'], 'status', options)
    ])

    const files = parsePorcelainStatus(porcelain)
    const branch = currentBranch.trim()
    const status: RepoStatus = {
      branch,
      upstream: '',
      ahead: 0,
      behind: 0,
      tracking: 'none',
      files,
      clean: files.length === 0
    }
    if (!branch) return status

    const upstream = await this.run(
      repo.path,
      ['rev-parse', '--abbrev-ref', '@{upstream}'],
      'status',
      options
    )
    if (upstream.exitCode !== 0) {
      status.tracking = upstreamMissing(upstream.stderr) ? 'none' : 'unknown'
      return status
    }
    status.upstream = upstream.stdout.trim()

    const counts = await this.run(
      repo.path,
      ['rev-list', '--count', '--left-right', 'HEAD...@{upstream}'],
      'status',
      options
    )
    const parsed = counts.exitCode === 0 ? parseAheadBehind(counts.stdout) : null
    if (!parsed) {
      status.tracking = 'unknown'
      return status
    }

    status.ahead = parsed.ahead
    status.behind = parsed.behind
    status.tracking = 'tracked'
    return status
  }

  async log(repo: Repo, options: LogOptions & CallOptions = {}): Promise<CommitInfo[]> {
    assertOptionalName(options.ref, 'ref')
    const maxCount = options.maxCount ?? DEFAULT_LOG_MAX_COUNT
    if (!Number.isInteger(maxCount) || maxCount < 1) {
      throw new ValidationError('maxCount must be a positive integer', 'maxCount')
    }

    const format = options.oneline ? '--pretty=format:%h %s' : buildLogFormat()
    const args = ['log', `--max-count=${maxCount}`, format]
    if (options.ref) args.push(options.ref)
    args.push('--')

    const result = await this.run(repo.path, args, 'log', options)
    if (result.exitCode !== 0) {
      if (!options.ref && /does not have any commits/i.test(result.stderr)) {
        return []
      }
      throw this.processError('log', result)
    }

    return parseLog(result.stdout, { oneline: options.oneline })
  }

  async diff(repo: Repo, options: DiffOptions & CallOptions = {}): Promise<string> {
    assertOptionalName(options.base, 'base')
    assertOptionalName(options.head, 'head')

    const args = ['diff', '--no-color', '--no-ext-diff']
    if (options.stat) args.push('--stat')
    if (options.base && options.head) {
      args.push(`${options.base}...${options.head}`)
    } else if (options.base || options.head) {
      args.push(options.base ?? options.head ?? '')
    }

    return this.runOk(repo.path, args, 'diff', options)
  }

  async listRemotes(repo: Repo, options: CallOptions = {}): Promise<RemoteInfo[]> {
    const output = await this.runOk(repo.path, ['remote', '-v'], 'listRemotes', options)
    return parseRemotes(output)
  }

  async listBranches(repo: Repo, options: BranchListOptions & CallOptions = {}): Promise<BranchInfo[]> {
    const args = ['branch', '--no-color', '-vv']
    if (options.all) args.push('-a')
    const output = await this.runOk(repo.path, args, 'listBranches', options)
    return parseBranches(output)
  }

  async getConfig(repo: Repo, key: string, options: CallOptions = {}): Promise<string | undefined> {
    assertName(key, 'key')
    const result = await this.run(repo.path, ['config', '--get', key], 'getConfig', options)
    // 1 means the key is not set
    if (result.exitCode === 1) return undefined
    if (result.exitCode !== 0) throw this.processError('getConfig', result)
    return result.stdout.replace(/\n$/, '')
  }

  // ============================================================================
  // Mutation
  // ============================================================================

  async setConfig(repo: Repo, key: string, value: string, options: CallOptions = {}): Promise<void> {
    assertName(key, 'key')
    assertPlain(value, 'value')
    await this.runOk(repo.path, ['config', key, value], 'setConfig', options)
  }

  async addRemote(repo: Repo, name: string, url: string, options: CallOptions = {}): Promise<void> {
    assertName(name, 'name')
    assertName(url, 'url')
    await this.runOk(repo.path, ['remote', 'add', name, url], 'addRemote', options)
    this.logger.info('Added remote', { name, url: redactUrl(url) })
  }

  async removeRemote(repo: Repo, name: string, options: CallOptions = {}): Promise<void> {
    assertName(name, 'name')
    await this.runOk(repo.path, ['remote', 'remove', name], 'removeRemote', options)
  }

  async setRemoteUrl(repo: Repo, name: string, url: string, options: CallOptions = {}): Promise<void> {
    assertName(name, 'name')
    assertName(url, 'url')
    await this.runOk(repo.path, ['remote', 'set-url', name, url], 'setRemoteUrl', options)
  }

  async createBranch(
    repo: Repo,
    name: string,
    options: CallOptions & { startPoint?: string } = {}
  ): Promise<void> {
    assertName(name, 'branch')
    assertOptionalName(options.startPoint, 'startPoint')
    const args = ['branch', name]
    if (options.startPoint) args.push(options.startPoint)
    await this.runOk(repo.path, args, 'createBranch', options)
  }

  async deleteBranch(repo: Repo, name: string, options: CallOptions & { force?: boolean } = {}): Promise<void> {
    assertName(name, 'branch')
    await this.runOk(repo.path, ['branch', options.force ? '-D' : '-d', name], 'deleteBranch', options)
  }

  async checkout(repo: Repo, ref: string, options: CallOptions & { create?: boolean } = {}): Promise<void> {
    assertName(ref, 'ref')
    const args = options.create ? ['checkout', '-b', ref] : ['checkout', ref]
    await this.runOk(repo.path, args, 'checkout', options)
  }

  // ============================================================================
  // Network
  // ============================================================================

  async fetch(repo: Repo, options: FetchOptions & CallOptions = {}): Promise<void> {
    assertOptionalName(options.remote, 'remote')
    const args = ['fetch']
    if (options.prune) args.push('--prune')
    if (options.tags) args.push('--tags')
    if (options.remote) args.push(options.remote)

    this.logger.info('Fetching', { path: repo.path, remote: options.remote ?? '(default)' })
    await this.runOk(repo.path, args, 'fetch', options)
  }

  async pull(repo: Repo, options: PullOptions & CallOptions = {}): Promise<void> {
    assertOptionalName(options.remote, 'remote')
    assertOptionalName(options.branch, 'branch')
    const args = ['pull']
    if (options.rebase) args.push('--rebase')
    if (options.remote || options.branch) args.push(options.remote ?? 'origin')
    if (options.branch) args.push(options.branch)

    this.logger.info('Pulling', { path: repo.path, remote: options.remote ?? '(default)' })
    await this.runOk(repo.path, args, 'pull', options)
  }

  async push(repo: Repo, options: PushOptions & CallOptions = {}): Promise<void> {
    assertOptionalName(options.remote, 'remote')
    assertOptionalName(options.branch, 'branch')
    const args = ['push']
    if (options.force) args.push('--force-with-lease')
    if (options.tags) args.push('--tags')
    if (options.setUpstream) args.push('--set-upstream')
    if (options.remote || options.branch) args.push(options.remote ?? 'origin')
    if (options.branch) args.push(options.branch)

    this.logger.info('Pushing', { path: repo.path, remote: options.remote ?? '(default)' })
    await this.runOk(repo.path, args, 'push', options)
  }

  // ============================================================================
  // Escape hatch
  // ============================================================================

  async runRaw(repo: Repo, args: readonly string[], options: CallOptions = {}): Promise<ExecResult> {
    if (args.length === 0) {
      throw new ValidationError('args must not be empty', 'args')
    }
    return this.run(repo.path, args, 'raw', options)
  }

  // ============================================================================
  // Extended operations
  // ============================================================================

  async revParse(repo: Repo, ref: string, options: CallOptions = {}): Promise<string> {
    assertName(ref, 'ref')
    const result = await this.run(repo.path, ['rev-parse', '--verify', `${ref}^{commit}`], 'revParse', options)
    if (result.exitCode !== 0) {
      throw new NotFoundError(`unknown revision: ${ref}`, 'commit')
    }
    return result.stdout.trim()
  }

  async show(repo: Repo, ref: string, options: CallOptions = {}): Promise<string> {
    assertName(ref, 'ref')
    return this.runOk(repo.path, ['show', '--no-color', '--no-ext-diff', ref], 'show', options)
  }

  async tag(repo: Repo, name: string, options: TagOptions & CallOptions = {}): Promise<void> {
    assertName(name, 'tag')
    assertOptionalName(options.ref, 'ref')
    const args = ['tag']
    if (options.message !== undefined) args.push('-a', '-m', options.message)
    args.push(name)
    if (options.ref) args.push(options.ref)
    await this.runOk(repo.path, args, 'tag', options)
  }

  async deleteTag(repo: Repo, name: string, options: CallOptions = {}): Promise<void> {
    assertName(name, 'tag')
    await this.runOk(repo.path, ['tag', '-d', name], 'deleteTag', options)
  }

  async stashList(repo: Repo, options: CallOptions = {}): Promise<string[]> {
    const output = await this.runOk(repo.path, ['stash', 'list'], 'stashList', options)
    return parseLines(output)
  }

  async listWorktrees(repo: Repo, options: CallOptions = {}): Promise<WorktreeInfo[]> {
    const output = await this.runOk(repo.path, ['worktree', 'list', '--porcelain'], 'listWorktrees', options)
    return parseWorktrees(output)
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private run(cwd: string, args: readonly string[], operation: string, options: CallOptions): Promise<ExecResult> {
    return this.executor.run(cwd, args, { signal: options.signal, operation })
  }

  /**
   * Runs git and returns stdout, or throws GitProcessError on a non-zero exit.
   */
  private async runOk(
    cwd: string,
    args: readonly string[],
    operation: string,
    options: CallOptions
  ): Promise<string> {
    const result = await this.run(cwd, args, operation, options)
    if (result.exitCode !== 0) {
      throw this.processError(operation, result)
    }
    return result.stdout
  }

  /**
   * Network operations lead with the classified cause; stderr stays on the
   * error either way. Any URL in the message is masked.
   */
  private processError(operation: string, result: ExecResult, url?: string): GitProcessError {
    const reason = classifyGitFailure(result.stderr)
    this.logger.debug('git exited non-zero', { operation, exitCode: result.exitCode, reason })
    const cause = (CAUSE_REPORTED.has(operation) ? describeGitFailure(reason, url) : null) ?? describeFailure(result)
    const subject = url === undefined ? `git ${operation}` : `git ${operation} of ${url}`
    return new GitProcessError(
      redactUrls(`${subject} failed: ${cause}`),
      operation,
      result.exitCode,
      result.stderr,
      reason
    )
  }

  private async realpathOrNotARepo(input: string): Promise<string> {
    try {
      return await fs.promises.realpath(path.resolve(input))
    } catch (error) {
      this.logger.debug('Path does not resolve', { path: input, error: String(error) })
      throw new NotARepositoryError(input)
    }
  }

  private async ensureDirectory(dir: string, operation: string): Promise<void> {
    try {
      await fs.promises.mkdir(dir, { recursive: true })
    } catch (error) {
      throw new GitError(`cannot create directory ${dir}`, operation, error)
    }
  }
}

function upstreamMissing(stderr: string): boolean {
  return /no upstream/i.test(stderr)
}
