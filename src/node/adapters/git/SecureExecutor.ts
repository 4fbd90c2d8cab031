/**
 * Secure Executor
 *
 * Runs the git binary for a repository path with:
 * - sanitized arguments (no shell, metacharacter tokens dropped)
 * - a minimal environment (no prompts, fixed locale, canonical PATH)
 * - a bounded duration (caller's AbortSignal, or a default timeout)
 * - credential-masked stderr
 *
 * A non-zero exit is returned as data. Only failures to run git at all
 * (missing binary, timeout, cancellation, pipe errors) reject.
 */

import type { Logger } from '@shared/logger'
import { silentLogger } from '@shared/logger'
import type { ExecResult } from '@shared/types/repo'
import { spawn, type ChildProcess } from 'child_process'
import path from 'path'
import { GitTransportError, type TransportFailureKind } from '../../shared/errors'
import { DEFAULT_GIT_TIMEOUT_MS, SECURE_SEARCH_PATH } from '../../shared/constants'
import { buildSecureEnv, redactUrls, sanitizeArgs, sanitizeOutput } from './sanitize'

export type ExecOptions = {
  /**
   * External deadline or cancellation. When present it replaces the default
   * timeout entirely.
   */
  signal?: AbortSignal
  /** Overrides the executor's default timeout for this call (ignored when `signal` is set). */
  timeoutMs?: number
  /** Logical operation name used in logs and errors. */
  operation?: string
}

/**
 * Anything that can run git for the operation layer. Tests substitute an
 * in-memory implementation.
 */
export interface GitExecutor {
  run(repoPath: string, args: readonly string[], options?: ExecOptions): Promise<ExecResult>
}

export type SecureExecutorOptions = {
  /** Executable to run, `git` unless configured otherwise. */
  binary?: string
  timeoutMs?: number
  searchPath?: readonly string[]
  logger?: Logger
}

function isTimeoutReason(reason: unknown): boolean {
  return (
    typeof reason === 'object' &&
    reason !== null &&
    'name' in reason &&
    reason.name === 'TimeoutError'
  )
}

export class SecureExecutor implements GitExecutor {
  private readonly binary: string
  private readonly timeoutMs: number
  private readonly env: NodeJS.ProcessEnv
  private readonly logger: Logger

  constructor(options: SecureExecutorOptions = {}) {
    this.binary = options.binary ?? 'git'
    this.timeoutMs = options.timeoutMs ?? DEFAULT_GIT_TIMEOUT_MS
    this.env = buildSecureEnv(options.searchPath ?? SECURE_SEARCH_PATH, path.delimiter)
    this.logger = options.logger ?? silentLogger
  }

  async run(repoPath: string, args: readonly string[], options: ExecOptions = {}): Promise<ExecResult> {
    const operation = options.operation ?? args[0] ?? 'git'
    const signal = options.signal ?? AbortSignal.timeout(options.timeoutMs ?? this.timeoutMs)

    if (signal.aborted) {
      throw this.abortError(operation, signal)
    }

    const { args: safeArgs, dropped } = sanitizeArgs(args)
    if (dropped.length > 0) {
      this.logger.warn('Dropped unsafe git arguments', { operation, positions: dropped })
    }

    const start = Date.now()
    const result = await this.spawnAndCollect(repoPath, safeArgs, signal, operation)
    const durationMs = Date.now() - start

    this.logger.debug('git finished', {
      operation,
      args: safeArgs.map(redactUrls).join(' '),
      exitCode: result.exitCode,
      durationMs
    })

    return { ...result, durationMs }
  }

  private spawnAndCollect(
    repoPath: string,
    args: string[],
    signal: AbortSignal,
    operation: string
  ): Promise<Omit<ExecResult, 'durationMs'>> {
    return new Promise((resolve, reject) => {
      let settled = false
      const fail = (error: GitTransportError): void => {
        if (settled) return
        settled = true
        reject(error)
      }

      let child: ChildProcess
      try {
        child = spawn(this.binary, ['-C', repoPath, ...args], {
          env: this.env,
          signal,
          stdio: ['ignore', 'pipe', 'pipe'],
          windowsHide: true
        })
      } catch (error) {
        fail(this.transportError(operation, 'spawn', `failed to start ${this.binary}`, error))
        return
      }

      const stdout: Buffer[] = []
      const stderr: Buffer[] = []

      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk))
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk))
      child.stdout?.on('error', (error) =>
        fail(this.transportError(operation, 'io', 'failed reading git stdout', error))
      )
      child.stderr?.on('error', (error) =>
        fail(this.transportError(operation, 'io', 'failed reading git stderr', error))
      )

      child.on('error', (error) => {
        if (signal.aborted) {
          fail(this.abortError(operation, signal))
          return
        }
        const code = 'code' in error ? error.code : undefined
        if (code === 'ENOENT') {
          fail(this.transportError(operation, 'spawn', `git executable not found: ${this.binary}`, error))
          return
        }
        fail(this.transportError(operation, 'io', `failed to run git: ${error.message}`, error))
      })

      child.on('close', (exitCode, killSignal) => {
        if (settled) return
        if (signal.aborted) {
          fail(this.abortError(operation, signal))
          return
        }
        if (exitCode === null) {
          fail(this.transportError(operation, 'io', `git terminated by signal ${killSignal ?? 'unknown'}`))
          return
        }
        settled = true
        resolve({
          exitCode,
          stdout: Buffer.concat(stdout).toString('utf8'),
          stderr: sanitizeOutput(Buffer.concat(stderr).toString('utf8'))
        })
      })
    })
  }

  private abortError(operation: string, signal: AbortSignal): GitTransportError {
    if (isTimeoutReason(signal.reason)) {
      return this.transportError(operation, 'timeout', `git ${operation} timed out`, signal.reason)
    }
    return this.transportError(operation, 'cancelled', `git ${operation} was cancelled`, signal.reason)
  }

  private transportError(
    operation: string,
    kind: TransportFailureKind,
    message: string,
    cause?: unknown
  ): GitTransportError {
    this.logger.error('git transport failure', { operation, kind, message })
    return new GitTransportError(message, operation, kind, cause)
  }
}
