/**
 * Custom error classes for the backend.
 * Provides typed errors for different failure scenarios.
 */

import { redactUrls } from '../adapters/git/sanitize'

/**
 * Base error class for all application errors.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'AppError'
  }
}

/**
 * Error thrown when caller input is missing or malformed. Raised before any
 * process is spawned.
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * Error thrown when a required resource is not found.
 */
export class NotFoundError extends AppError {
  constructor(
    message: string,
    public readonly resourceType: 'branch' | 'commit' | 'file' | 'repo'
  ) {
    super(message)
    this.name = 'NotFoundError'
  }
}

/**
 * The path does not resolve to a repository. Terminal; retrying will not help.
 */
export class NotARepositoryError extends NotFoundError {
  constructor(public readonly path: string) {
    super(`not a git repository: ${path}`, 'repo')
    this.name = 'NotARepositoryError'
  }
}

/**
 * Error thrown when a git operation fails.
 */
export class GitError extends AppError {
  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'GitError'
  }
}

/**
 * Known causes a failed git invocation can be narrowed to.
 */
export type GitFailureReason =
  | 'conflict'
  | 'non-fast-forward'
  | 'auth'
  | 'already-exists'
  | 'not-fully-merged'
  | 'local-changes'
  | 'not-found'
  | 'unknown'

/**
 * git ran and exited non-zero.
 */
export class GitProcessError extends GitError {
  constructor(
    message: string,
    operation: string,
    public readonly exitCode: number,
    /** Sanitized stderr of the failed invocation. */
    public readonly stderr: string,
    public readonly reason: GitFailureReason = 'unknown'
  ) {
    super(message, operation)
    this.name = 'GitProcessError'
  }
}

export type TransportFailureKind = 'spawn' | 'timeout' | 'cancelled' | 'io'

/**
 * git could not be run to completion: missing binary, deadline exceeded,
 * cancelled by the caller, or a pipe failure. Always fatal to the call.
 */
export class GitTransportError extends GitError {
  constructor(
    message: string,
    operation: string,
    public readonly kind: TransportFailureKind,
    cause?: unknown
  ) {
    super(message, operation, cause)
    this.name = 'GitTransportError'
  }
}

/**
 * Output did not have the shape the parser expects.
 */
export class ParseError extends AppError {
  constructor(
    message: string,
    public readonly operation: string
  ) {
    super(message)
    this.name = 'ParseError'
  }
}

/**
 * Reading or writing the metadata cache failed. Never used for a plain miss.
 */
export class CacheError extends AppError {
  constructor(
    message: string,
    public readonly operation: 'read' | 'write' | 'delete' | 'clear',
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'CacheError'
  }
}

/**
 * The active backend does not provide the requested operation.
 */
export class UnsupportedOperationError extends AppError {
  constructor(
    public readonly operation: string,
    public readonly backend: string
  ) {
    super(`operation "${operation}" is not supported by the ${backend} backend`)
    this.name = 'UnsupportedOperationError'
  }
}

/**
 * Message safe to show to a user: credentials masked, no stack.
 */
export function toPublicMessage(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error)
  return redactUrls(message)
}
