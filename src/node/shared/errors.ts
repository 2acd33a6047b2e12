/**
 * Custom error classes for the backend.
 * Provides typed errors for different failure scenarios.
 */

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
 * Error thrown when the configuration file or alias table is malformed.
 * Fatal at startup.
 */
export class ConfigError extends AppError {
  constructor(
    message: string,
    public readonly field?: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'ConfigError'
  }
}

/**
 * Error thrown when a git command exits unsuccessfully.
 */
export class GitCommandError extends AppError {
  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'GitCommandError'
  }
}

/**
 * Error thrown when a git command runs past its timeout.
 * Handled exactly like a command failure.
 */
export class BackendTimeoutError extends GitCommandError {
  constructor(
    operation: string,
    public readonly timeoutMs: number,
    cause?: unknown
  ) {
    super(`Git '${operation}' timed out after ${timeoutMs}ms`, operation, cause)
    this.name = 'BackendTimeoutError'
  }
}

/**
 * Error thrown when the backend reports a commit whose hash, author or
 * timestamp cannot be parsed.
 */
export class MalformedCommitRecordError extends AppError {
  constructor(
    message: string,
    public readonly record: string
  ) {
    super(message)
    this.name = 'MalformedCommitRecordError'
  }
}

/**
 * Error thrown when collapsing a group fails.
 * By the time it is thrown the branch has been restored, unless phase is 'rollback'.
 */
export class RewriteError extends AppError {
  constructor(
    message: string,
    public readonly phase: 'validation' | 'execution' | 'rollback',
    public readonly branch: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'RewriteError'
  }
}

/**
 * Error thrown when the repository session cannot be opened or is used after release.
 */
export class SessionError extends AppError {
  constructor(
    message: string,
    public readonly repoPath: string
  ) {
    super(message)
    this.name = 'SessionError'
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
