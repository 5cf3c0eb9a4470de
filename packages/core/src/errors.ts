/**
 * Typed error classes for gitcmd
 *
 * Error hierarchy:
 * - GitcmdError (base)
 *   - ConfigError (configuration issues)
 *     - ConfigParseError (TOML parse failures)
 *     - ConfigValidationError (schema validation failures)
 *   - GitNotFoundError (git binary missing or not executable)
 *   - GitSpawnError (child process could not be started)
 *   - GitTimeoutError (configured timeout exceeded)
 *   - PathNotFoundError (bound path missing)
 *   - OptionsError (command options cannot be rendered)
 *   - GitCommandError (git exited non-zero)
 *     - NotARepositoryError
 *     - RepositoryLockedError
 *     - AuthenticationError
 *     - PushRejectedError
 *   - OutputParseError (unexpected output from a structured command)
 *     - StatusParseError
 *
 * Every error carries a `kind` so callers can branch without instanceof chains.
 */

import type { ValidationError } from './schemas/index.js'

/** Broad category of a gitcmd error */
export type GitcmdErrorKind =
  | 'config'
  | 'environment'
  | 'precondition'
  | 'construction'
  | 'execution'
  | 'parse'

/** Base error class for all gitcmd errors */
export class GitcmdError extends Error {
  readonly code: string
  readonly kind: GitcmdErrorKind

  constructor(message: string, code: string, kind: GitcmdErrorKind) {
    super(message)
    this.name = 'GitcmdError'
    this.code = code
    this.kind = kind
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor)
  }
}

// ============================================================================
// Configuration errors
// ============================================================================

/** Base class for configuration-related errors */
export class ConfigError extends GitcmdError {
  readonly source: string

  constructor(message: string, code: string, source: string) {
    super(message, code, 'config')
    this.name = 'ConfigError'
    this.source = source
  }
}

/** Error thrown when TOML parsing fails */
export class ConfigParseError extends ConfigError {
  constructor(message: string, source: string) {
    super(message, 'CONFIG_PARSE_ERROR', source)
    this.name = 'ConfigParseError'
  }
}

/** Error thrown when schema validation fails */
export class ConfigValidationError extends ConfigError {
  readonly validationErrors: ValidationError[]

  constructor(message: string, source: string, validationErrors: ValidationError[]) {
    const details = validationErrors.map((e) => `  ${e.path}: ${e.message}`).join('\n')
    super(`${message}:\n${details}`, 'CONFIG_VALIDATION_ERROR', source)
    this.name = 'ConfigValidationError'
    this.validationErrors = validationErrors
  }
}

// ============================================================================
// Environment errors
// ============================================================================

/** Error thrown when the git binary cannot be found or executed */
export class GitNotFoundError extends GitcmdError {
  readonly binary: string

  constructor(binary: string, reason?: string) {
    const suffix = reason ? `: ${reason}` : ''
    super(`git executable not found or not runnable (${binary})${suffix}`, 'GIT_NOT_FOUND', 'environment')
    this.name = 'GitNotFoundError'
    this.binary = binary
  }
}

/** Error thrown when the git process fails to start for another reason */
export class GitSpawnError extends GitcmdError {
  readonly command: string

  constructor(command: string, reason: string) {
    super(`Failed to start ${command}: ${reason}`, 'GIT_SPAWN_ERROR', 'environment')
    this.name = 'GitSpawnError'
    this.command = command
  }
}

/** Error thrown when a configured timeout kills the git process */
export class GitTimeoutError extends GitcmdError {
  readonly command: string
  readonly timeout: number

  constructor(command: string, timeout: number) {
    super(`Timeout exceeded (${timeout}ms): ${command}`, 'GIT_TIMEOUT', 'environment')
    this.name = 'GitTimeoutError'
    this.command = command
    this.timeout = timeout
  }
}

// ============================================================================
// Precondition errors
// ============================================================================

/** Error thrown when a repository path does not exist or is not a directory */
export class PathNotFoundError extends GitcmdError {
  readonly path: string

  constructor(path: string) {
    super(`Repository path not found: ${path}`, 'PATH_NOT_FOUND', 'precondition')
    this.name = 'PathNotFoundError'
    this.path = path
  }
}

// ============================================================================
// Construction errors
// ============================================================================

/** Error thrown when command options cannot be rendered to arguments */
export class OptionsError extends GitcmdError {
  readonly subcommand: string
  readonly field: string

  constructor(subcommand: string, field: string, reason: string) {
    super(`Invalid options for git ${subcommand}: ${field} ${reason}`, 'OPTIONS_ERROR', 'construction')
    this.name = 'OptionsError'
    this.subcommand = subcommand
    this.field = field
  }
}

// ============================================================================
// Execution errors
// ============================================================================

/** Captured outcome of a failed git invocation */
export interface GitFailure {
  /** Subcommand name, e.g. "push" */
  subcommand: string
  /** Full command line as run */
  command: string
  exitCode: number
  stderr: string
  stdout: string
}

/** Error thrown when git exits with a non-zero code */
export class GitCommandError extends GitcmdError {
  readonly subcommand: string
  readonly command: string
  readonly exitCode: number
  readonly stderr: string
  readonly stdout: string

  constructor(failure: GitFailure, code = 'GIT_COMMAND_ERROR', kind: GitcmdErrorKind = 'execution') {
    const detail = failure.stderr || failure.stdout
    super(
      `Git command failed (exit ${failure.exitCode}): ${failure.command}${detail ? `\n${detail}` : ''}`,
      code,
      kind
    )
    this.name = 'GitCommandError'
    this.subcommand = failure.subcommand
    this.command = failure.command
    this.exitCode = failure.exitCode
    this.stderr = failure.stderr
    this.stdout = failure.stdout
  }
}

/** git refused to run because the directory is not inside a repository */
export class NotARepositoryError extends GitCommandError {
  constructor(failure: GitFailure) {
    super(failure, 'NOT_A_REPOSITORY', 'precondition')
    this.name = 'NotARepositoryError'
  }
}

/** Another git process holds a lock on the repository */
export class RepositoryLockedError extends GitCommandError {
  constructor(failure: GitFailure) {
    super(failure, 'REPOSITORY_LOCKED')
    this.name = 'RepositoryLockedError'
  }
}

/** The remote rejected the credentials, or none could be read */
export class AuthenticationError extends GitCommandError {
  constructor(failure: GitFailure) {
    super(failure, 'AUTHENTICATION_FAILED')
    this.name = 'AuthenticationError'
  }
}

/** The remote rejected pushed refs */
export class PushRejectedError extends GitCommandError {
  constructor(failure: GitFailure) {
    super(failure, 'PUSH_REJECTED')
    this.name = 'PushRejectedError'
  }
}

// ============================================================================
// Parse errors
// ============================================================================

/** Error thrown when output of a structured command does not match its format */
export class OutputParseError extends GitcmdError {
  readonly subcommand: string
  readonly record: string

  constructor(subcommand: string, message: string, record: string, code = 'OUTPUT_PARSE_ERROR') {
    super(`${message}: "${record}"`, code, 'parse')
    this.name = 'OutputParseError'
    this.subcommand = subcommand
    this.record = record
  }
}

/** Error thrown when `git status` output does not match porcelain v2 */
export class StatusParseError extends OutputParseError {
  constructor(message: string, record: string) {
    super('status', message, record, 'STATUS_PARSE_ERROR')
    this.name = 'StatusParseError'
  }
}

// ============================================================================
// Type guards
// ============================================================================

export function isGitcmdError(error: unknown): error is GitcmdError {
  return error instanceof GitcmdError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isGitCommandError(error: unknown): error is GitCommandError {
  return error instanceof GitCommandError
}

export function isOptionsError(error: unknown): error is OptionsError {
  return error instanceof OptionsError
}

export function isPreconditionError(error: unknown): error is GitcmdError {
  return error instanceof GitcmdError && error.kind === 'precondition'
}
