/**
 * Turns a finished git process into success or a typed error.
 *
 * WHY: Callers branch on failure shape (a lock to retry, credentials to
 * supply, a rejected push to reconcile). git reports these only in prose on
 * stderr, so a few stable phrases select a narrower error class. The text
 * itself is always passed through unchanged.
 */

import {
  AuthenticationError,
  GitCommandError,
  type GitFailure,
  NotARepositoryError,
  PushRejectedError,
  RepositoryLockedError,
} from '@gitcmd/core'

import { type GitExecResult, formatCommand } from './runner.js'

const NOT_A_REPOSITORY = /not a git repository/i

const LOCKED = [/index\.lock/i, /unable to create '[^']*\.lock'/i, /another git process seems to be running/i]

const AUTHENTICATION = [
  /authentication failed/i,
  /could not read username/i,
  /could not read password/i,
  /invalid username or password/i,
  /permission denied \(publickey/i,
]

const REJECTED = [/\[rejected\]/, /\[remote rejected\]/, /failed to push some refs/i, /non-fast-forward/i]

/**
 * Find the subcommand in an argument vector, skipping leading global
 * options such as `-C <path>` and `-c <key=value>`.
 */
export function subcommandOf(args: readonly string[]): string {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? ''
    if (arg === '-C' || arg === '-c') {
      i++
      continue
    }
    if (!arg.startsWith('-')) {
      return arg
    }
  }
  return args[0] ?? ''
}

/**
 * Pick the error class for a failed invocation.
 */
export function classifyFailure(failure: GitFailure): GitCommandError {
  const text = failure.stderr || failure.stdout
  if (NOT_A_REPOSITORY.test(text)) {
    return new NotARepositoryError(failure)
  }
  if (LOCKED.some((pattern) => pattern.test(text))) {
    return new RepositoryLockedError(failure)
  }
  if (AUTHENTICATION.some((pattern) => pattern.test(text))) {
    return new AuthenticationError(failure)
  }
  if (REJECTED.some((pattern) => pattern.test(text))) {
    return new PushRejectedError(failure)
  }
  return new GitCommandError(failure)
}

/**
 * Return the result when git exited 0, otherwise throw the matching error.
 *
 * @throws GitCommandError (or a subclass) on a non-zero exit code
 */
export function checkResult(args: readonly string[], result: GitExecResult, binary = 'git'): GitExecResult {
  if (result.exitCode === 0) {
    return result
  }
  throw classifyFailure({
    subcommand: subcommandOf(args),
    command: formatCommand(binary, args),
    exitCode: result.exitCode,
    stderr: result.stderr,
    stdout: result.stdout,
  })
}
