/**
 * Git command execution on top of a GitRunner.
 *
 * WHY: Every call site needs the same sequence: log the command line, run
 * it, log the exit code, translate failure. Keeping that in one place means
 * the repository handle and the raw helpers behave identically.
 */

import type { OutputMode } from '@gitcmd/core'

import { type GitExecResult, type GitRunner, NodeGitRunner, formatCommand } from './runner.js'
import { checkResult } from './translate.js'

/**
 * Receives one line per event: the command line before spawning, the exit
 * code after.
 */
export type GitLogger = (message: string) => void

/**
 * Options for git command execution.
 */
export interface GitExecOptions {
  /** Working directory for the command (defaults to cwd) */
  cwd?: string | undefined
  /** Environment variables to pass to the process */
  env?: Record<string, string> | undefined
  /** Timeout in milliseconds (default: none) */
  timeout?: number | undefined
  /** If true, don't throw on non-zero exit code */
  ignoreExitCode?: boolean | undefined
  /** Capture output ('pipe', default) or pass it through ('inherit') */
  output?: OutputMode | undefined
  /** Runner to use (default: a NodeGitRunner for "git") */
  runner?: GitRunner | undefined
  logger?: GitLogger | undefined
}

const defaultRunner = new NodeGitRunner()

/**
 * Execute a git command safely using argv array (no shell).
 *
 * @param args - Array of arguments to pass to git (not including 'git' itself)
 * @returns Result containing exitCode, stdout, and stderr
 * @throws GitCommandError if the command fails (unless ignoreExitCode is true)
 *
 * @example
 * ```typescript
 * // List tags
 * const result = await gitExec(['tag', '-l', 'v*'], { cwd: repoPath })
 *
 * // Clone a repository
 * await gitExec(['clone', '-q', url, destPath], { cwd: '/tmp' })
 * ```
 */
export async function gitExec(args: string[], options: GitExecOptions = {}): Promise<GitExecResult> {
  const { env, timeout, output, logger, ignoreExitCode = false } = options
  const runner = options.runner ?? defaultRunner
  const cwd = options.cwd ?? process.cwd()

  logger?.(`[git] ${formatCommand(runner.binary, args)} (${cwd})`)
  const result = await runner.run({ cwd, args, env, output, timeout })
  logger?.(`[git] exit ${result.exitCode}`)

  if (ignoreExitCode) {
    return result
  }
  return checkResult(args, result, runner.binary)
}

/**
 * Execute a git command and return stdout, trimming trailing whitespace.
 *
 * @throws GitCommandError if the command fails
 */
export async function gitExecStdout(args: string[], options: GitExecOptions = {}): Promise<string> {
  const result = await gitExec(args, options)
  return result.stdout.trim()
}

/**
 * Execute a git command and return stdout lines as an array.
 * Empty lines are filtered out.
 *
 * @throws GitCommandError if the command fails
 */
export async function gitExecLines(args: string[], options: GitExecOptions = {}): Promise<string[]> {
  const stdout = await gitExecStdout(args, options)
  if (!stdout) {
    return []
  }
  return splitLines(stdout)
}

/**
 * Split output into non-empty lines.
 */
export function splitLines(stdout: string): string[] {
  return stdout.split('\n').filter((line) => line.length > 0)
}
