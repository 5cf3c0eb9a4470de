/**
 * Process runner: spawns the git binary with an argv array.
 *
 * WHY: Shell interpolation can lead to command injection. Arguments are
 * handed to the child process as-is, never through a shell. The runner sits
 * behind a narrow interface so the repository handle can be driven by a
 * scripted fake in tests.
 */

import { spawn } from 'node:child_process'
import { statSync } from 'node:fs'

import {
  type GitcmdError,
  GitNotFoundError,
  GitSpawnError,
  GitTimeoutError,
  type OutputMode,
  PathNotFoundError,
} from '@gitcmd/core'

/**
 * Result of a git command execution.
 */
export interface GitExecResult {
  /** Exit code from the git process (-1 when killed by a signal) */
  exitCode: number
  /** Standard output from the command */
  stdout: string
  /** Standard error from the command */
  stderr: string
}

/**
 * A single process invocation.
 */
export interface GitRunRequest {
  /** Working directory of the child */
  cwd: string
  /** Arguments after the binary name */
  args: string[]
  /** Variables added to the inherited environment */
  env?: Record<string, string> | undefined
  /** 'inherit' streams output to the parent; captured strings are then empty */
  output?: OutputMode | undefined
  /** Kill the child after this many milliseconds */
  timeout?: number | undefined
}

/**
 * Anything that can run git and report how it exited.
 */
export interface GitRunner {
  /** Binary name used in command lines and error messages */
  readonly binary: string
  run(request: GitRunRequest): Promise<GitExecResult>
}

/**
 * Render a command line for logs and errors.
 * Arguments containing whitespace or quotes are double-quoted.
 */
export function formatCommand(binary: string, args: readonly string[]): string {
  return [binary, ...args]
    .map((arg) => (arg === '' || /[\s"']/.test(arg) ? JSON.stringify(arg) : arg))
    .join(' ')
}

/**
 * Runner backed by node:child_process.
 *
 * @example
 * ```typescript
 * const runner = new NodeGitRunner('/usr/local/bin/git')
 * const result = await runner.run({ cwd: '/path/to/repo', args: ['status'] })
 * ```
 */
export class NodeGitRunner implements GitRunner {
  readonly binary: string

  constructor(binary = 'git') {
    this.binary = binary
  }

  run(request: GitRunRequest): Promise<GitExecResult> {
    const { cwd, args, env, output = 'pipe', timeout } = request
    const command = formatCommand(this.binary, args)
    const stdio = output === 'inherit' ? 'inherit' : 'pipe'

    return new Promise<GitExecResult>((resolve, reject) => {
      let settled = false
      let stdout = ''
      let stderr = ''

      const child = spawn(this.binary, args, {
        cwd,
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0', ...env },
        stdio: ['ignore', stdio, stdio],
      })

      child.stdout?.setEncoding('utf8')
      child.stderr?.setEncoding('utf8')
      child.stdout?.on('data', (chunk: string) => {
        stdout += chunk
      })
      child.stderr?.on('data', (chunk: string) => {
        stderr += chunk
      })

      const finish = (fn: () => void): void => {
        if (settled) return
        settled = true
        if (timer) clearTimeout(timer)
        fn()
      }

      // Reject as soon as the timeout fires: grandchildren (ssh, remote
      // helpers) may hold the pipes open after git itself is killed
      const timer =
        timeout === undefined
          ? undefined
          : setTimeout(() => {
              child.kill('SIGKILL')
              finish(() => reject(new GitTimeoutError(command, timeout)))
            }, timeout)

      child.on('error', (error: NodeJS.ErrnoException) => {
        finish(() => reject(this.spawnError(error, cwd, command)))
      })

      child.on('close', (code) => {
        finish(() => {
          resolve({ exitCode: code ?? -1, stdout, stderr })
        })
      })
    })
  }

  /**
   * Map a spawn failure. Node reports a missing cwd as ENOENT too, so the
   * directory is checked before blaming the binary.
   */
  private spawnError(error: NodeJS.ErrnoException, cwd: string, command: string): GitcmdError {
    if (error.code === 'ENOENT' && !statSync(cwd, { throwIfNoEntry: false })?.isDirectory()) {
      return new PathNotFoundError(cwd)
    }
    if (error.code === 'ENOENT' || error.code === 'EACCES') {
      return new GitNotFoundError(this.binary, error.message)
    }
    return new GitSpawnError(command, error.message)
  }
}
