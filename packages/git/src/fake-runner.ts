/**
 * Scripted runner for tests.
 *
 * WHY: Code built on the repository handle should be testable without a
 * git binary. The fake records every request and replays queued results,
 * so tests can assert the exact argument vectors a call produced.
 */

import type { GitExecResult, GitRunRequest, GitRunner } from './runner.js'

/**
 * A scripted reply: a partial result (missing fields default to exit 0 and
 * empty output), a function of the request, or an error to reject with.
 */
export type FakeReply =
  | Partial<GitExecResult>
  | Error
  | ((request: GitRunRequest) => Partial<GitExecResult> | Promise<Partial<GitExecResult>>)

/**
 * GitRunner that never spawns anything.
 *
 * @example
 * ```typescript
 * const runner = new FakeGitRunner().reply({ stdout: 'v1.0.0\n' })
 * const repo = await Repository.at(dir, { runner })
 * await repo.run(new TagListCommand())
 * expect(runner.calls).toEqual([['tag', '-l']])
 * ```
 */
export class FakeGitRunner implements GitRunner {
  readonly binary: string
  /** Every request received, in order */
  readonly requests: GitRunRequest[] = []

  private readonly queue: FakeReply[] = []
  private fallback: FakeReply = {}

  constructor(binary = 'git') {
    this.binary = binary
  }

  /** Queue replies for the next calls, one per call */
  reply(...replies: FakeReply[]): this {
    this.queue.push(...replies)
    return this
  }

  /** Reply used once the queue is empty (default: exit 0, no output) */
  replyAlways(reply: FakeReply): this {
    this.fallback = reply
    return this
  }

  /** Argument vectors of every request */
  get calls(): string[][] {
    return this.requests.map((request) => request.args)
  }

  async run(request: GitRunRequest): Promise<GitExecResult> {
    this.requests.push({ ...request, args: [...request.args] })
    const reply = this.queue.shift() ?? this.fallback
    if (reply instanceof Error) {
      throw reply
    }
    const partial = typeof reply === 'function' ? await reply(request) : reply
    return {
      exitCode: partial.exitCode ?? 0,
      stdout: partial.stdout ?? '',
      stderr: partial.stderr ?? '',
    }
  }
}
