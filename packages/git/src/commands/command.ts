/**
 * Base class for git subcommand builders.
 *
 * WHY: Each subcommand has its own options shape, its own conflicts and
 * its own output. A command object owns all three. It renders an argument
 * vector (validating as it goes), parses a successful result, and hands
 * itself to a repository to run.
 */

import type { GitExecResult } from '../runner.js'

/**
 * Anything a command can run against (a Repository).
 */
export interface CommandTarget {
  run<T>(command: GitCommand<unknown, T>): Promise<T>
}

export abstract class GitCommand<TOptions, TOutput> {
  /** Subcommand token, e.g. "push" */
  abstract readonly subcommand: string
  /** parse() reads stdout, so the command always runs with output captured */
  readonly readsOutput: boolean = true
  readonly options: Readonly<TOptions>

  constructor(options: TOptions) {
    this.options = Object.freeze({ ...options })
  }

  /**
   * Render the argument vector, subcommand first.
   *
   * @throws OptionsError if options are missing, malformed or conflicting
   */
  abstract args(): string[]

  /** Turn the result of a successful run into the command's output */
  abstract parse(result: GitExecResult): TOutput

  /** Run against a repository */
  run(target: CommandTarget): Promise<TOutput> {
    return target.run<TOutput>(this)
  }
}

/**
 * Command whose only output is success.
 */
export abstract class ActionCommand<TOptions> extends GitCommand<TOptions, void> {
  readonly readsOutput: boolean = false

  parse(): void {
    return undefined
  }
}
