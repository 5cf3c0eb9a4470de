import type { GitExecResult } from '../runner.js'
import { type Status, parseStatus } from '../status.js'
import { checkPathspecs } from '../validate.js'
import { GitCommand } from './command.js'

export interface StatusOptions {
  /** Report ignored files */
  ignored?: boolean | undefined
  /** How to report untracked files (git's default: normal) */
  untrackedFiles?: 'no' | 'normal' | 'all' | undefined
  pathspecs?: string[] | undefined
}

/**
 * `git status` in porcelain v2 with branch headers, NUL-terminated.
 */
export class StatusCommand extends GitCommand<StatusOptions, Status> {
  readonly subcommand = 'status'

  constructor(options: StatusOptions = {}) {
    super(options)
  }

  args(): string[] {
    const { ignored, untrackedFiles, pathspecs = [] } = this.options
    const args = ['status', '--porcelain=v2', '--branch', '-z']
    if (ignored) args.push('--ignored')
    if (untrackedFiles !== undefined) args.push(`--untracked-files=${untrackedFiles}`)
    const paths = checkPathspecs(this.subcommand, 'pathspecs', pathspecs)
    if (paths.length > 0) args.push('--', ...paths)
    return args
  }

  parse(result: GitExecResult): Status {
    return parseStatus(result.stdout)
  }
}
