import { OptionsError } from '@gitcmd/core'

import { checkPathspecs, requireText } from '../validate.js'
import { ActionCommand } from './command.js'

export interface CommitOptions {
  /** Required unless amending with noEdit */
  message?: string | undefined
  /** Stage modified and deleted tracked files first */
  all?: boolean | undefined
  allowEmpty?: boolean | undefined
  amend?: boolean | undefined
  /** Keep the amended commit's message; requires amend */
  noEdit?: boolean | undefined
  /** Commit only these paths */
  files?: string[] | undefined
}

/**
 * `git commit`
 *
 * @example
 * ```typescript
 * new CommitCommand({ message: 'Initial commit', allowEmpty: true }).args()
 * // ['commit', '-q', '-m', 'Initial commit', '--allow-empty']
 * ```
 */
export class CommitCommand extends ActionCommand<CommitOptions> {
  readonly subcommand = 'commit'

  args(): string[] {
    const { message, all, allowEmpty, amend, noEdit, files = [] } = this.options
    const paths = checkPathspecs(this.subcommand, 'files', files)
    if (all && paths.length > 0) {
      throw new OptionsError(this.subcommand, 'files', 'cannot be combined with all')
    }

    const args = ['commit', '-q']
    if (noEdit) {
      if (!amend) {
        throw new OptionsError(this.subcommand, 'noEdit', 'requires amend')
      }
      if (message !== undefined) {
        throw new OptionsError(this.subcommand, 'message', 'cannot be combined with noEdit')
      }
    } else {
      args.push('-m', requireText(this.subcommand, 'message', message))
    }

    if (all) args.push('--all')
    if (allowEmpty) args.push('--allow-empty')
    if (amend) args.push('--amend')
    if (noEdit) args.push('--no-edit')
    if (paths.length > 0) args.push('--', ...paths)
    return args
  }
}
