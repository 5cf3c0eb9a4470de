import { OptionsError } from '@gitcmd/core'

import { checkPathspecs } from '../validate.js'
import { ActionCommand } from './command.js'

export interface AddOptions {
  /** true renders --all, false renders --no-all */
  all?: boolean | undefined
  /** Stage modifications and deletions of tracked files only */
  update?: boolean | undefined
  /** Add ignored files too */
  force?: boolean | undefined
  /** true renders --chmod=+x, false renders --chmod=-x */
  chmod?: boolean | undefined
  pathspecs?: string[] | undefined
}

/**
 * `git add`
 *
 * @example
 * ```typescript
 * new AddCommand({ all: true }).args() // ['add', '--all']
 * new AddCommand({ pathspecs: ['src'] }).args() // ['add', '--', 'src']
 * ```
 */
export class AddCommand extends ActionCommand<AddOptions> {
  readonly subcommand = 'add'

  constructor(options: AddOptions = {}) {
    super(options)
  }

  args(): string[] {
    const { all, update, force, chmod, pathspecs = [] } = this.options
    if (all === true && update) {
      throw new OptionsError(this.subcommand, 'update', 'cannot be combined with all')
    }

    const args = ['add']
    if (all !== undefined) args.push(all ? '--all' : '--no-all')
    if (update) args.push('--update')
    if (force) args.push('--force')
    if (chmod !== undefined) args.push(chmod ? '--chmod=+x' : '--chmod=-x')

    const paths = checkPathspecs(this.subcommand, 'pathspecs', pathspecs)
    if (paths.length > 0) args.push('--', ...paths)
    return args
  }
}
