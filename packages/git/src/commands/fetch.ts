import { OptionsError } from '@gitcmd/core'

import { checkPositionals, optionalPositional } from '../validate.js'
import { ActionCommand } from './command.js'

export interface FetchOptions {
  /** Fetch every configured remote */
  all?: boolean | undefined
  remote?: string | undefined
  /** Requires remote */
  refspecs?: string[] | undefined
  /** Remove remote-tracking refs that no longer exist on the remote */
  prune?: boolean | undefined
  tags?: boolean | undefined
}

/**
 * `git fetch`
 */
export class FetchCommand extends ActionCommand<FetchOptions> {
  readonly subcommand = 'fetch'

  constructor(options: FetchOptions = {}) {
    super(options)
  }

  args(): string[] {
    const { all, remote, refspecs = [], prune, tags } = this.options
    if (all && remote !== undefined) {
      throw new OptionsError(this.subcommand, 'remote', 'cannot be combined with all')
    }
    if (refspecs.length > 0 && remote === undefined) {
      throw new OptionsError(this.subcommand, 'refspecs', 'require a remote')
    }

    const args = ['fetch', '-q']
    if (all) args.push('--all')
    if (prune) args.push('--prune')
    if (tags) args.push('--tags')

    const name = optionalPositional(this.subcommand, 'remote', remote)
    if (name !== undefined) {
      args.push(name, ...checkPositionals(this.subcommand, 'refspecs', refspecs))
    }
    return args
  }
}
