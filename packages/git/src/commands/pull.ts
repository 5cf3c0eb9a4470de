import { OptionsError } from '@gitcmd/core'

import { checkPositionals, optionalPositional } from '../validate.js'
import { ActionCommand } from './command.js'

export interface PullOptions {
  remote?: string | undefined
  /** Requires remote */
  refspecs?: string[] | undefined
  rebase?: boolean | undefined
  /** Refuse to merge unless the update is a fast-forward */
  ffOnly?: boolean | undefined
  allowUnrelatedHistories?: boolean | undefined
}

/**
 * `git pull`
 */
export class PullCommand extends ActionCommand<PullOptions> {
  readonly subcommand = 'pull'

  constructor(options: PullOptions = {}) {
    super(options)
  }

  args(): string[] {
    const { remote, refspecs = [], rebase, ffOnly, allowUnrelatedHistories } = this.options
    if (rebase && ffOnly) {
      throw new OptionsError(this.subcommand, 'ffOnly', 'cannot be combined with rebase')
    }
    if (refspecs.length > 0 && remote === undefined) {
      throw new OptionsError(this.subcommand, 'refspecs', 'require a remote')
    }

    const args = ['pull', '-q']
    if (rebase) args.push('--rebase')
    if (ffOnly) args.push('--ff-only')
    if (allowUnrelatedHistories) args.push('--allow-unrelated-histories')

    const name = optionalPositional(this.subcommand, 'remote', remote)
    if (name !== undefined) {
      args.push(name, ...checkPositionals(this.subcommand, 'refspecs', refspecs))
    }
    return args
  }
}
