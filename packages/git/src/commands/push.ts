import { OptionsError } from '@gitcmd/core'

import { checkPositionals, optionalPositional } from '../validate.js'
import { ActionCommand } from './command.js'

export interface PushOptions {
  remote?: string | undefined
  /** Requires remote; excludes all */
  refspecs?: string[] | undefined
  /** Push every local branch */
  all?: boolean | undefined
  /** Push every tag; excludes all */
  tags?: boolean | undefined
  force?: boolean | undefined
  setUpstream?: boolean | undefined
}

/**
 * `git push`
 *
 * @example
 * ```typescript
 * new PushCommand({ remote: 'origin', refspecs: ['main'], setUpstream: true }).args()
 * // ['push', '-q', '--set-upstream', 'origin', 'main']
 * ```
 */
export class PushCommand extends ActionCommand<PushOptions> {
  readonly subcommand = 'push'

  constructor(options: PushOptions = {}) {
    super(options)
  }

  args(): string[] {
    const { remote, refspecs = [], all, tags, force, setUpstream } = this.options
    if (all && refspecs.length > 0) {
      throw new OptionsError(this.subcommand, 'refspecs', 'cannot be combined with all')
    }
    if (all && tags) {
      throw new OptionsError(this.subcommand, 'tags', 'cannot be combined with all')
    }
    if (refspecs.length > 0 && remote === undefined) {
      throw new OptionsError(this.subcommand, 'refspecs', 'require a remote')
    }

    const args = ['push', '-q']
    if (all) args.push('--all')
    if (tags) args.push('--tags')
    if (force) args.push('--force')
    if (setUpstream) args.push('--set-upstream')

    const name = optionalPositional(this.subcommand, 'remote', remote)
    if (name !== undefined) {
      args.push(name, ...checkPositionals(this.subcommand, 'refspecs', refspecs))
    }
    return args
  }
}
