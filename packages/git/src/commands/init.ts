import { requireRefName } from '../validate.js'
import { ActionCommand } from './command.js'

export interface InitOptions {
  bare?: boolean | undefined
  /** Name of the first branch (default: git's init.defaultBranch) */
  initialBranch?: string | undefined
}

/**
 * `git init`, run inside the directory to initialize.
 */
export class InitCommand extends ActionCommand<InitOptions> {
  readonly subcommand = 'init'

  constructor(options: InitOptions = {}) {
    super(options)
  }

  args(): string[] {
    const { bare, initialBranch } = this.options
    const args = ['init', '-q']
    if (bare) args.push('--bare')
    if (initialBranch !== undefined) {
      args.push(`--initial-branch=${requireRefName(this.subcommand, 'initialBranch', initialBranch)}`)
    }
    return args
  }
}
