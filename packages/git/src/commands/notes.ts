import { optionalPositional, requireText } from '../validate.js'
import type { GitExecResult } from '../runner.js'
import { ActionCommand, GitCommand } from './command.js'

export interface NotesAddOptions {
  action: 'add'
  message: string
  /** Object to annotate (default: HEAD) */
  object?: string | undefined
  /** Replace an existing note */
  force?: boolean | undefined
}

export interface NotesAppendOptions {
  action: 'append'
  message: string
  object?: string | undefined
}

export interface NotesRemoveOptions {
  action: 'remove'
  object?: string | undefined
  /** Succeed when the object has no note */
  ignoreMissing?: boolean | undefined
}

export type NotesOptions = NotesAddOptions | NotesAppendOptions | NotesRemoveOptions

/**
 * `git notes add|append|remove`
 *
 * @example
 * ```typescript
 * new NotesCommand({ action: 'add', message: 'Reviewed' }).args()
 * // ['notes', 'add', '-m', 'Reviewed']
 * ```
 */
export class NotesCommand extends ActionCommand<NotesOptions> {
  readonly subcommand = 'notes'

  args(): string[] {
    const options = this.options
    const args = ['notes', options.action]

    switch (options.action) {
      case 'add':
        if (options.force) args.push('-f')
        args.push('-m', requireText(this.subcommand, 'message', options.message))
        break
      case 'append':
        args.push('-m', requireText(this.subcommand, 'message', options.message))
        break
      case 'remove':
        if (options.ignoreMissing) args.push('--ignore-missing')
        break
    }

    const object = optionalPositional(this.subcommand, 'object', options.object)
    if (object !== undefined) args.push(object)
    return args
  }
}

export interface NotesShowOptions {
  object?: string | undefined
}

/**
 * `git notes show`, resolving to the note text without its trailing newline.
 */
export class NotesShowCommand extends GitCommand<NotesShowOptions, string> {
  readonly subcommand = 'notes'

  constructor(options: NotesShowOptions = {}) {
    super(options)
  }

  args(): string[] {
    const object = optionalPositional(this.subcommand, 'object', this.options.object)
    return object === undefined ? ['notes', 'show'] : ['notes', 'show', object]
  }

  parse(result: GitExecResult): string {
    return result.stdout.replace(/\n$/, '')
  }
}
