import { OptionsError } from '@gitcmd/core'

import { splitLines } from '../exec.js'
import type { GitExecResult } from '../runner.js'
import { optionalPositional, requireRefName, requireText } from '../validate.js'
import { ActionCommand, GitCommand } from './command.js'

export interface TagCreateOptions {
  action: 'create'
  name: string
  /** Setting a message makes the tag annotated */
  message?: string | undefined
  /** Annotated tag; requires message */
  annotate?: boolean | undefined
  /** Object to tag (default: HEAD) */
  object?: string | undefined
  /** Replace an existing tag */
  force?: boolean | undefined
}

export interface TagDeleteOptions {
  action: 'delete'
  name: string
}

export type TagOptions = TagCreateOptions | TagDeleteOptions

/**
 * `git tag` create or delete
 *
 * @example
 * ```typescript
 * new TagCommand({ action: 'create', name: 'v1.0.0' }).args() // ['tag', 'v1.0.0']
 * new TagCommand({ action: 'delete', name: 'v1.0.0' }).args() // ['tag', '-d', 'v1.0.0']
 * ```
 */
export class TagCommand extends ActionCommand<TagOptions> {
  readonly subcommand = 'tag'

  args(): string[] {
    const options = this.options
    const name = requireRefName(this.subcommand, 'name', options.name)
    if (options.action === 'delete') {
      return ['tag', '-d', name]
    }

    if (options.annotate && options.message === undefined) {
      throw new OptionsError(this.subcommand, 'message', 'is required for annotated tags')
    }

    const args = ['tag']
    if (options.annotate) args.push('-a')
    if (options.force) args.push('-f')
    if (options.message !== undefined) args.push('-m', requireText(this.subcommand, 'message', options.message))
    args.push(name)
    const object = optionalPositional(this.subcommand, 'object', options.object)
    if (object !== undefined) args.push(object)
    return args
  }
}

export interface TagListOptions {
  /** Glob pattern to match (e.g., "v1.*") */
  pattern?: string | undefined
}

/**
 * `git tag -l`, resolving to tag names in git's order.
 *
 * @example
 * ```typescript
 * await repo.run(new TagListCommand({ pattern: 'v1.*' }))
 * // ['v1.0.0', 'v1.1.0']
 * ```
 */
export class TagListCommand extends GitCommand<TagListOptions, string[]> {
  readonly subcommand = 'tag'

  constructor(options: TagListOptions = {}) {
    super(options)
  }

  args(): string[] {
    const pattern = optionalPositional(this.subcommand, 'pattern', this.options.pattern)
    return pattern === undefined ? ['tag', '-l'] : ['tag', '-l', pattern]
  }

  parse(result: GitExecResult): string[] {
    return splitLines(result.stdout)
  }
}
