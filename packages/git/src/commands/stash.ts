import { OutputParseError } from '@gitcmd/core'

import { splitLines } from '../exec.js'
import type { GitExecResult } from '../runner.js'
import { checkIndex, checkPathspecs } from '../validate.js'
import { ActionCommand, GitCommand } from './command.js'

export interface StashPushOptions {
  action: 'push'
  message?: string | undefined
  includeUntracked?: boolean | undefined
  /** Leave staged changes in place */
  keepIndex?: boolean | undefined
  pathspecs?: string[] | undefined
}

export interface StashApplyOptions {
  action: 'pop' | 'apply'
  /** Entry to restore (default: the latest) */
  index?: number | undefined
  /** Restore the index as well as the working tree */
  restoreIndex?: boolean | undefined
}

export interface StashDropOptions {
  action: 'drop'
  index?: number | undefined
}

export interface StashClearOptions {
  action: 'clear'
}

export type StashOptions = StashPushOptions | StashApplyOptions | StashDropOptions | StashClearOptions

function stashRef(index: number | undefined): string[] {
  return index === undefined ? [] : [`stash@{${checkIndex('stash', 'index', index)}}`]
}

/**
 * `git stash push|pop|apply|drop|clear`
 *
 * @example
 * ```typescript
 * new StashCommand().args() // ['stash', 'push', '-q']
 * new StashCommand({ action: 'pop', index: 1 }).args() // ['stash', 'pop', '-q', 'stash@{1}']
 * ```
 */
export class StashCommand extends ActionCommand<StashOptions> {
  readonly subcommand = 'stash'

  constructor(options: StashOptions = { action: 'push' }) {
    super(options)
  }

  args(): string[] {
    const options = this.options

    switch (options.action) {
      case 'push': {
        const args = ['stash', 'push', '-q']
        if (options.includeUntracked) args.push('--include-untracked')
        if (options.keepIndex) args.push('--keep-index')
        if (options.message !== undefined) args.push('-m', options.message)
        const paths = checkPathspecs(this.subcommand, 'pathspecs', options.pathspecs ?? [])
        if (paths.length > 0) args.push('--', ...paths)
        return args
      }
      case 'pop':
      case 'apply':
        return [
          'stash',
          options.action,
          '-q',
          ...(options.restoreIndex ? ['--index'] : []),
          ...stashRef(options.index),
        ]
      case 'drop':
        return ['stash', 'drop', '-q', ...stashRef(options.index)]
      case 'clear':
        return ['stash', 'clear']
    }
  }
}

export interface StashEntry {
  index: number
  /** Reflog selector, e.g. "stash@{0}" */
  ref: string
  message: string
}

const STASH_LINE = /^stash@\{(\d+)\}\t(.*)$/

/**
 * `git stash list`, newest entry first.
 */
export class StashListCommand extends GitCommand<Record<string, never>, StashEntry[]> {
  readonly subcommand = 'stash'

  constructor() {
    super({})
  }

  args(): string[] {
    return ['stash', 'list', '--format=%gd%x09%gs']
  }

  parse(result: GitExecResult): StashEntry[] {
    return splitLines(result.stdout).map((line) => {
      const match = line.match(STASH_LINE)
      if (!match) {
        throw new OutputParseError(this.subcommand, 'Unexpected stash entry', line)
      }
      const index = Number.parseInt(match[1] ?? '0', 10)
      return { index, ref: `stash@{${index}}`, message: match[2] ?? '' }
    })
  }
}
