import { OptionsError, OutputParseError } from '@gitcmd/core'

import { splitLines } from '../exec.js'
import type { GitExecResult } from '../runner.js'
import { requirePositional, requireRefName } from '../validate.js'
import { ActionCommand, GitCommand } from './command.js'

export interface RemoteAddOptions {
  action: 'add'
  name: string
  url: string
  /** Branch the remote's HEAD should point at */
  master?: string | undefined
  /** true renders --tags, false renders --no-tags */
  tags?: boolean | undefined
  /** Fetch right after adding */
  fetch?: boolean | undefined
}

export interface RemoteRemoveOptions {
  action: 'remove'
  name: string
}

export interface RemoteRenameOptions {
  action: 'rename'
  name: string
  newName: string
}

export interface RemoteSetUrlOptions {
  action: 'set-url'
  name: string
  url: string
  /** Change the push URL instead of the fetch URL */
  push?: boolean | undefined
}

export type RemoteOptions = RemoteAddOptions | RemoteRemoveOptions | RemoteRenameOptions | RemoteSetUrlOptions

/**
 * `git remote add|remove|rename|set-url`
 *
 * @example
 * ```typescript
 * new RemoteCommand({ action: 'add', name: 'origin', url: '../upstream.git' }).args()
 * // ['remote', 'add', 'origin', '../upstream.git']
 * ```
 */
export class RemoteCommand extends ActionCommand<RemoteOptions> {
  readonly subcommand = 'remote'

  args(): string[] {
    const options = this.options
    const name = requireRefName(this.subcommand, 'name', options.name)

    switch (options.action) {
      case 'add': {
        const args = ['remote', 'add']
        if (options.master !== undefined) {
          args.push('-m', requireRefName(this.subcommand, 'master', options.master))
        }
        if (options.tags !== undefined) args.push(options.tags ? '--tags' : '--no-tags')
        if (options.fetch) args.push('-f')
        args.push(name, requirePositional(this.subcommand, 'url', options.url))
        return args
      }
      case 'remove':
        return ['remote', 'remove', name]
      case 'rename': {
        const newName = requireRefName(this.subcommand, 'newName', options.newName)
        if (newName === name) {
          throw new OptionsError(this.subcommand, 'newName', 'must differ from name')
        }
        return ['remote', 'rename', name, newName]
      }
      case 'set-url': {
        const args = ['remote', 'set-url']
        if (options.push) args.push('--push')
        args.push(name, requirePositional(this.subcommand, 'url', options.url))
        return args
      }
    }
  }
}

/**
 * Remote information.
 */
export interface RemoteInfo {
  /** Remote name (e.g., "origin") */
  name: string
  /** Fetch URL */
  fetchUrl: string
  /** Push URL (usually same as fetch) */
  pushUrl: string
}

/**
 * `git remote -v`, resolving to one entry per remote in git's order.
 */
export class RemoteListCommand extends GitCommand<Record<string, never>, RemoteInfo[]> {
  readonly subcommand = 'remote'

  constructor() {
    super({})
  }

  args(): string[] {
    return ['remote', '-v']
  }

  parse(result: GitExecResult): RemoteInfo[] {
    const remotes = new Map<string, RemoteInfo>()

    for (const line of splitLines(result.stdout)) {
      const match = line.match(/^(\S+)\s+(.+?)\s+\((fetch|push)\)$/)
      if (!match) {
        throw new OutputParseError(this.subcommand, 'Unexpected remote entry', line)
      }
      const name = match[1] ?? ''
      const url = match[2] ?? ''
      let info = remotes.get(name)
      if (!info) {
        info = { name, fetchUrl: '', pushUrl: '' }
        remotes.set(name, info)
      }
      if (match[3] === 'fetch') {
        info.fetchUrl = url
      } else {
        info.pushUrl = url
      }
    }

    return Array.from(remotes.values())
  }
}
