import { OptionsError } from '@gitcmd/core'

import { checkIndex, optionalPositional, requirePositional, requireRefName } from '../validate.js'

export interface CloneOptions {
  url: string
  /** Destination directory; git derives one from the url when unset */
  directory?: string | undefined
  /** Branch to check out instead of the remote's HEAD */
  branch?: string | undefined
  /** Remote name instead of "origin" */
  origin?: string | undefined
  /** Shallow clone with this many commits */
  depth?: number | undefined
  bare?: boolean | undefined
}

/**
 * `git clone`
 *
 * Clone is not bound to an existing repository, so it renders arguments
 * only; `Repository.clone` runs it and returns a handle on the result.
 */
export class CloneCommand {
  readonly subcommand = 'clone'
  readonly options: Readonly<CloneOptions>

  constructor(options: CloneOptions) {
    this.options = Object.freeze({ ...options })
  }

  /**
   * @throws OptionsError if options are missing or malformed
   */
  args(): string[] {
    const { url, directory, branch, origin, depth, bare } = this.options
    const args = ['clone', '-q']

    if (branch !== undefined) args.push('--branch', requireRefName(this.subcommand, 'branch', branch))
    if (origin !== undefined) args.push('--origin', requireRefName(this.subcommand, 'origin', origin))
    if (depth !== undefined) {
      if (checkIndex(this.subcommand, 'depth', depth) < 1) {
        throw new OptionsError(this.subcommand, 'depth', `must be at least 1 (got ${depth})`)
      }
      args.push('--depth', String(depth))
    }
    if (bare) args.push('--bare')

    args.push(requirePositional(this.subcommand, 'url', url))
    const dir = optionalPositional(this.subcommand, 'directory', directory)
    if (dir !== undefined) args.push(dir)
    return args
  }
}

/**
 * Directory name git would pick for a clone of `url`: the last path
 * component with any trailing "/.git" or ".git" removed.
 *
 * @example
 * ```typescript
 * defaultCloneDirectory('https://example.com/team/project.git') // 'project'
 * defaultCloneDirectory('git@example.com:team/tools') // 'tools'
 * ```
 */
export function defaultCloneDirectory(url: string): string {
  const trimmed = url.replace(/\/+$/, '').replace(/\/\.git$/, '')
  const last = trimmed.split(/[/:]/).pop() ?? ''
  const name = last.replace(/\.git$/, '')
  if (name === '') {
    throw new OptionsError('clone', 'directory', `cannot be derived from url "${url}"`)
  }
  return name
}
