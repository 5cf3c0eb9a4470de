/**
 * Repository handle: a path bound to a git working tree.
 *
 * WHY: Most callers want "commit everything" or "push", not an argument
 * vector. The handle offers those as one-line methods and still accepts
 * any command object (or a raw vector) for the rest. Every call runs the
 * same pipeline: check that the path exists, render arguments, spawn one
 * process, translate the exit code.
 */

import type { Stats } from 'node:fs'
import { mkdir, stat } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'

import { DEFAULT_CONFIG, type GitcmdConfig, type OutputMode, PathNotFoundError } from '@gitcmd/core'

import { AddCommand } from './commands/add.js'
import { CloneCommand, type CloneOptions, defaultCloneDirectory } from './commands/clone.js'
import type { GitCommand } from './commands/command.js'
import { CommitCommand } from './commands/commit.js'
import { FetchCommand } from './commands/fetch.js'
import { InitCommand, type InitOptions } from './commands/init.js'
import { NotesCommand } from './commands/notes.js'
import { PullCommand } from './commands/pull.js'
import { PushCommand } from './commands/push.js'
import { RemoteCommand } from './commands/remote.js'
import { StashCommand } from './commands/stash.js'
import { StatusCommand } from './commands/status.js'
import { TagCommand } from './commands/tag.js'
import { type GitExecOptions, type GitLogger, gitExec } from './exec.js'
import { type GitExecResult, type GitRunner, NodeGitRunner } from './runner.js'
import type { Status } from './status.js'

/**
 * How a handle runs git.
 */
export interface RepositoryOptions {
  /** Resolved configuration (default: DEFAULT_CONFIG) */
  config?: GitcmdConfig | undefined
  /** Runner to spawn git with (default: a NodeGitRunner for config.git.binary) */
  runner?: GitRunner | undefined
  logger?: GitLogger | undefined
}

/**
 * stat() that reports a missing path as null.
 */
async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path)
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return null
    }
    throw error
  }
}

async function ensureDirectory(path: string): Promise<void> {
  const stats = await statOrNull(path)
  if (!stats?.isDirectory()) {
    throw new PathNotFoundError(path)
  }
}

/**
 * @example
 * ```typescript
 * const repo = await Repository.init('/tmp/project')
 * await repo.add()
 * await repo.commit('Initial commit')
 * const status = await repo.status()
 * status.clean // true
 * ```
 */
export class Repository {
  /** Absolute path of the working tree */
  readonly path: string
  readonly config: GitcmdConfig
  private readonly runner: GitRunner
  private readonly logger: GitLogger | undefined

  private constructor(path: string, options: RepositoryOptions) {
    this.path = path
    this.config = options.config ?? DEFAULT_CONFIG
    this.runner = options.runner ?? new NodeGitRunner(this.config.git.binary)
    this.logger = options.logger
  }

  /**
   * Bind a handle to an existing directory. The directory need not be a
   * repository yet; call `init()` to make it one.
   *
   * @throws PathNotFoundError if path is not an existing directory
   */
  static async at(path: string, options: RepositoryOptions = {}): Promise<Repository> {
    const absolute = resolve(path)
    await ensureDirectory(absolute)
    return new Repository(absolute, options)
  }

  /**
   * Create the directory when missing, run `git init` in it and return a handle.
   */
  static async init(
    path: string,
    options: RepositoryOptions = {},
    initOptions: InitOptions = {}
  ): Promise<Repository> {
    const repo = new Repository(resolve(path), options)
    await repo.init(initOptions)
    return repo
  }

  /**
   * Clone `url` into `directory` and return a handle on the clone.
   * Without a directory, the name git would derive from the url is used,
   * relative to the current working directory.
   *
   * @throws OptionsError if options are malformed
   * @throws GitCommandError if the clone fails
   */
  static async clone(
    url: string,
    directory?: string,
    options: RepositoryOptions = {},
    cloneOptions: Omit<CloneOptions, 'url' | 'directory'> = {}
  ): Promise<Repository> {
    const target = resolve(directory ?? defaultCloneDirectory(url))
    const command = new CloneCommand({ ...cloneOptions, url, directory: target })
    const args = command.args()
    await mkdir(dirname(target), { recursive: true })

    // The target is absolute; a relative url resolves against the caller's directory
    const repo = new Repository(target, options)
    await gitExec(args, repo.execOptions(process.cwd()))
    return repo
  }

  /**
   * Whether the directory holds a `.git` entry. A bare repository or a
   * subdirectory of a working tree reports false.
   */
  async isInitialized(): Promise<boolean> {
    return (await statOrNull(join(this.path, '.git'))) !== null
  }

  /**
   * Run `git init -q`, recreating the directory first if it was removed.
   */
  async init(options: InitOptions = {}): Promise<this> {
    const command = new InitCommand(options)
    const args = command.args()
    await mkdir(this.path, { recursive: true })
    await gitExec(args, this.execOptions(this.path))
    return this
  }

  /** `git add --all` */
  async add(): Promise<this> {
    await this.run(new AddCommand({ all: true }))
    return this
  }

  /** `git commit -q -m <message> --allow-empty` */
  async commit(message: string): Promise<this> {
    await this.run(new CommitCommand({ message, allowEmpty: true }))
    return this
  }

  /** `git fetch -q --all` */
  async fetch(): Promise<this> {
    await this.run(new FetchCommand({ all: true }))
    return this
  }

  /** `git pull -q` */
  async pull(): Promise<this> {
    await this.run(new PullCommand())
    return this
  }

  /** `git push -q` */
  async push(): Promise<this> {
    await this.run(new PushCommand())
    return this
  }

  /** `git remote add <name> <url>` */
  async remote(name: string, url: string): Promise<this> {
    await this.run(new RemoteCommand({ action: 'add', name, url }))
    return this
  }

  /** `git stash push -q` */
  async stash(): Promise<this> {
    await this.run(new StashCommand())
    return this
  }

  /** `git tag <name>` on HEAD */
  async tag(name: string): Promise<this> {
    await this.run(new TagCommand({ action: 'create', name }))
    return this
  }

  /** `git notes add -m <message>` on HEAD */
  async notes(message: string): Promise<this> {
    await this.run(new NotesCommand({ action: 'add', message }))
    return this
  }

  /** Status including ignored files */
  status(): Promise<Status> {
    return this.run(new StatusCommand({ ignored: true }))
  }

  /**
   * Run any command object and resolve to its output.
   *
   * @throws OptionsError before anything runs if the options are invalid
   * @throws PathNotFoundError if the directory no longer exists
   * @throws GitCommandError (or a subclass) if git exits non-zero
   */
  async run<T>(command: GitCommand<unknown, T>): Promise<T> {
    const args = command.args()
    const result = await this.execute(args, command.readsOutput ? 'pipe' : this.config.output)
    return command.parse(result)
  }

  /**
   * Run a raw argument vector through the same checks and translation.
   */
  exec(args: string[]): Promise<GitExecResult> {
    return this.execute(args, this.config.output)
  }

  private async execute(args: string[], output: OutputMode): Promise<GitExecResult> {
    await ensureDirectory(this.path)
    return gitExec(args, { ...this.execOptions(this.path), output })
  }

  private execOptions(cwd: string): GitExecOptions {
    return {
      cwd,
      env: this.config.git.env,
      timeout: this.config.git.timeout,
      output: this.config.output,
      runner: this.runner,
      logger: this.logger,
    }
  }
}
