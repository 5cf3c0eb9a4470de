/**
 * Integration tests for Repository against a real git binary.
 *
 * WHY: Argument vectors are only correct if git accepts them. These tests
 * run the common workflow end to end in temporary directories, with user
 * and system git configuration shut out. They are skipped when git is not
 * installed.
 */

import { spawnSync } from 'node:child_process'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { devNull, tmpdir } from 'node:os'
import { dirname, join, relative } from 'node:path'

import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { DEFAULT_CONFIG, GitCommandError, type GitcmdConfig, PathNotFoundError } from '@gitcmd/core'

import { NotesShowCommand } from './commands/notes.js'
import { PushCommand } from './commands/push.js'
import { RemoteListCommand } from './commands/remote.js'
import { StashListCommand } from './commands/stash.js'
import { TagListCommand } from './commands/tag.js'
import { Repository, type RepositoryOptions } from './repository.js'

const hasGit = spawnSync('git', ['--version']).status === 0

describe.skipIf(!hasGit)('Repository with git', () => {
  let dir: string
  let options: RepositoryOptions

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'gitcmd-it-'))
    const config: GitcmdConfig = {
      ...DEFAULT_CONFIG,
      git: {
        binary: 'git',
        env: {
          GIT_CONFIG_NOSYSTEM: '1',
          GIT_CONFIG_GLOBAL: devNull,
          GIT_CEILING_DIRECTORIES: dirname(dir),
          GIT_AUTHOR_NAME: 'Test User',
          GIT_AUTHOR_EMAIL: 'test@example.com',
          GIT_COMMITTER_NAME: 'Test User',
          GIT_COMMITTER_EMAIL: 'test@example.com',
        },
      },
    }
    options = { config }
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  async function committedRepo(name: string): Promise<Repository> {
    const repo = await Repository.init(join(dir, name), options, { initialBranch: 'main' })
    await writeFile(join(repo.path, 'README.md'), '# project\n')
    await repo.add()
    await repo.commit('Initial commit')
    return repo
  }

  test('init leaves a .git directory', async () => {
    const repo = await Repository.at(dir, options)
    expect(await repo.isInitialized()).toBe(false)
    await repo.init()
    expect(await repo.isInitialized()).toBe(true)
  })

  test('untracked file, then add and commit leave a clean tree', async () => {
    const repo = await Repository.init(join(dir, 'work'), options, { initialBranch: 'main' })
    await writeFile(join(repo.path, 'notes.txt'), 'hello\n')

    const before = await repo.status()
    expect(before.untracked).toEqual(['notes.txt'])
    expect(before.branch.oid).toBeNull()
    expect(before.clean).toBe(false)

    await repo.add()
    await repo.commit('Add notes')

    const after = await repo.status()
    expect(after.clean).toBe(true)
    expect(after.branch.head).toBe('main')
    expect(after.branch.oid).toMatch(/^[0-9a-f]{40}$/)
  })

  test('status reports modifications', async () => {
    const repo = await committedRepo('work')
    await writeFile(join(repo.path, 'README.md'), '# project\n\nMore.\n')

    const status = await repo.status()
    expect(status.changed).toHaveLength(1)
    expect(status.changed[0]).toMatchObject({ index: '.', worktree: 'M', path: 'README.md' })
  })

  test('status outside a repository is NotARepositoryError', async () => {
    const repo = await Repository.at(dir, options)
    await expect(repo.status()).rejects.toMatchObject({ code: 'NOT_A_REPOSITORY', kind: 'precondition' })
  })

  test('clone of a nonexistent path fails with git text', async () => {
    const error = await Repository.clone(join(dir, 'does-not-exist'), join(dir, 'copy'), options).catch(
      (err: unknown) => err
    )
    expect(error).toBeInstanceOf(GitCommandError)
    expect(error).toMatchObject({ subcommand: 'clone' })
    if (error instanceof GitCommandError) {
      expect(error.exitCode).not.toBe(0)
      expect(error.stderr).not.toBe('')
    }
  })

  test('push to a bare remote, twice, then clone it', async () => {
    const remote = join(dir, 'remote.git')
    await Repository.init(remote, options, { bare: true, initialBranch: 'main' })

    const repo = await committedRepo('work')
    await repo.remote('origin', remote)
    await repo.run(new PushCommand({ remote: 'origin', refspecs: ['main'], setUpstream: true }))
    await repo.push()
    await repo.push()

    const status = await repo.status()
    expect(status.branch.upstream).toBe('origin/main')
    expect(status.branch.ahead).toBe(0)
    expect(status.branch.behind).toBe(0)

    expect(await repo.run(new RemoteListCommand())).toEqual([{ name: 'origin', fetchUrl: remote, pushUrl: remote }])

    const copy = await Repository.clone(remote, join(dir, 'copy'), options)
    expect(await copy.isInitialized()).toBe(true)
    expect(await readFile(join(copy.path, 'README.md'), 'utf8')).toBe('# project\n')

    await copy.fetch()
    await copy.pull()
  })

  test('clone resolves relative urls and directories against the current directory', async () => {
    const upstream = await committedRepo('upstream')
    const url = relative(process.cwd(), upstream.path)
    const target = relative(process.cwd(), join(dir, 'out', 'nested', 'copy'))

    const copy = await Repository.clone(url, target, options)
    expect(copy.path).toBe(join(dir, 'out', 'nested', 'copy'))
    expect(await readFile(join(copy.path, 'README.md'), 'utf8')).toBe('# project\n')
  })

  test('tags and notes', async () => {
    const repo = await committedRepo('work')
    await repo.tag('v1.0.0')
    await repo.notes('Reviewed')

    expect(await repo.run(new TagListCommand())).toEqual(['v1.0.0'])
    expect(await repo.run(new NotesShowCommand())).toBe('Reviewed')
  })

  test('stash saves local changes', async () => {
    const repo = await committedRepo('work')
    await writeFile(join(repo.path, 'README.md'), 'changed\n')

    await repo.stash()

    expect((await repo.status()).clean).toBe(true)
    const entries = await repo.run(new StashListCommand())
    expect(entries).toHaveLength(1)
    expect(entries[0]?.ref).toBe('stash@{0}')
    expect(entries[0]?.message).toMatch(/^WIP on main: [0-9a-f]+ Initial commit$/)
  })

  test('a removed directory fails until init recreates it', async () => {
    const repo = await committedRepo('work')
    await rm(repo.path, { recursive: true })

    await expect(repo.add()).rejects.toBeInstanceOf(PathNotFoundError)
    await repo.init()
    expect(await repo.isInitialized()).toBe(true)
  })

  test('logger receives command lines', async () => {
    const lines: string[] = []
    const repo = await Repository.init(join(dir, 'logged'), { ...options, logger: (line) => lines.push(line) })
    expect(lines).toEqual([`[git] git init -q (${join(dir, 'logged')})`, '[git] exit 0'])
    expect(await repo.isInitialized()).toBe(true)
  })
})
