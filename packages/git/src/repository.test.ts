/**
 * Tests for the Repository handle, driven by FakeGitRunner.
 *
 * WHY: The convenience methods promise specific argument vectors, and the
 * path check must stop a call before anything is spawned. A scripted
 * runner makes both observable without a git binary.
 */

import { mkdtemp, rm, stat } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import {
  type GitcmdConfig,
  OptionsError,
  PathNotFoundError,
  PushRejectedError,
} from '@gitcmd/core'

import { TagListCommand } from './commands/tag.js'
import { FakeGitRunner } from './fake-runner.js'
import { Repository } from './repository.js'

let dir: string
let runner: FakeGitRunner

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'gitcmd-repo-'))
  runner = new FakeGitRunner()
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

describe('Repository.at', () => {
  test('binds to an existing directory', async () => {
    const repo = await Repository.at(dir, { runner })
    expect(repo.path).toBe(dir)
    expect(runner.calls).toEqual([])
  })

  test('rejects a missing directory', async () => {
    await expect(Repository.at(join(dir, 'missing'), { runner })).rejects.toBeInstanceOf(PathNotFoundError)
  })
})

describe('convenience methods', () => {
  test('render the documented vectors in the repository', async () => {
    const repo = await Repository.at(dir, { runner })
    await repo.add()
    await repo.commit('Initial commit')
    await repo.fetch()
    await repo.pull()
    await repo.push()
    await repo.remote('origin', '../upstream.git')
    await repo.stash()
    await repo.tag('v1.0.0')
    await repo.notes('Reviewed')

    expect(runner.calls).toEqual([
      ['add', '--all'],
      ['commit', '-q', '-m', 'Initial commit', '--allow-empty'],
      ['fetch', '-q', '--all'],
      ['pull', '-q'],
      ['push', '-q'],
      ['remote', 'add', 'origin', '../upstream.git'],
      ['stash', 'push', '-q'],
      ['tag', 'v1.0.0'],
      ['notes', 'add', '-m', 'Reviewed'],
    ])
    expect(runner.requests.every((request) => request.cwd === dir)).toBe(true)
  })

  test('methods chain', async () => {
    const repo = await Repository.at(dir, { runner })
    expect(await repo.add()).toBe(repo)
  })

  test('status parses porcelain output', async () => {
    runner.reply({ stdout: '# branch.oid (initial)\0# branch.head main\0? README.md\0' })
    const repo = await Repository.at(dir, { runner })
    const status = await repo.status()

    expect(runner.calls).toEqual([['status', '--porcelain=v2', '--branch', '-z', '--ignored']])
    expect(status.branch.head).toBe('main')
    expect(status.untracked).toEqual(['README.md'])
    expect(status.clean).toBe(false)
  })

  test('run returns the command output', async () => {
    runner.reply({ stdout: 'v1.0.0\nv2.0.0\n' })
    const repo = await Repository.at(dir, { runner })
    expect(await new TagListCommand().run(repo)).toEqual(['v1.0.0', 'v2.0.0'])
  })
})

describe('preconditions', () => {
  test('a removed directory fails every call but init without spawning', async () => {
    const repo = await Repository.at(dir, { runner })
    await rm(dir, { recursive: true })

    await expect(repo.add()).rejects.toBeInstanceOf(PathNotFoundError)
    await expect(repo.commit('x')).rejects.toBeInstanceOf(PathNotFoundError)
    await expect(repo.status()).rejects.toBeInstanceOf(PathNotFoundError)
    await expect(repo.exec(['log'])).rejects.toThrow(`Repository path not found: ${dir}`)
    expect(runner.calls).toEqual([])
  })

  test('init recreates the directory', async () => {
    const repo = await Repository.at(dir, { runner })
    await rm(dir, { recursive: true })

    await repo.init()
    expect((await stat(dir)).isDirectory()).toBe(true)
    expect(runner.calls).toEqual([['init', '-q']])
  })

  test('invalid options fail before spawning', async () => {
    const repo = await Repository.at(dir, { runner })
    await expect(repo.tag('bad name')).rejects.toBeInstanceOf(OptionsError)
    await expect(repo.commit('')).rejects.toBeInstanceOf(OptionsError)
    expect(runner.calls).toEqual([])
  })

  test('isInitialized looks for .git', async () => {
    const repo = await Repository.at(dir, { runner })
    expect(await repo.isInitialized()).toBe(false)
  })
})

describe('errors and configuration', () => {
  test('non-zero exit is translated', async () => {
    runner.reply({ exitCode: 1, stderr: "error: failed to push some refs to '../upstream.git'" })
    const repo = await Repository.at(dir, { runner })

    const error = await repo.push().catch((err: unknown) => err)
    expect(error).toBeInstanceOf(PushRejectedError)
    expect(error).toMatchObject({
      subcommand: 'push',
      command: 'git push -q',
      exitCode: 1,
      stderr: "error: failed to push some refs to '../upstream.git'",
    })
  })

  test('config supplies env, timeout and output mode', async () => {
    const config: GitcmdConfig = {
      output: 'inherit',
      git: { binary: 'git', timeout: 2500, env: { GIT_AUTHOR_NAME: 'Test User' } },
    }
    const repo = await Repository.at(dir, { runner, config })
    await repo.fetch()

    expect(runner.requests[0]).toEqual({
      cwd: dir,
      args: ['fetch', '-q', '--all'],
      env: { GIT_AUTHOR_NAME: 'Test User' },
      output: 'inherit',
      timeout: 2500,
    })
  })

  test('commands that parse output always capture it', async () => {
    const config: GitcmdConfig = { output: 'inherit', git: { binary: 'git', env: {} } }
    const repo = await Repository.at(dir, { runner, config })
    await repo.status()
    await repo.add()
    expect(runner.requests.map((request) => request.output)).toEqual(['pipe', 'inherit'])
  })

  test('logger sees each call', async () => {
    const lines: string[] = []
    const repo = await Repository.at(dir, { runner, logger: (line) => lines.push(line) })
    await repo.tag('v1.0.0')
    expect(lines).toEqual([`[git] git tag v1.0.0 (${dir})`, '[git] exit 0'])
  })
})

describe('Repository.clone', () => {
  test('runs clone in the current directory and creates the parent', async () => {
    const target = join(dir, 'nested', 'copy')
    const repo = await Repository.clone('../upstream.git', target, { runner }, { branch: 'main' })

    expect(repo.path).toBe(target)
    expect(runner.requests).toHaveLength(1)
    expect(runner.requests[0]?.cwd).toBe(process.cwd())
    expect((await stat(join(dir, 'nested'))).isDirectory()).toBe(true)
    expect(runner.calls[0]).toEqual(['clone', '-q', '--branch', 'main', '../upstream.git', target])
  })

  test('invalid options fail before spawning', async () => {
    await expect(Repository.clone('', join(dir, 'copy'), { runner })).rejects.toBeInstanceOf(OptionsError)
    expect(runner.calls).toEqual([])
  })
})

describe('Repository.init', () => {
  test('creates the directory and passes init options', async () => {
    const target = join(dir, 'fresh')
    const repo = await Repository.init(target, { runner }, { initialBranch: 'main' })
    expect(repo.path).toBe(target)
    expect((await stat(target)).isDirectory()).toBe(true)
    expect(runner.calls).toEqual([['init', '-q', '--initial-branch=main']])
  })
})
