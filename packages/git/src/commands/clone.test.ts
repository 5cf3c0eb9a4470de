import { describe, expect, test } from 'vitest'

import { OptionsError } from '@gitcmd/core'

import { CloneCommand, defaultCloneDirectory } from './clone.js'

describe('CloneCommand', () => {
  test('url and directory', () => {
    expect(new CloneCommand({ url: '../upstream.git', directory: 'copy' }).args()).toEqual([
      'clone',
      '-q',
      '../upstream.git',
      'copy',
    ])
  })

  test('all options', () => {
    const command = new CloneCommand({
      url: 'https://example.com/team/project.git',
      branch: 'develop',
      origin: 'upstream',
      depth: 1,
      bare: true,
    })
    expect(command.args()).toEqual([
      'clone',
      '-q',
      '--branch',
      'develop',
      '--origin',
      'upstream',
      '--depth',
      '1',
      '--bare',
      'https://example.com/team/project.git',
    ])
  })

  test('requires a url', () => {
    expect(() => new CloneCommand({ url: '' }).args()).toThrow('Invalid options for git clone: url is required')
  })

  test('rejects a url that looks like a flag', () => {
    expect(() => new CloneCommand({ url: '--upload-pack=touch /tmp/x' }).args()).toThrow(OptionsError)
  })

  test('depth must be at least 1', () => {
    expect(() => new CloneCommand({ url: 'a', depth: 0 }).args()).toThrow('depth must be at least 1 (got 0)')
    expect(() => new CloneCommand({ url: 'a', depth: -2 }).args()).toThrow(OptionsError)
  })
})

describe('defaultCloneDirectory', () => {
  test('derives the name git would use', () => {
    expect(defaultCloneDirectory('https://example.com/team/project.git')).toBe('project')
    expect(defaultCloneDirectory('git@example.com:team/tools')).toBe('tools')
    expect(defaultCloneDirectory('/srv/git/app/')).toBe('app')
    expect(defaultCloneDirectory('/srv/git/site/.git')).toBe('site')
  })

  test('throws when nothing is left', () => {
    expect(() => defaultCloneDirectory('/')).toThrow(OptionsError)
  })
})
