import { describe, expect, test } from 'vitest'

import { StatusCommand } from './status.js'

describe('StatusCommand', () => {
  test('always porcelain v2 with branch headers', () => {
    expect(new StatusCommand().args()).toEqual(['status', '--porcelain=v2', '--branch', '-z'])
  })

  test('options', () => {
    expect(new StatusCommand({ ignored: true, untrackedFiles: 'all', pathspecs: ['src'] }).args()).toEqual([
      'status',
      '--porcelain=v2',
      '--branch',
      '-z',
      '--ignored',
      '--untracked-files=all',
      '--',
      'src',
    ])
  })

  test('parses stdout', () => {
    const status = new StatusCommand().parse({ exitCode: 0, stdout: '# branch.head main\0? todo.txt\0', stderr: '' })
    expect(status.branch.head).toBe('main')
    expect(status.untracked).toEqual(['todo.txt'])
    expect(status.clean).toBe(false)
  })
})
