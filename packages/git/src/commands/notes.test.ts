import { describe, expect, test } from 'vitest'

import { NotesCommand, NotesShowCommand } from './notes.js'

describe('NotesCommand', () => {
  test('add on HEAD', () => {
    expect(new NotesCommand({ action: 'add', message: 'Reviewed' }).args()).toEqual(['notes', 'add', '-m', 'Reviewed'])
  })

  test('forced add on an object', () => {
    expect(new NotesCommand({ action: 'add', message: 'Deployed', object: 'v1.0.0', force: true }).args()).toEqual([
      'notes',
      'add',
      '-f',
      '-m',
      'Deployed',
      'v1.0.0',
    ])
  })

  test('append', () => {
    expect(new NotesCommand({ action: 'append', message: 'More' }).args()).toEqual(['notes', 'append', '-m', 'More'])
  })

  test('remove', () => {
    expect(new NotesCommand({ action: 'remove', object: 'HEAD~1', ignoreMissing: true }).args()).toEqual([
      'notes',
      'remove',
      '--ignore-missing',
      'HEAD~1',
    ])
  })

  test('message is required', () => {
    expect(() => new NotesCommand({ action: 'add', message: '' }).args()).toThrow(
      'Invalid options for git notes: message is required'
    )
  })
})

describe('NotesShowCommand', () => {
  test('args', () => {
    expect(new NotesShowCommand().args()).toEqual(['notes', 'show'])
    expect(new NotesShowCommand({ object: 'v1.0.0' }).args()).toEqual(['notes', 'show', 'v1.0.0'])
  })

  test('strips one trailing newline', () => {
    expect(new NotesShowCommand().parse({ exitCode: 0, stdout: 'line one\nline two\n', stderr: '' })).toBe(
      'line one\nline two'
    )
  })
})
