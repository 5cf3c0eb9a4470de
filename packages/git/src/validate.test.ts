/**
 * Tests for option validation helpers.
 *
 * WHY: These checks run before any process is spawned; a name git would
 * reject, or a value git would read as a flag, must fail here.
 */

import { describe, expect, test } from 'vitest'

import { OptionsError } from '@gitcmd/core'

import { checkIndex, checkPathspecs, isValidRefName, requirePositional, requireRefName, requireText } from './validate.js'

describe('isValidRefName', () => {
  test('accepts ordinary names', () => {
    expect(isValidRefName('main')).toBe(true)
    expect(isValidRefName('feature/login-form')).toBe(true)
    expect(isValidRefName('v1.2.3')).toBe(true)
  })

  test('rejects names git refuses', () => {
    for (const name of [
      '',
      '@',
      '.hidden',
      '/leading',
      '-flag',
      'trailing/',
      'trailing.',
      'branch.lock',
      'a..b',
      'a@{1}',
      'a//b',
      'with space',
      'tilde~1',
      'caret^',
      'colon:x',
      'what?',
      'star*',
      'open[',
      'back\\slash',
      'dir/.hidden',
      'dir/x.lock/y',
    ]) {
      expect(isValidRefName(name)).toBe(false)
    }
  })
})

describe('requireText', () => {
  test('returns the value unchanged', () => {
    expect(requireText('commit', 'message', ' spaced ')).toBe(' spaced ')
  })

  test('rejects missing and blank values', () => {
    expect(() => requireText('commit', 'message', undefined)).toThrow(
      'Invalid options for git commit: message is required'
    )
    expect(() => requireText('commit', 'message', '   ')).toThrow(OptionsError)
  })
})

describe('requirePositional', () => {
  test('rejects values that look like flags', () => {
    expect(() => requirePositional('remote', 'url', '--upload-pack=evil')).toThrow(
      'Invalid options for git remote: url must not start with "-" (got "--upload-pack=evil")'
    )
  })
})

describe('requireRefName', () => {
  test('names the field and value', () => {
    expect(() => requireRefName('tag', 'name', 'bad name')).toThrow(
      'Invalid options for git tag: name is not a valid ref name (got "bad name")'
    )
    try {
      requireRefName('tag', 'name', 'bad name')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(OptionsError)
      expect(err).toMatchObject({ subcommand: 'tag', field: 'name' })
    }
  })
})

describe('checkPathspecs', () => {
  test('allows a leading dash after --', () => {
    expect(checkPathspecs('add', 'pathspecs', ['-odd-file'])).toEqual(['-odd-file'])
  })

  test('rejects empty paths', () => {
    expect(() => checkPathspecs('add', 'pathspecs', ['a', ''])).toThrow(OptionsError)
  })
})

describe('checkIndex', () => {
  test('accepts zero', () => {
    expect(checkIndex('stash', 'index', 0)).toBe(0)
  })

  test('rejects negative and fractional values', () => {
    expect(() => checkIndex('stash', 'index', -1)).toThrow('must be a non-negative integer (got -1)')
    expect(() => checkIndex('stash', 'index', 1.5)).toThrow(OptionsError)
  })
})
