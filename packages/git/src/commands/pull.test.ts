import { describe, expect, test } from 'vitest'

import { PullCommand } from './pull.js'

describe('PullCommand', () => {
  test('defaults', () => {
    expect(new PullCommand().args()).toEqual(['pull', '-q'])
  })

  test('options then remote and refspecs', () => {
    expect(
      new PullCommand({ remote: 'origin', refspecs: ['main'], rebase: true, allowUnrelatedHistories: true }).args()
    ).toEqual(['pull', '-q', '--rebase', '--allow-unrelated-histories', 'origin', 'main'])
  })

  test('conflicts', () => {
    expect(() => new PullCommand({ rebase: true, ffOnly: true }).args()).toThrow('ffOnly cannot be combined with rebase')
    expect(() => new PullCommand({ refspecs: ['main'] }).args()).toThrow('refspecs require a remote')
  })
})
