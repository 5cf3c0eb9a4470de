/**
 * Tests for the config.toml parser
 *
 * WHY: Configuration decides which git binary runs and with which
 * environment. These tests cover parsing, validation, defaults and
 * environment overrides.
 */

import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { ConfigParseError, ConfigValidationError } from '../errors.js'
import {
  DEFAULT_CONFIG,
  loadConfig,
  parseConfigToml,
  readConfigToml,
  resolveConfig,
  serializeConfigToml,
} from './config-toml.js'

const FULL_TOML = `output = "inherit"

[git]
binary = "/usr/local/bin/git"
timeout = 30000

[git.env]
GIT_AUTHOR_NAME = "Test User"
`

describe('parseConfigToml', () => {
  test('parses a full config', () => {
    const config = parseConfigToml(FULL_TOML)
    expect(config).toEqual({
      output: 'inherit',
      git: {
        binary: '/usr/local/bin/git',
        timeout: 30000,
        env: { GIT_AUTHOR_NAME: 'Test User' },
      },
    })
  })

  test('accepts an empty file', () => {
    expect(parseConfigToml('')).toEqual({})
  })

  test('throws ConfigParseError on invalid TOML', () => {
    expect(() => parseConfigToml('output = ', 'bad.toml')).toThrow(ConfigParseError)
  })

  test('reports unknown properties', () => {
    try {
      parseConfigToml('colour = "red"\n')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError)
      const error = err as ConfigValidationError
      expect(error.validationErrors).toHaveLength(1)
      expect(error.validationErrors[0]?.path).toBe('/')
      expect(error.validationErrors[0]?.message).toBe('unknown property "colour"')
    }
  })

  test('reports invalid output mode', () => {
    try {
      parseConfigToml('output = "print"\n', 'config.toml')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError)
      const error = err as ConfigValidationError
      expect(error.source).toBe('config.toml')
      expect(error.validationErrors[0]?.path).toBe('/output')
      expect(error.validationErrors[0]?.message).toBe('must be one of: pipe, inherit')
    }
  })

  test('rejects a non-integer timeout', () => {
    expect(() => parseConfigToml('[git]\ntimeout = "slow"\n')).toThrow(ConfigValidationError)
  })
})

describe('resolveConfig', () => {
  test('returns defaults without a file', () => {
    expect(resolveConfig(null, {})).toEqual(DEFAULT_CONFIG)
  })

  test('merges file values over defaults', () => {
    const config = resolveConfig(parseConfigToml(FULL_TOML), {})
    expect(config.output).toBe('inherit')
    expect(config.git.binary).toBe('/usr/local/bin/git')
    expect(config.git.timeout).toBe(30000)
    expect(config.git.env).toEqual({ GIT_AUTHOR_NAME: 'Test User' })
  })

  test('GITCMD_GIT_BINARY overrides the file', () => {
    const config = resolveConfig(parseConfigToml(FULL_TOML), { GITCMD_GIT_BINARY: '/opt/git' })
    expect(config.git.binary).toBe('/opt/git')
  })

  test('leaves timeout unset when not configured', () => {
    expect(resolveConfig({ git: { binary: 'git' } }, {}).git.timeout).toBeUndefined()
  })
})

describe('file access', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'gitcmd-config-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  test('readConfigToml returns null for a missing file', async () => {
    expect(await readConfigToml(join(dir, 'config.toml'))).toBeNull()
  })

  test('loadConfig reads an explicit path', async () => {
    const path = join(dir, 'config.toml')
    await writeFile(path, '[git]\nbinary = "git2"\n')
    const config = await loadConfig(path)
    expect(config.git.binary).toBe(process.env['GITCMD_GIT_BINARY'] || 'git2')
    expect(config.output).toBe('pipe')
  })

  test('serializeConfigToml round-trips', () => {
    const file = parseConfigToml(FULL_TOML)
    expect(parseConfigToml(serializeConfigToml(file))).toEqual(file)
  })
})
