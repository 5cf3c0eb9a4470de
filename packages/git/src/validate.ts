/**
 * Option checks shared by the command builders.
 *
 * WHY: A missing commit message or a tag name that git would reject should
 * fail before a process is spawned, naming the offending field. Values
 * rendered as positional arguments must not start with '-', or git would
 * read them as flags.
 */

import { OptionsError } from '@gitcmd/core'

/**
 * Check a name against git's ref-name rules (see git-check-ref-format).
 *
 * A name must not:
 * - be empty or the single character '@'
 * - start with '.', '/' or '-'
 * - end with '/', '.' or '.lock'
 * - contain '..', '@{' or '//'
 * - contain a space, control character or any of ~ ^ : ? * [ \
 * - have a path component starting with '.'
 */
export function isValidRefName(name: string): boolean {
  if (!name || name === '@') {
    return false
  }
  if (name.startsWith('.') || name.startsWith('/') || name.startsWith('-')) {
    return false
  }
  if (name.endsWith('/') || name.endsWith('.') || name.endsWith('.lock')) {
    return false
  }
  if (name.includes('..') || name.includes('@{') || name.includes('//')) {
    return false
  }
  if (/[\x00-\x20\x7f~^:?*[\\]/.test(name)) {
    return false
  }
  return !name.split('/').some((component) => component.startsWith('.') || component.endsWith('.lock'))
}

/**
 * Require a non-blank string.
 */
export function requireText(subcommand: string, field: string, value: string | undefined): string {
  if (value === undefined || value.trim() === '') {
    throw new OptionsError(subcommand, field, 'is required')
  }
  return value
}

/**
 * Check a value rendered as a positional argument.
 */
export function checkPositional(subcommand: string, field: string, value: string): string {
  if (value.trim() === '') {
    throw new OptionsError(subcommand, field, 'must not be empty')
  }
  if (value.startsWith('-')) {
    throw new OptionsError(subcommand, field, `must not start with "-" (got "${value}")`)
  }
  return value
}

/**
 * Require a positional argument.
 */
export function requirePositional(subcommand: string, field: string, value: string | undefined): string {
  return checkPositional(subcommand, field, requireText(subcommand, field, value))
}

/**
 * Check an optional positional argument when it is set.
 */
export function optionalPositional(
  subcommand: string,
  field: string,
  value: string | undefined
): string | undefined {
  return value === undefined ? undefined : checkPositional(subcommand, field, value)
}

/**
 * Require a valid ref name (branch, tag or remote name).
 */
export function requireRefName(subcommand: string, field: string, value: string | undefined): string {
  const name = requirePositional(subcommand, field, value)
  if (!isValidRefName(name)) {
    throw new OptionsError(subcommand, field, `is not a valid ref name (got "${name}")`)
  }
  return name
}

/**
 * Check a list of positional arguments (refspecs).
 */
export function checkPositionals(subcommand: string, field: string, values: readonly string[]): string[] {
  return values.map((value) => checkPositional(subcommand, field, value))
}

/**
 * Check a list of pathspecs. These follow `--`, so a leading '-' is allowed.
 */
export function checkPathspecs(subcommand: string, field: string, values: readonly string[]): string[] {
  for (const value of values) {
    if (value === '') {
      throw new OptionsError(subcommand, field, 'must not contain empty paths')
    }
  }
  return [...values]
}

/**
 * Require a non-negative integer.
 */
export function checkIndex(subcommand: string, field: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new OptionsError(subcommand, field, `must be a non-negative integer (got ${value})`)
  }
  return value
}
