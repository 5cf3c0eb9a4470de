/**
 * Argument parsers shared by commands.
 */

import { InvalidArgumentError } from 'commander'

/**
 * Parse a non-negative integer argument (stash index).
 */
export function parseIndex(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Must be a non-negative integer.')
  }
  return Number.parseInt(value, 10)
}

/**
 * Parse a positive integer option (clone depth).
 */
export function parsePositiveInt(value: string): number {
  const parsed = /^\d+$/.test(value) ? Number.parseInt(value, 10) : 0
  if (parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return parsed
}
