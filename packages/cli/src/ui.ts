/**
 * Terminal UI utilities for the gitcmd CLI.
 *
 * Sparse, meaningful color; unicode symbols for outcome.
 */

import chalk from 'chalk'
import figures from 'figures'
import ora, { type Ora } from 'ora'

// ═══════════════════════════════════════════════════════════════════════════
// Color Palette
// ═══════════════════════════════════════════════════════════════════════════

export const colors = {
  success: chalk.hex('#10b981'), // emerald
  info: chalk.hex('#6366f1'), // indigo
  warn: chalk.hex('#f59e0b'), // amber
  error: chalk.hex('#ef4444'), // red
  muted: chalk.hex('#6b7280'), // gray-500
  // Accent for refs and paths
  code: chalk.hex('#a78bfa'), // violet-400
  dim: chalk.hex('#4b5563'), // gray-600
}

// ═══════════════════════════════════════════════════════════════════════════
// Symbols
// ═══════════════════════════════════════════════════════════════════════════

export const symbols = {
  success: colors.success(figures.tick),
  error: colors.error(figures.cross),
  warning: colors.warn(figures.warning),
  bullet: colors.muted(figures.bullet),
  arrow: colors.muted('→'),
}

// ═══════════════════════════════════════════════════════════════════════════
// Spinner
// ═══════════════════════════════════════════════════════════════════════════

export function createSpinner(text: string): Ora {
  return ora({
    text: colors.muted(text),
    spinner: 'dots',
    color: 'gray',
    stream: process.stderr,
  })
}

/**
 * Run a task behind a spinner. The spinner stops before the result or
 * error is handed back.
 */
export async function withSpinner<T>(text: string, task: () => Promise<T>): Promise<T> {
  const spinner = createSpinner(text).start()
  try {
    return await task()
  } finally {
    spinner.stop()
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Output
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Print a success message with checkmark
 */
export function success(text: string): void {
  console.log(`${symbols.success} ${text}`)
}

/**
 * Print a warning message
 */
export function warning(text: string): void {
  console.log(`${symbols.warning} ${colors.warn(text)}`)
}

/**
 * Format a file path for display (shorten home dir)
 */
export function formatPath(filePath: string): string {
  const home = process.env['HOME'] ?? ''
  if (home && (filePath === home || filePath.startsWith(`${home}/`))) {
    return `~${filePath.slice(home.length)}`
  }
  return filePath
}
