/**
 * Status command - show working tree state.
 *
 * WHY: Porcelain v2 output is precise but unreadable; this renders it
 * grouped the way people scan a tree: staged, unstaged, conflicted,
 * untracked.
 */

import type { Command } from 'commander'

import type { Status } from '@gitcmd/git'

import { handleCliError, openRepository } from '../helpers.js'
import { colors, symbols } from '../ui.js'

interface StatusCliOptions {
  json?: boolean
}

function section(title: string, entries: string[], color: (text: string) => string): string[] {
  if (entries.length === 0) return []
  return ['', `  ${title}:`, ...entries.map((entry) => `    ${color(entry)}`)]
}

/**
 * Render a status as display lines.
 */
export function formatStatus(status: Status): string[] {
  const { branch } = status
  const lines: string[] = []

  if (branch.head === null) {
    lines.push(`HEAD detached at ${colors.code(branch.oid?.slice(0, 7) ?? '(unknown)')}`)
  } else {
    lines.push(`On branch ${colors.code(branch.head)}${branch.oid === null ? colors.muted(' (no commits yet)') : ''}`)
  }

  if (branch.upstream !== null) {
    const counts: string[] = []
    if (branch.ahead > 0) counts.push(`ahead ${branch.ahead}`)
    if (branch.behind > 0) counts.push(`behind ${branch.behind}`)
    lines.push(`${symbols.arrow} ${branch.upstream}${counts.length > 0 ? ` (${counts.join(', ')})` : ' (up to date)'}`)
  }

  const staged = [
    ...status.changed.filter((entry) => entry.index !== '.').map((entry) => `${entry.index} ${entry.path}`),
    ...status.renamed.map((entry) => `${entry.index} ${entry.origPath} -> ${entry.path}`),
  ]
  const unstaged = [...status.changed, ...status.renamed]
    .filter((entry) => entry.worktree !== '.')
    .map((entry) => `${entry.worktree} ${entry.path}`)

  lines.push(
    ...section('Staged', staged, colors.success),
    ...section('Not staged', unstaged, colors.warn),
    ...section(
      'Unmerged',
      status.unmerged.map((entry) => `${entry.index}${entry.worktree} ${entry.path}`),
      colors.error
    ),
    ...section('Untracked', status.untracked, colors.muted)
  )

  if (status.clean) {
    lines.push('', `${symbols.success} Working tree clean`)
  }

  return lines
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show the working tree status')
    .option('--json', 'Output as JSON')
    .action(async (options: StatusCliOptions, command: Command) => {
      try {
        const repo = await openRepository(command)
        const status = await repo.status()

        if (options.json) {
          console.log(JSON.stringify(status, null, 2))
          return
        }
        for (const line of formatStatus(status)) {
          console.log(line)
        }
      } catch (error) {
        handleCliError(error)
      }
    })
}
