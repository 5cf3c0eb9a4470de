/**
 * Stash commands - shelve and restore local changes.
 */

import type { Command } from 'commander'

import { StashCommand, StashListCommand } from '@gitcmd/git'

import { handleCliError, openRepository } from '../helpers.js'
import { colors, success } from '../ui.js'
import { parseIndex } from './parsers.js'

interface StashPushCliOptions {
  message?: string
  includeUntracked?: boolean
  keepIndex?: boolean
}

interface StashApplyCliOptions {
  index?: boolean
}

function registerStashPushCommand(parent: Command): void {
  parent
    .command('push', { isDefault: true })
    .description('Save local changes and clean the working tree')
    .argument('[pathspecs...]', 'Limit to these paths')
    .option('-m, --message <msg>', 'Stash description')
    .option('-u, --include-untracked', 'Include untracked files')
    .option('-k, --keep-index', 'Leave staged changes in place')
    .action(async (pathspecs: string[], options: StashPushCliOptions, command: Command) => {
      try {
        const repo = await openRepository(command)
        await repo.run(
          new StashCommand({
            action: 'push',
            message: options.message,
            includeUntracked: options.includeUntracked,
            keepIndex: options.keepIndex,
            pathspecs,
          })
        )
        success('Saved local changes')
      } catch (error) {
        handleCliError(error)
      }
    })
}

function registerStashRestoreCommand(parent: Command, action: 'pop' | 'apply', description: string): void {
  parent
    .command(action)
    .description(description)
    .argument('[index]', 'Stash entry (default: latest)', parseIndex)
    .option('--index', 'Restore the index too')
    .action(async (index: number | undefined, options: StashApplyCliOptions, command: Command) => {
      try {
        const repo = await openRepository(command)
        await repo.run(new StashCommand({ action, index, restoreIndex: options.index }))
        success(action === 'pop' ? 'Restored and dropped stash entry' : 'Applied stash entry')
      } catch (error) {
        handleCliError(error)
      }
    })
}

function registerStashDropCommand(parent: Command): void {
  parent
    .command('drop')
    .description('Discard a stash entry')
    .argument('[index]', 'Stash entry (default: latest)', parseIndex)
    .action(async (index: number | undefined, _options: Record<string, never>, command: Command) => {
      try {
        const repo = await openRepository(command)
        await repo.run(new StashCommand({ action: 'drop', index }))
        success('Dropped stash entry')
      } catch (error) {
        handleCliError(error)
      }
    })
}

function registerStashListCommand(parent: Command): void {
  parent
    .command('list')
    .description('List stash entries')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }, command: Command) => {
      try {
        const repo = await openRepository(command)
        const entries = await repo.run(new StashListCommand())

        if (options.json) {
          console.log(JSON.stringify(entries, null, 2))
          return
        }
        for (const entry of entries) {
          console.log(`${colors.code(entry.ref)} ${entry.message}`)
        }
      } catch (error) {
        handleCliError(error)
      }
    })
}

function registerStashClearCommand(parent: Command): void {
  parent
    .command('clear')
    .description('Remove all stash entries')
    .action(async (_options: Record<string, never>, command: Command) => {
      try {
        const repo = await openRepository(command)
        await repo.run(new StashCommand({ action: 'clear' }))
        success('Cleared stash')
      } catch (error) {
        handleCliError(error)
      }
    })
}

/**
 * Register all stash subcommands.
 */
export function registerStashCommands(program: Command): void {
  const stash = program.command('stash').description('Shelve and restore local changes')

  registerStashPushCommand(stash)
  registerStashRestoreCommand(stash, 'pop', 'Restore a stash entry and drop it')
  registerStashRestoreCommand(stash, 'apply', 'Restore a stash entry and keep it')
  registerStashDropCommand(stash)
  registerStashListCommand(stash)
  registerStashClearCommand(stash)
}
