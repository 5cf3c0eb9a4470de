/**
 * Remote commands - manage tracked repositories.
 */

import type { Command } from 'commander'

import { RemoteCommand, RemoteListCommand } from '@gitcmd/git'

import { handleCliError, openRepository } from '../helpers.js'
import { colors, success } from '../ui.js'

interface RemoteAddCliOptions {
  fetch?: boolean
  tags?: boolean
  master?: string
}

interface RemoteListCliOptions {
  json?: boolean
}

function registerRemoteListCommand(parent: Command): void {
  parent
    .command('list', { isDefault: true })
    .description('List remotes with their URLs')
    .option('--json', 'Output as JSON')
    .action(async (options: RemoteListCliOptions, command: Command) => {
      try {
        const repo = await openRepository(command)
        const remotes = await repo.run(new RemoteListCommand())

        if (options.json) {
          console.log(JSON.stringify(remotes, null, 2))
          return
        }
        for (const remote of remotes) {
          const push = remote.pushUrl !== remote.fetchUrl ? colors.muted(` (push: ${remote.pushUrl})`) : ''
          console.log(`${colors.code(remote.name)}\t${remote.fetchUrl}${push}`)
        }
      } catch (error) {
        handleCliError(error)
      }
    })
}

function registerRemoteAddCommand(parent: Command): void {
  parent
    .command('add')
    .description('Add a remote')
    .argument('<name>', 'Remote name')
    .argument('<url>', 'Remote URL')
    .option('-f, --fetch', 'Fetch after adding')
    .option('--no-tags', 'Do not fetch tags from this remote')
    .option('-m, --master <branch>', "Branch for the remote's HEAD")
    .action(async (name: string, url: string, options: RemoteAddCliOptions, command: Command) => {
      try {
        const repo = await openRepository(command)
        await repo.run(
          new RemoteCommand({
            action: 'add',
            name,
            url,
            fetch: options.fetch,
            tags: options.tags === false ? false : undefined,
            master: options.master,
          })
        )
        success(`Added remote ${colors.code(name)}`)
      } catch (error) {
        handleCliError(error)
      }
    })
}

function registerRemoteRemoveCommand(parent: Command): void {
  parent
    .command('remove')
    .description('Remove a remote')
    .argument('<name>', 'Remote name')
    .action(async (name: string, _options: Record<string, never>, command: Command) => {
      try {
        const repo = await openRepository(command)
        await repo.run(new RemoteCommand({ action: 'remove', name }))
        success(`Removed remote ${colors.code(name)}`)
      } catch (error) {
        handleCliError(error)
      }
    })
}

function registerRemoteRenameCommand(parent: Command): void {
  parent
    .command('rename')
    .description('Rename a remote')
    .argument('<old>', 'Current name')
    .argument('<new>', 'New name')
    .action(async (name: string, newName: string, _options: Record<string, never>, command: Command) => {
      try {
        const repo = await openRepository(command)
        await repo.run(new RemoteCommand({ action: 'rename', name, newName }))
        success(`Renamed remote ${colors.code(name)} to ${colors.code(newName)}`)
      } catch (error) {
        handleCliError(error)
      }
    })
}

function registerRemoteSetUrlCommand(parent: Command): void {
  parent
    .command('set-url')
    .description('Change the URL of a remote')
    .argument('<name>', 'Remote name')
    .argument('<url>', 'New URL')
    .option('--push', 'Change the push URL only')
    .action(async (name: string, url: string, options: { push?: boolean }, command: Command) => {
      try {
        const repo = await openRepository(command)
        await repo.run(new RemoteCommand({ action: 'set-url', name, url, push: options.push }))
        success(`Updated remote ${colors.code(name)}`)
      } catch (error) {
        handleCliError(error)
      }
    })
}

/**
 * Register all remote subcommands.
 */
export function registerRemoteCommands(program: Command): void {
  const remote = program.command('remote').description('Manage remotes')

  registerRemoteListCommand(remote)
  registerRemoteAddCommand(remote)
  registerRemoteRemoveCommand(remote)
  registerRemoteRenameCommand(remote)
  registerRemoteSetUrlCommand(remote)
}
