/**
 * Notes commands - attach notes to commits.
 */

import type { Command } from 'commander'

import { NotesCommand, NotesShowCommand } from '@gitcmd/git'

import { handleCliError, openRepository } from '../helpers.js'
import { success } from '../ui.js'

function registerNotesAddCommand(parent: Command): void {
  parent
    .command('add', { isDefault: true })
    .description('Add a note to an object')
    .argument('<message>', 'Note text')
    .argument('[object]', 'Object to annotate (default: HEAD)')
    .option('-f, --force', 'Replace an existing note')
    .action(async (message: string, object: string | undefined, options: { force?: boolean }, command: Command) => {
      try {
        const repo = await openRepository(command)
        await repo.run(new NotesCommand({ action: 'add', message, object, force: options.force }))
        success('Added note')
      } catch (error) {
        handleCliError(error)
      }
    })
}

function registerNotesAppendCommand(parent: Command): void {
  parent
    .command('append')
    .description("Append to an object's note")
    .argument('<message>', 'Text to append')
    .argument('[object]', 'Object (default: HEAD)')
    .action(async (message: string, object: string | undefined, _options: Record<string, never>, command: Command) => {
      try {
        const repo = await openRepository(command)
        await repo.run(new NotesCommand({ action: 'append', message, object }))
        success('Appended to note')
      } catch (error) {
        handleCliError(error)
      }
    })
}

function registerNotesRemoveCommand(parent: Command): void {
  parent
    .command('remove')
    .description("Remove an object's note")
    .argument('[object]', 'Object (default: HEAD)')
    .option('--ignore-missing', 'Succeed when there is no note')
    .action(async (object: string | undefined, options: { ignoreMissing?: boolean }, command: Command) => {
      try {
        const repo = await openRepository(command)
        await repo.run(new NotesCommand({ action: 'remove', object, ignoreMissing: options.ignoreMissing }))
        success('Removed note')
      } catch (error) {
        handleCliError(error)
      }
    })
}

function registerNotesShowCommand(parent: Command): void {
  parent
    .command('show')
    .description("Print an object's note")
    .argument('[object]', 'Object (default: HEAD)')
    .action(async (object: string | undefined, _options: Record<string, never>, command: Command) => {
      try {
        const repo = await openRepository(command)
        console.log(await repo.run(new NotesShowCommand({ object })))
      } catch (error) {
        handleCliError(error)
      }
    })
}

/**
 * Register all notes subcommands.
 */
export function registerNotesCommands(program: Command): void {
  const notes = program.command('notes').description('Attach notes to commits')

  registerNotesAddCommand(notes)
  registerNotesAppendCommand(notes)
  registerNotesRemoveCommand(notes)
  registerNotesShowCommand(notes)
}
