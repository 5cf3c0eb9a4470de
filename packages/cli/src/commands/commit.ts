/**
 * Commit command - record staged changes.
 */

import type { Command } from 'commander'

import { CommitCommand } from '@gitcmd/git'

import { handleCliError, openRepository } from '../helpers.js'
import { success } from '../ui.js'

interface CommitCliOptions {
  message?: string
  all?: boolean
  allowEmpty?: boolean
  amend?: boolean
  edit?: boolean
}

export function registerCommitCommand(program: Command): void {
  program
    .command('commit')
    .description('Record staged changes')
    .argument('[files...]', 'Commit only these paths')
    .option('-m, --message <msg>', 'Commit message')
    .option('-a, --all', 'Stage modified and deleted tracked files first')
    .option('--allow-empty', 'Allow a commit with no changes')
    .option('--amend', 'Replace the last commit')
    .option('--no-edit', 'Keep the amended commit message')
    .action(async (files: string[], options: CommitCliOptions, command: Command) => {
      try {
        const repo = await openRepository(command)
        await repo.run(
          new CommitCommand({
            message: options.message,
            all: options.all,
            allowEmpty: options.allowEmpty,
            amend: options.amend,
            noEdit: options.edit === false,
            files,
          })
        )
        success(options.amend ? 'Amended last commit' : 'Committed')
      } catch (error) {
        handleCliError(error)
      }
    })
}
