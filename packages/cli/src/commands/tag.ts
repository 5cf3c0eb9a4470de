/**
 * Tag command - create, delete or list tags.
 */

import type { Command } from 'commander'

import { TagCommand, TagListCommand } from '@gitcmd/git'

import { handleCliError, openRepository } from '../helpers.js'
import { colors, success } from '../ui.js'

interface TagCliOptions {
  message?: string
  annotate?: boolean
  force?: boolean
  delete?: boolean
  list?: boolean
}

export function registerTagCommand(program: Command): void {
  program
    .command('tag')
    .description('Create a tag on HEAD, delete one, or list them')
    .argument('[name]', 'Tag name (a glob pattern with --list)')
    .argument('[object]', 'Object to tag (default: HEAD)')
    .option('-m, --message <msg>', 'Annotation message')
    .option('-a, --annotate', 'Create an annotated tag')
    .option('-f, --force', 'Replace an existing tag')
    .option('-d, --delete', 'Delete the tag')
    .option('-l, --list', 'List tags, optionally matching the name as a pattern')
    .action(async (name: string | undefined, object: string | undefined, options: TagCliOptions, command: Command) => {
      try {
        const repo = await openRepository(command)

        if (options.list || name === undefined) {
          const tags = await repo.run(new TagListCommand({ pattern: name }))
          for (const tag of tags) {
            console.log(tag)
          }
          if (tags.length === 0) {
            console.log(colors.muted('No tags'))
          }
          return
        }

        if (options.delete) {
          await repo.run(new TagCommand({ action: 'delete', name }))
          success(`Deleted tag ${colors.code(name)}`)
          return
        }

        await repo.run(
          new TagCommand({
            action: 'create',
            name,
            object,
            message: options.message,
            annotate: options.annotate,
            force: options.force,
          })
        )
        success(`Tagged ${colors.code(name)}`)
      } catch (error) {
        handleCliError(error)
      }
    })
}
