/**
 * @gitcmd/cli - Command line interface for gitcmd.
 *
 * WHY: Provides a thin argument parsing layer that delegates
 * all git work to the git package. This keeps the CLI
 * focused on user interaction while the library renders and runs commands.
 */

import { Command } from 'commander'

import { registerAddCommand } from './commands/add.js'
import { registerCloneCommand } from './commands/clone.js'
import { registerCommitCommand } from './commands/commit.js'
import { registerFetchCommand } from './commands/fetch.js'
import { registerInitCommand } from './commands/init.js'
import { registerNotesCommands } from './commands/notes.js'
import { registerPullCommand } from './commands/pull.js'
import { registerPushCommand } from './commands/push.js'
import { registerRemoteCommands } from './commands/remote.js'
import { registerStashCommands } from './commands/stash.js'
import { registerStatusCommand } from './commands/status.js'
import { registerTagCommand } from './commands/tag.js'
import { formatError } from './helpers.js'

export { formatError } from './helpers.js'
export { cloneTarget } from './commands/clone.js'
export { formatStatus } from './commands/status.js'
export { parseIndex, parsePositiveInt } from './commands/parsers.js'

/**
 * Create the CLI program.
 */
export function createProgram(): Command {
  const program = new Command()
    .name('gitcmd')
    .description('Typed wrappers around the git command line')
    .version('0.1.0')
    .option('-C, --repo <path>', 'Run as if started in <path>')
    .option('--config <path>', 'Path to config.toml (default: $GITCMD_HOME/config.toml)')
    .option('--verbose', 'Log each git invocation to stderr')

  // Register all commands
  registerInitCommand(program)
  registerCloneCommand(program)
  registerStatusCommand(program)
  registerAddCommand(program)
  registerCommitCommand(program)
  registerFetchCommand(program)
  registerPullCommand(program)
  registerPushCommand(program)
  registerRemoteCommands(program)
  registerStashCommands(program)
  registerTagCommand(program)
  registerNotesCommands(program)

  return program
}

/**
 * Main entry point.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram()

  try {
    await program.parseAsync(argv)
  } catch (error) {
    console.error(formatError(error))
    process.exit(1)
  }
}
