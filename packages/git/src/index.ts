/**
 * @gitcmd/git - typed git subcommands run as child processes.
 */

export * from './commands/index.js'

export {
  type GitExecOptions,
  type GitLogger,
  gitExec,
  gitExecLines,
  gitExecStdout,
  splitLines,
} from './exec.js'

export { FakeGitRunner, type FakeReply } from './fake-runner.js'

export { Repository, type RepositoryOptions } from './repository.js'

export {
  type GitExecResult,
  type GitRunRequest,
  type GitRunner,
  NodeGitRunner,
  formatCommand,
} from './runner.js'

export {
  type ChangedEntry,
  type FileState,
  type RenamedEntry,
  type StageEntry,
  type Status,
  type StatusBranch,
  type SubmoduleState,
  type UnmergedEntry,
  parseStatus,
} from './status.js'

export { checkResult, classifyFailure, subcommandOf } from './translate.js'

export { isValidRefName } from './validate.js'
