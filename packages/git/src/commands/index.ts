export { ActionCommand, type CommandTarget, GitCommand } from './command.js'
export { AddCommand, type AddOptions } from './add.js'
export { CloneCommand, type CloneOptions, defaultCloneDirectory } from './clone.js'
export { CommitCommand, type CommitOptions } from './commit.js'
export { FetchCommand, type FetchOptions } from './fetch.js'
export { InitCommand, type InitOptions } from './init.js'
export {
  NotesCommand,
  type NotesAddOptions,
  type NotesAppendOptions,
  type NotesOptions,
  type NotesRemoveOptions,
  NotesShowCommand,
  type NotesShowOptions,
} from './notes.js'
export { PullCommand, type PullOptions } from './pull.js'
export { PushCommand, type PushOptions } from './push.js'
export {
  RemoteCommand,
  type RemoteAddOptions,
  type RemoteInfo,
  RemoteListCommand,
  type RemoteOptions,
  type RemoteRemoveOptions,
  type RemoteRenameOptions,
  type RemoteSetUrlOptions,
} from './remote.js'
export { StatusCommand, type StatusOptions } from './status.js'
export {
  StashCommand,
  type StashApplyOptions,
  type StashClearOptions,
  type StashDropOptions,
  type StashEntry,
  StashListCommand,
  type StashOptions,
  type StashPushOptions,
} from './stash.js'
export {
  TagCommand,
  type TagCreateOptions,
  type TagDeleteOptions,
  TagListCommand,
  type TagListOptions,
  type TagOptions,
} from './tag.js'
