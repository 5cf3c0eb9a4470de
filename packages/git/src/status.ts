/**
 * Parser for `git status --porcelain=v2 --branch -z`.
 *
 * WHY: The human-readable status output changes between git versions and
 * locales. Porcelain v2 is git's stable, script-oriented format. With -z,
 * records are NUL-terminated and paths are never quoted, so file names
 * containing spaces or newlines round-trip exactly.
 *
 * Record layouts:
 *   # branch.oid <commit> | (initial)
 *   # branch.head <branch> | (detached)
 *   # branch.upstream <upstream>
 *   # branch.ab +<ahead> -<behind>
 *   1 <XY> <sub> <mH> <mI> <mW> <hH> <hI> <path>
 *   2 <XY> <sub> <mH> <mI> <mW> <hH> <hI> <X><score> <path>NUL<origPath>
 *   u <XY> <sub> <m1> <m2> <m3> <mW> <h1> <h2> <h3> <path>
 *   ? <path>
 *   ! <path>
 */

import { StatusParseError } from '@gitcmd/core'

// ============================================================================
// Types
// ============================================================================

/** Per-side state letter: unmodified, modified, type changed, added, deleted, renamed, copied, unmerged */
export type FileState = '.' | 'M' | 'T' | 'A' | 'D' | 'R' | 'C' | 'U'

/** Submodule state, or `submodule: false` for ordinary files */
export interface SubmoduleState {
  submodule: boolean
  commitChanged: boolean
  trackedChanges: boolean
  untrackedChanges: boolean
}

/** Ordinary tracked change (record type 1) */
export interface ChangedEntry {
  type: 'changed'
  /** State in the index (staged side) */
  index: FileState
  /** State in the working tree */
  worktree: FileState
  submodule: SubmoduleState
  mode: { head: string; index: string; worktree: string }
  object: { head: string; index: string }
  path: string
}

/** Rename or copy (record type 2) */
export interface RenamedEntry extends Omit<ChangedEntry, 'type'> {
  type: 'renamed' | 'copied'
  /** Similarity percentage */
  score: number
  /** Path in HEAD or the index before the rename or copy */
  origPath: string
}

/** Unmerged path (record type u) */
export interface UnmergedEntry {
  type: 'unmerged'
  index: FileState
  worktree: FileState
  submodule: SubmoduleState
  /** Stage 1 (base), 2 (ours), 3 (theirs) */
  stages: [StageEntry, StageEntry, StageEntry]
  worktreeMode: string
  path: string
}

export interface StageEntry {
  mode: string
  object: string
}

/** Branch headers; all null/zero when status ran without --branch */
export interface StatusBranch {
  /** Current commit, null before the first commit */
  oid: string | null
  /** Current branch, null when HEAD is detached */
  head: string | null
  upstream: string | null
  /** Commits on the branch not on its upstream */
  ahead: number
  /** Commits on the upstream not on the branch */
  behind: number
}

export interface Status {
  branch: StatusBranch
  changed: ChangedEntry[]
  renamed: RenamedEntry[]
  unmerged: UnmergedEntry[]
  untracked: string[]
  ignored: string[]
  /** No tracked changes, unmerged or untracked paths (ignored paths do not count) */
  clean: boolean
}

// ============================================================================
// Field helpers
// ============================================================================

const FILE_STATES: ReadonlySet<string> = new Set(['.', 'M', 'T', 'A', 'D', 'R', 'C', 'U'])

function isFileState(value: string): value is FileState {
  return FILE_STATES.has(value)
}

const MODE = /^[0-7]{6}$/
const OBJECT = /^(?:[0-9a-f]{40}|[0-9a-f]{64})$/
const SUBMODULE = /^(?:N\.\.\.|S[C.][M.][U.])$/
const SCORE = /^([RC])(\d{1,3})$/
const AHEAD_BEHIND = /^\+(\d+) -(\d+)$/

/**
 * Split off `count` space-separated fields; the remainder is the path,
 * which may itself contain spaces.
 */
function takeFields(record: string, count: number): { fields: string[]; rest: string } {
  const fields: string[] = []
  let start = 0
  for (let i = 0; i < count; i++) {
    const end = record.indexOf(' ', start)
    if (end === -1) {
      throw new StatusParseError('Truncated status entry', record)
    }
    fields.push(record.slice(start, end))
    start = end + 1
  }
  const rest = record.slice(start)
  if (rest === '') {
    throw new StatusParseError('Missing path in status entry', record)
  }
  return { fields, rest }
}

function field(fields: string[], index: number, record: string): string {
  const value = fields[index]
  if (value === undefined) {
    throw new StatusParseError('Truncated status entry', record)
  }
  return value
}

function parseXY(value: string, record: string): { index: FileState; worktree: FileState } {
  const index = value.charAt(0)
  const worktree = value.charAt(1)
  if (value.length !== 2 || !isFileState(index) || !isFileState(worktree)) {
    throw new StatusParseError('Invalid XY state', record)
  }
  return { index, worktree }
}

function parseSubmodule(value: string, record: string): SubmoduleState {
  if (!SUBMODULE.test(value)) {
    throw new StatusParseError('Invalid submodule state', record)
  }
  return {
    submodule: value.charAt(0) === 'S',
    commitChanged: value.charAt(1) === 'C',
    trackedChanges: value.charAt(2) === 'M',
    untrackedChanges: value.charAt(3) === 'U',
  }
}

function parseMode(value: string, record: string): string {
  if (!MODE.test(value)) {
    throw new StatusParseError('Invalid file mode', record)
  }
  return value
}

function parseObject(value: string, record: string): string {
  if (!OBJECT.test(value)) {
    throw new StatusParseError('Invalid object name', record)
  }
  return value
}

// ============================================================================
// Record parsers
// ============================================================================

function parseHeader(record: string, branch: StatusBranch): void {
  const parts = record.slice(2).split(' ')
  const key = parts[0] ?? ''
  const value = parts.slice(1).join(' ')
  if (key === '') {
    throw new StatusParseError('Empty header', record)
  }

  switch (key) {
    case 'branch.oid':
      branch.oid = value === '(initial)' ? null : parseObject(value, record)
      break
    case 'branch.head':
      if (value === '') throw new StatusParseError('Missing branch name', record)
      branch.head = value === '(detached)' ? null : value
      break
    case 'branch.upstream':
      if (value === '') throw new StatusParseError('Missing upstream name', record)
      branch.upstream = value
      break
    case 'branch.ab': {
      const match = value.match(AHEAD_BEHIND)
      if (!match) throw new StatusParseError('Invalid ahead/behind counts', record)
      branch.ahead = Number.parseInt(match[1] ?? '0', 10)
      branch.behind = Number.parseInt(match[2] ?? '0', 10)
      break
    }
    default:
      // git may add headers (e.g. "# stash <n>"); parsers must skip unknown ones
      break
  }
}

function parseChanged(record: string): ChangedEntry {
  const { fields, rest } = takeFields(record, 8)
  return {
    type: 'changed',
    ...parseXY(field(fields, 1, record), record),
    submodule: parseSubmodule(field(fields, 2, record), record),
    mode: {
      head: parseMode(field(fields, 3, record), record),
      index: parseMode(field(fields, 4, record), record),
      worktree: parseMode(field(fields, 5, record), record),
    },
    object: {
      head: parseObject(field(fields, 6, record), record),
      index: parseObject(field(fields, 7, record), record),
    },
    path: rest,
  }
}

function parseRenamed(record: string, origPath: string | undefined): RenamedEntry {
  const { fields, rest } = takeFields(record, 9)
  const score = field(fields, 8, record).match(SCORE)
  if (!score) {
    throw new StatusParseError('Invalid rename score', record)
  }
  if (origPath === undefined || origPath === '') {
    throw new StatusParseError('Missing original path', record)
  }
  return {
    type: score[1] === 'C' ? 'copied' : 'renamed',
    ...parseXY(field(fields, 1, record), record),
    submodule: parseSubmodule(field(fields, 2, record), record),
    mode: {
      head: parseMode(field(fields, 3, record), record),
      index: parseMode(field(fields, 4, record), record),
      worktree: parseMode(field(fields, 5, record), record),
    },
    object: {
      head: parseObject(field(fields, 6, record), record),
      index: parseObject(field(fields, 7, record), record),
    },
    score: Number.parseInt(score[2] ?? '0', 10),
    origPath,
    path: rest,
  }
}

function parseUnmerged(record: string): UnmergedEntry {
  const { fields, rest } = takeFields(record, 10)
  const stage = (modeIndex: number, objectIndex: number): StageEntry => ({
    mode: parseMode(field(fields, modeIndex, record), record),
    object: parseObject(field(fields, objectIndex, record), record),
  })
  return {
    type: 'unmerged',
    ...parseXY(field(fields, 1, record), record),
    submodule: parseSubmodule(field(fields, 2, record), record),
    stages: [stage(3, 7), stage(4, 8), stage(5, 9)],
    worktreeMode: parseMode(field(fields, 6, record), record),
    path: rest,
  }
}

function parsePathOnly(record: string): string {
  const path = record.slice(2)
  if (path === '') {
    throw new StatusParseError('Missing path in status entry', record)
  }
  return path
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Parse NUL-separated porcelain v2 output.
 *
 * @throws StatusParseError on any record that does not match the format
 */
export function parseStatus(stdout: string): Status {
  const status: Status = {
    branch: { oid: null, head: null, upstream: null, ahead: 0, behind: 0 },
    changed: [],
    renamed: [],
    unmerged: [],
    untracked: [],
    ignored: [],
    clean: true,
  }

  const records = stdout.split('\0')
  // Output ends with a terminating NUL, leaving one empty trailing element
  if (records[records.length - 1] === '') {
    records.pop()
  }

  for (let i = 0; i < records.length; i++) {
    const record = records[i] ?? ''
    const kind = record.slice(0, 2)

    switch (kind) {
      case '# ':
        parseHeader(record, status.branch)
        break
      case '1 ':
        status.changed.push(parseChanged(record))
        break
      case '2 ':
        // The original path follows as its own NUL-terminated record
        i++
        status.renamed.push(parseRenamed(record, records[i]))
        break
      case 'u ':
        status.unmerged.push(parseUnmerged(record))
        break
      case '? ':
        status.untracked.push(parsePathOnly(record))
        break
      case '! ':
        status.ignored.push(parsePathOnly(record))
        break
      default:
        throw new StatusParseError('Unknown status entry', record)
    }
  }

  status.clean =
    status.changed.length === 0 &&
    status.renamed.length === 0 &&
    status.unmerged.length === 0 &&
    status.untracked.length === 0

  return status
}
