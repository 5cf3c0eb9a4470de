/**
 * Configuration types for gitcmd
 *
 * The config file (config.toml under GITCMD_HOME) tunes how the
 * git binary is located and invoked.
 */

/** Where a git child process writes its output */
export type OutputMode = 'pipe' | 'inherit'

/** `[git]` table as written in config.toml */
export interface GitSection {
  /** Executable name or absolute path (default: "git") */
  binary?: string | undefined
  /** Kill git after this many milliseconds (default: no limit) */
  timeout?: number | undefined
  /** Extra environment variables for every git process */
  env?: Record<string, string> | undefined
}

/** config.toml as parsed, every field optional */
export interface ConfigFile {
  /** "pipe" captures git output, "inherit" prints it to the terminal */
  output?: OutputMode | undefined
  git?: GitSection | undefined
}

/** Fully resolved configuration */
export interface GitcmdConfig {
  output: OutputMode
  git: {
    binary: string
    timeout?: number | undefined
    env: Record<string, string>
  }
}
