/**
 * Loaded dotfiles configuration
 */
export interface DotfilesConfig {
  /** Paths relative to the home directory, in processing order */
  readonly dotfiles: readonly string[];
}

/**
 * Options shared by all commands
 */
export interface CommandOptions {
  verbose?: boolean;
  dryRun?: boolean;
}

/**
 * Result returned by every command
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message?: string;
  data?: T;
  error?: Error;
  exitCode: number;
}

/**
 * Well-known paths, relative to the working directory
 */
export const DEFAULT_PATHS = {
  config: 'config.json',
  repository: 'dotfiles',
} as const;

export const COMMIT_MESSAGES = {
  init: 'Update dotfiles backup',
  sync: 'Sync dotfiles changes',
} as const;

/** Mode for directories the tool creates itself */
export const DIRECTORY_MODE = 0o755;

export const FALLBACK_VERSION = '1.0.0';
