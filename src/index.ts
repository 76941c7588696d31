/**
 * gotfiles
 *
 * Backs up dotfiles into a git-tracked `dotfiles/` directory and replaces
 * the originals in the home directory with symlinks into it.
 */

export * from './cli';
export * from './commands/backup.command';
export * from './commands/init.command';
export * from './commands/sync.command';
export * from './commands/status.command';
export * from './core/config.manager';
export * from './core/filesystem.service';
export * from './core/symlink.service';
export * from './core/reconcile.service';
export * from './core/git.service';
export * from './utils/logger.service';
export * from './utils/platform.detector';
export * from './types/config.types';
export * from './types/config.schema';
export * from './errors/base.error';
export * from './errors/environment.error';
export * from './errors/filesystem.error';
export * from './errors/git.error';
