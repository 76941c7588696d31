#!/usr/bin/env node

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';
import { InitCommand } from './commands/init.command';
import { SyncCommand } from './commands/sync.command';
import { StatusCommand } from './commands/status.command';
import { BaseError, messageOf } from './errors/base.error';
import { logger, LogLevel } from './utils/logger.service';
import { CommandResult, FALLBACK_VERSION } from './types/config.types';

interface BackupActionOptions {
  dryRun?: boolean;
}

/**
 * Read the version from package.json next to the build output
 */
function readVersion(): string {
  try {
    const packageJsonPath = join(__dirname, '..', 'package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch {
    logger.debug('Could not read package.json for version, using fallback');
  }
  return FALLBACK_VERSION;
}

/**
 * Log a command result and exit non-zero when it failed
 */
function report(result: CommandResult): void {
  if (result.success) {
    logger.success(result.message || 'Done');
  } else {
    logger.error(result.message || 'Command failed');
    process.exit(result.exitCode);
  }
}

/**
 * Handle errors that escaped a command
 */
export function handleError(error: unknown): never {
  if (error instanceof BaseError) {
    logger.error(`[${error.code}] ${error.message}`);
    if (error.details) {
      logger.error(error.details);
    }
  } else {
    logger.error(messageOf(error));
  }
  process.exit(1);
}

/**
 * Build the command line program
 */
export function createProgram(version: string = readVersion()): Command {
  const program = new Command();

  program
    .name('gotfiles')
    .usage('<init|sync|status> [options]')
    .description('Back up dotfiles into a git repository and replace them with symlinks')
    .version(version, '-v, --version', 'Output the current version')
    .option('--verbose', 'Show verbose output')
    .on('option:verbose', () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.debug('Verbose mode enabled');
    })
    .showHelpAfterError();

  program
    .command('init')
    .description('Create ./dotfiles, back up every configured path and link it back')
    .option('--dry-run', 'Show what would be done without changing anything')
    .action(async (options: BackupActionOptions) => {
      try {
        const result = await new InitCommand().execute({
          verbose: logger.isVerbose(),
          dryRun: options.dryRun ?? false,
        });
        report(result);
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('sync')
    .description('Back up configured paths into an existing ./dotfiles and push')
    .option('--dry-run', 'Show what would be done without changing anything')
    .action(async (options: BackupActionOptions) => {
      try {
        const result = await new SyncCommand().execute({
          verbose: logger.isVerbose(),
          dryRun: options.dryRun ?? false,
        });
        report(result);
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('status')
    .description('Show the state of every configured path')
    .action(async () => {
      try {
        const result = await new StatusCommand().execute({ verbose: logger.isVerbose() });
        report(result);
      } catch (error) {
        handleError(error);
      }
    });

  // Missing or unknown subcommands exit with 1; help and version exit with 0
  program.exitOverride(err => {
    if (err.code === 'commander.version' || err.code === 'commander.helpDisplayed') {
      process.exit(0);
    }
    process.exit(1);
  });

  return program;
}

/**
 * Main CLI entry point
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}

if (require.main === module) {
  main().catch(handleError);
}
