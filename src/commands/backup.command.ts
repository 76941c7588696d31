import * as path from 'path';
import chalk from 'chalk';
import { CommandResult, CommandOptions, DEFAULT_PATHS } from '../types/config.types';
import { ConfigManager } from '../core/config.manager';
import { FileSystemService } from '../core/filesystem.service';
import { GitService, GitPublishResult } from '../core/git.service';
import { ReconcileService, ReconcileSummary } from '../core/reconcile.service';
import { BaseError } from '../errors/base.error';
import { logger } from '../utils/logger.service';
import { PlatformDetector } from '../utils/platform.detector';

/**
 * Data returned by `init` and `sync`
 */
export interface BackupResult {
  repositoryDir: string;
  summary: ReconcileSummary;
  /** Absent on dry runs */
  git?: GitPublishResult;
}

/**
 * Shared flow of `init` and `sync`: load the config, prepare the
 * repository directory, reconcile every item, then commit and push.
 */
export abstract class BackupCommand {
  protected readonly workingDir: string;
  protected readonly fileSystem: FileSystemService;
  protected readonly configManager: ConfigManager;
  private readonly homeDirOverride: string | undefined;

  /** Passed to the reconciler; changes log wording only */
  protected abstract readonly isSync: boolean;
  protected abstract readonly commitMessage: string;

  constructor(workingDir?: string, homeDir?: string) {
    this.workingDir = workingDir || process.cwd();
    this.homeDirOverride = homeDir;
    this.fileSystem = new FileSystemService();
    this.configManager = new ConfigManager(this.workingDir, this.fileSystem);
  }

  /**
   * Make sure the repository directory is usable before any item is touched
   */
  protected abstract prepareRepository(
    repositoryDir: string,
    options: CommandOptions,
  ): Promise<void>;

  public async execute(options: CommandOptions = {}): Promise<CommandResult<BackupResult>> {
    try {
      const config = await this.configManager.load();
      const homeDir = this.homeDirOverride ?? PlatformDetector.getHomeDirectory();
      const repositoryDir = path.join(this.workingDir, DEFAULT_PATHS.repository);

      logger.debug(`Platform: ${PlatformDetector.getPlatformName()}`);
      logger.debug(`Home directory: ${homeDir}`);
      logger.debug(`Repository directory: ${repositoryDir}`);
      logger.debug(`Tracking ${config.dotfiles.length} item(s)`);

      await this.prepareRepository(repositoryDir, options);

      const reconciler = new ReconcileService(homeDir, repositoryDir, this.fileSystem);
      const summary = await reconciler.processAll(config.dotfiles, {
        isSync: this.isSync,
        dryRun: options.dryRun ?? false,
      });

      const result: BackupResult = { repositoryDir, summary };
      if (options.dryRun) {
        logger.info(chalk.yellow(`[dry run] Would commit "${this.commitMessage}" and push`));
      } else {
        result.git = await new GitService(this.workingDir).publish(this.commitMessage);
      }

      return {
        success: true,
        message: this.describe(summary, options),
        data: result,
        exitCode: 0,
      };
    } catch (error) {
      if (error instanceof BaseError) {
        return {
          success: false,
          message: error.details ? `${error.message}: ${error.details}` : error.message,
          error,
          exitCode: 1,
        };
      }

      return {
        success: false,
        message: `Failed to ${this.isSync ? 'sync' : 'initialize'} dotfiles`,
        error: error instanceof Error ? error : new Error(String(error)),
        exitCode: 1,
      };
    }
  }

  private describe(summary: ReconcileSummary, options: CommandOptions): string {
    const total = summary.reports.length;
    const parts = [
      `${summary.copied} backed up`,
      `${summary.linked} linked`,
      `${summary.skipped} already linked`,
    ];
    if (summary.failed > 0) {
      parts.push(`${summary.failed} with errors`);
    }
    const prefix = options.dryRun ? 'Dry run finished' : 'Processed';
    return `${prefix} ${total} item(s): ${parts.join(', ')}`;
  }
}
