import * as path from 'path';
import chalk from 'chalk';
import { CommandResult, CommandOptions, DEFAULT_PATHS } from '../types/config.types';
import { ConfigManager } from '../core/config.manager';
import { FileSystemService } from '../core/filesystem.service';
import { GitService } from '../core/git.service';
import { ReconcileService, ItemStatus, ItemStatusReport } from '../core/reconcile.service';
import { BaseError, describeError } from '../errors/base.error';
import { logger } from '../utils/logger.service';
import { PlatformDetector } from '../utils/platform.detector';

export interface StatusResult {
  repositoryExists: boolean;
  isGitRepository: boolean;
  items: ItemStatusReport[];
  /** Items that could not be inspected, with the reason */
  unreadable: Array<{ item: string; error: string }>;
}

const STATUS_LABELS: Record<ItemStatus, string> = {
  linked: chalk.green('linked'),
  'foreign-link': chalk.yellow('foreign link'),
  pending: chalk.cyan('not backed up'),
  restorable: chalk.blue('backup only'),
  missing: chalk.red('missing'),
};

/**
 * Report the state of every tracked item without changing anything
 */
export class StatusCommand {
  private readonly workingDir: string;
  private readonly fileSystem: FileSystemService;
  private readonly configManager: ConfigManager;
  private readonly homeDirOverride: string | undefined;

  constructor(workingDir?: string, homeDir?: string) {
    this.workingDir = workingDir || process.cwd();
    this.homeDirOverride = homeDir;
    this.fileSystem = new FileSystemService();
    this.configManager = new ConfigManager(this.workingDir, this.fileSystem);
  }

  public async execute(_options: CommandOptions = {}): Promise<CommandResult<StatusResult>> {
    try {
      const config = await this.configManager.load();
      const homeDir = this.homeDirOverride ?? PlatformDetector.getHomeDirectory();
      const repositoryDir = path.join(this.workingDir, DEFAULT_PATHS.repository);
      const reconciler = new ReconcileService(homeDir, repositoryDir, this.fileSystem);

      const result: StatusResult = {
        repositoryExists: await this.fileSystem.isDirectory(repositoryDir),
        isGitRepository: await new GitService(this.workingDir).isRepository(),
        items: [],
        unreadable: [],
      };

      logger.info(chalk.bold(`Repository: ${repositoryDir}`));
      if (!result.repositoryExists) {
        logger.warn("Repository directory does not exist yet. Run 'gotfiles init' first");
      }
      if (!result.isGitRepository) {
        logger.warn(`${this.workingDir} is not a git repository; changes will not be committed`);
      }

      for (const item of config.dotfiles) {
        try {
          const report = await reconciler.inspect(item);
          result.items.push(report);
          logger.info(`  ${STATUS_LABELS[report.status]}  ${item}`);
        } catch (error) {
          const reason = describeError(error);
          result.unreadable.push({ item, error: reason });
          logger.error(`Error accessing ${item}: ${reason}`);
        }
      }

      const pending = result.items.filter(
        report => report.status === 'pending' || report.status === 'restorable',
      ).length;

      return {
        success: true,
        message:
          pending > 0
            ? `${pending} item(s) will change on the next sync`
            : 'All tracked items are up to date',
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
        message: 'Failed to get status',
        error: error instanceof Error ? error : new Error(String(error)),
        exitCode: 1,
      };
    }
  }
}
