import { BackupCommand } from './backup.command';
import { COMMIT_MESSAGES, CommandOptions, DIRECTORY_MODE } from '../types/config.types';
import { logger } from '../utils/logger.service';

/**
 * Create (or reuse) the repository directory and migrate every tracked item into it
 */
export class InitCommand extends BackupCommand {
  protected readonly isSync = false;
  protected readonly commitMessage = COMMIT_MESSAGES.init;

  protected async prepareRepository(
    repositoryDir: string,
    options: CommandOptions,
  ): Promise<void> {
    if (options.dryRun) {
      logger.debug(`[dry run] Would ensure ${repositoryDir} exists`);
      return;
    }
    await this.fileSystem.createDirectory(repositoryDir, DIRECTORY_MODE);
  }
}
