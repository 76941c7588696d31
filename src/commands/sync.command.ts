import { BackupCommand } from './backup.command';
import { COMMIT_MESSAGES } from '../types/config.types';
import { RepositoryNotFoundError } from '../errors/git.error';

/**
 * Bring an existing repository up to date with the home directory
 */
export class SyncCommand extends BackupCommand {
  protected readonly isSync = true;
  protected readonly commitMessage = COMMIT_MESSAGES.sync;

  protected async prepareRepository(repositoryDir: string): Promise<void> {
    if (!(await this.fileSystem.isDirectory(repositoryDir))) {
      throw new RepositoryNotFoundError(
        "dotfiles repository directory does not exist. Run 'gotfiles init' first",
      );
    }
  }
}
