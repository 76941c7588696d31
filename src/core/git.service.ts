import { simpleGit, SimpleGit } from 'simple-git';
import * as path from 'path';
import { RepositoryNotFoundError, GitOperationError } from '../errors/git.error';
import { describeError, messageOf } from '../errors/base.error';
import { logger } from '../utils/logger.service';

export type GitStep = 'add' | 'commit' | 'push';

/**
 * Outcome of the add/commit/push sequence
 */
export interface GitPublishResult {
  completed: GitStep[];
  failed: GitStep[];
  errors: string[];
}

/**
 * Git service wrapper around simple-git.
 *
 * Output of add, commit and push is streamed to this process's stdout and
 * stderr as it arrives. Repository checks run on a separate instance
 * without an output handler, so they print nothing.
 */
export class GitService {
  private readonly git: SimpleGit;
  private readonly quietGit: SimpleGit;
  private readonly workingDir: string;

  constructor(workingDir: string) {
    this.workingDir = path.resolve(workingDir);
    this.git = simpleGit({ baseDir: this.workingDir }).outputHandler(
      (_command, stdout, stderr) => {
        stdout.pipe(process.stdout, { end: false });
        stderr.pipe(process.stderr, { end: false });
      },
    );
    this.quietGit = simpleGit({ baseDir: this.workingDir });
  }

  /**
   * Check if directory is a git repository
   */
  public async isRepository(): Promise<boolean> {
    try {
      return await this.quietGit.checkIsRepo();
    } catch {
      return false;
    }
  }

  /**
   * Stage everything under the working directory
   */
  public async addAll(): Promise<void> {
    await this.ensureRepository();

    try {
      await this.git.add('.');
    } catch (error) {
      throw new GitOperationError(
        'Failed to add all files',
        messageOf(error),
      );
    }
  }

  /**
   * Commit staged changes
   */
  public async commit(message: string): Promise<string> {
    await this.ensureRepository();

    if (!message || !message.trim()) {
      throw new GitOperationError('Commit message cannot be empty');
    }

    try {
      const result = await this.git.commit(message.trim());
      return result.commit;
    } catch (error) {
      throw new GitOperationError(
        'Failed to commit changes',
        messageOf(error),
      );
    }
  }

  /**
   * Push the current branch to its upstream
   */
  public async push(): Promise<void> {
    await this.ensureRepository();

    try {
      await this.git.push();
    } catch (error) {
      throw new GitOperationError(
        'Failed to push changes',
        messageOf(error),
      );
    }
  }

  /**
   * Run add, commit and push in order. A failing step is logged and the
   * following steps still run.
   */
  public async publish(message: string): Promise<GitPublishResult> {
    const result: GitPublishResult = { completed: [], failed: [], errors: [] };
    const steps: Array<[GitStep, () => Promise<unknown>]> = [
      ['add', () => this.addAll()],
      ['commit', () => this.commit(message)],
      ['push', () => this.push()],
    ];

    for (const [step, run] of steps) {
      logger.debug(`Running git ${step} in ${this.workingDir}`);
      try {
        await run();
        result.completed.push(step);
      } catch (error) {
        const reason = describeError(error);
        result.failed.push(step);
        result.errors.push(`git ${step}: ${reason}`);
        logger.error(`Error running git ${step}: ${reason}`);
      }
    }

    return result;
  }

  /**
   * Ensure we're in a git repository
   */
  private async ensureRepository(): Promise<void> {
    if (!(await this.isRepository())) {
      throw new RepositoryNotFoundError(`Not a git repository: ${this.workingDir}`);
    }
  }
}
