import * as path from 'path';
import * as fs from 'fs-extra';
import { FileSystemService } from './filesystem.service';
import { FileSystemError, InvalidPathError } from '../errors/filesystem.error';
import { messageOf } from '../errors/base.error';

/**
 * Creates and inspects the links that replace tracked items in the home directory
 */
export class SymlinkService {
  private readonly fileSystem: FileSystemService;

  constructor(fileSystem?: FileSystemService) {
    this.fileSystem = fileSystem || new FileSystemService();
  }

  /**
   * Create `linkPath` pointing at `targetPath`, creating missing parent directories
   */
  public async create(targetPath: string, linkPath: string): Promise<void> {
    await this.fileSystem.createDirectory(path.dirname(linkPath));

    try {
      await fs.symlink(targetPath, linkPath);
    } catch (error) {
      throw new FileSystemError(
        `Failed to create symlink ${linkPath} -> ${targetPath}`,
        messageOf(error),
      );
    }
  }

  /**
   * Absolute target of a symlink
   */
  public async getTarget(linkPath: string): Promise<string> {
    const stats = await this.fileSystem.getLinkStats(linkPath);
    if (!stats || !stats.isSymbolicLink()) {
      throw new InvalidPathError(`Not a symbolic link: ${linkPath}`);
    }

    try {
      const target = await fs.readlink(linkPath);
      return path.resolve(path.dirname(linkPath), target);
    } catch (error) {
      throw new FileSystemError(
        `Failed to read symlink: ${linkPath}`,
        messageOf(error),
      );
    }
  }

  /**
   * Whether `linkPath` is a symlink resolving to `targetPath`
   */
  public async pointsTo(linkPath: string, targetPath: string): Promise<boolean> {
    const stats = await this.fileSystem.getLinkStats(linkPath);
    if (!stats || !stats.isSymbolicLink()) {
      return false;
    }
    return (await this.getTarget(linkPath)) === path.resolve(targetPath);
  }
}
