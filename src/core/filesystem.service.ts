import * as path from 'path';
import * as fs from 'fs-extra';
import { pipeline } from 'stream/promises';
import { FileSystemError } from '../errors/filesystem.error';
import { isErrnoException, messageOf } from '../errors/base.error';
import { DIRECTORY_MODE } from '../types/config.types';

/** Permission bits of a stat mode, without the file type */
const PERMISSION_MASK = 0o7777;

/**
 * Thin wrapper over fs-extra that converts failures into FileSystemError
 */
export class FileSystemService {
  /**
   * Check if a path exists, following symlinks
   */
  public async pathExists(targetPath: string): Promise<boolean> {
    return await fs.pathExists(targetPath);
  }

  /**
   * Stat a path without following a final symlink.
   * Resolves to null when nothing exists at the path.
   */
  public async getLinkStats(targetPath: string): Promise<fs.Stats | null> {
    try {
      return await fs.lstat(targetPath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw new FileSystemError(`Failed to inspect ${targetPath}`, messageOf(error));
    }
  }

  /**
   * Stat a path, following symlinks
   */
  public async getStats(targetPath: string): Promise<fs.Stats> {
    try {
      return await fs.stat(targetPath);
    } catch (error) {
      throw new FileSystemError(`Failed to inspect ${targetPath}`, messageOf(error));
    }
  }

  public async isDirectory(targetPath: string): Promise<boolean> {
    try {
      return (await fs.stat(targetPath)).isDirectory();
    } catch {
      return false;
    }
  }

  public async readFile(filePath: string): Promise<string> {
    try {
      return await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw new FileSystemError(`Failed to read file: ${filePath}`, messageOf(error));
    }
  }

  /**
   * Create a directory and any missing parents. Existing directories keep their mode.
   */
  public async createDirectory(dirPath: string, mode: number = DIRECTORY_MODE): Promise<void> {
    try {
      await fs.mkdir(dirPath, { recursive: true, mode });
    } catch (error) {
      throw new FileSystemError(`Failed to create directory: ${dirPath}`, messageOf(error));
    }
  }

  /**
   * Remove a file or a whole directory tree
   */
  public async remove(targetPath: string): Promise<void> {
    try {
      await fs.remove(targetPath);
    } catch (error) {
      throw new FileSystemError(`Failed to remove: ${targetPath}`, messageOf(error));
    }
  }

  /**
   * Copy a file or a directory tree.
   *
   * Directories are created with the mode of the directory they mirror.
   * Files are written with default permissions.
   */
  public async copyPath(sourcePath: string, destinationPath: string): Promise<void> {
    const stats = await this.getStats(sourcePath);
    if (stats.isDirectory()) {
      await this.copyDirectory(sourcePath, destinationPath, stats.mode);
    } else {
      await this.copyFile(sourcePath, destinationPath);
    }
  }

  private async copyDirectory(
    sourcePath: string,
    destinationPath: string,
    mode: number,
  ): Promise<void> {
    await this.createDirectory(destinationPath, mode & PERMISSION_MASK);

    let entries: fs.Dirent[];
    try {
      entries = await fs.readdir(sourcePath, { withFileTypes: true });
    } catch (error) {
      throw new FileSystemError(`Failed to list directory: ${sourcePath}`, messageOf(error));
    }

    for (const entry of entries) {
      const entrySource = path.join(sourcePath, entry.name);
      const entryDestination = path.join(destinationPath, entry.name);

      if (entry.isDirectory()) {
        const entryStats = await this.getStats(entrySource);
        await this.copyDirectory(entrySource, entryDestination, entryStats.mode);
      } else {
        await this.copyFile(entrySource, entryDestination);
      }
    }
  }

  private async copyFile(sourcePath: string, destinationPath: string): Promise<void> {
    await this.createDirectory(path.dirname(destinationPath));

    try {
      await pipeline(fs.createReadStream(sourcePath), fs.createWriteStream(destinationPath));
    } catch (error) {
      throw new FileSystemError(
        `Failed to copy ${sourcePath} to ${destinationPath}`,
        messageOf(error),
      );
    }
  }
}
