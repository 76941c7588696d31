import os from 'os';
import { HomeDirectoryError } from '../errors/environment.error';
import { messageOf } from '../errors/base.error';

/**
 * Host environment lookups
 */
export class PlatformDetector {
  /**
   * Resolve the current user's home directory
   */
  public static getHomeDirectory(): string {
    let homeDir: string;
    try {
      homeDir = os.homedir();
    } catch (error) {
      throw new HomeDirectoryError(
        'Could not determine the home directory',
        messageOf(error),
      );
    }

    if (!homeDir) {
      throw new HomeDirectoryError('Could not determine the home directory');
    }
    return homeDir;
  }

  public static getPlatformName(): string {
    return `${os.platform()}-${os.arch()}`;
  }
}
