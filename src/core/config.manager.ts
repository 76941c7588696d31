import path from 'path';
import { ZodError, ZodIssue } from 'zod';
import { DotfilesConfig, DEFAULT_PATHS } from '../types/config.types';
import { DotfilesConfigSchema } from '../types/config.schema';
import { FileSystemService } from './filesystem.service';
import { BaseError, messageOf } from '../errors/base.error';

/**
 * Configuration management errors
 */
export class ConfigError extends BaseError {
  public readonly code = 'CONFIG_ERROR';
  public readonly recoverable = false;
}

export class ConfigValidationError extends BaseError {
  public readonly code = 'CONFIG_VALIDATION_ERROR';
  public readonly recoverable = false;
}

/**
 * Render zod issues as `dotfiles.2: Tracked path cannot be empty`
 */
function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Loads the list of tracked paths from config.json
 */
export class ConfigManager {
  private readonly configPath: string;
  private readonly fileSystem: FileSystemService;
  private cachedConfig?: DotfilesConfig | undefined;

  constructor(workingDir: string, fileSystem?: FileSystemService) {
    this.configPath = path.join(workingDir, DEFAULT_PATHS.config);
    this.fileSystem = fileSystem || new FileSystemService();
  }

  /**
   * Load configuration from file. The result is cached and frozen.
   */
  public async load(): Promise<DotfilesConfig> {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    let content: string;
    try {
      content = await this.fileSystem.readFile(this.configPath);
    } catch (error) {
      throw new ConfigError(
        `Failed to load configuration file (${this.configPath})`,
        error instanceof BaseError ? error.details : String(error),
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(
        `Configuration file is not valid JSON (${this.configPath})`,
        messageOf(error),
      );
    }

    try {
      const validated = DotfilesConfigSchema.parse(json);
      const config: DotfilesConfig = Object.freeze({
        dotfiles: Object.freeze([...validated.dotfiles]),
      });
      this.cachedConfig = config;
      return config;
    } catch (error) {
      if (error instanceof ZodError) {
        throw new ConfigValidationError(
          `Configuration data is invalid (${this.configPath})`,
          formatIssues(error.issues),
        );
      }
      throw error;
    }
  }
}
