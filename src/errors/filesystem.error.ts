import { BaseError } from './base.error';

/**
 * File system operation errors
 */
export class FileSystemError extends BaseError {
  public readonly code = 'FILESYSTEM_ERROR';
  public readonly recoverable = true;
}

/**
 * A path exists but is not of the expected kind
 */
export class InvalidPathError extends BaseError {
  public readonly code = 'INVALID_PATH';
  public readonly recoverable = false;
}
