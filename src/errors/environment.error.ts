import { BaseError } from './base.error';

export class HomeDirectoryError extends BaseError {
  public readonly code = 'HOME_DIRECTORY_UNRESOLVED';
  public readonly recoverable = false;
}
