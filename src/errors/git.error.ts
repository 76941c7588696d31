import { BaseError } from './base.error';

/**
 * Repository not found errors
 */
export class RepositoryNotFoundError extends BaseError {
  public readonly code = 'REPOSITORY_NOT_FOUND';
  public readonly recoverable = false;
}

/**
 * Git operation failed errors
 */
export class GitOperationError extends BaseError {
  public readonly code = 'GIT_OPERATION_FAILED';
  public readonly recoverable = true;
}
