/**
 * Base class for every error the CLI raises on purpose.
 *
 * `details` carries the underlying cause (usually the message of a
 * lower-level error) so it can be shown separately from the summary.
 */
export abstract class BaseError extends Error {
  public abstract readonly code: string;
  public abstract readonly recoverable: boolean;
  public readonly details: string | undefined;

  constructor(message: string, details?: string) {
    super(message);
    this.name = new.target.name;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof BaseError && error.details) {
    return `${error.message}: ${error.details}`;
  }
  return messageOf(error);
}

/**
 * Whether a thrown value carries a Node.js error code.
 *
 * Checks the shape rather than `instanceof Error`: errors raised by Node's
 * own modules may come from another realm (a vm context such as a test
 * sandbox) and fail that check.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

/**
 * Message of a thrown value, whatever realm it came from
 */
export function messageOf(error: unknown): string {
  if (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  ) {
    return error.message;
  }
  return String(error);
}
