/**
 * Base error class for the renterd client
 * @module renterd-client/errors/error
 */

/**
 * Parameters for creating a RenterdError
 */
export interface RenterdErrorParams {
  /**
   * Error type/category
   */
  readonly type: string;

  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * HTTP status code (if applicable)
   */
  readonly status?: number;

  /**
   * Machine-readable error code
   */
  readonly code?: string;

  /**
   * Whether repeating the operation may succeed
   */
  readonly isRetryable: boolean;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  /**
   * Underlying error, when this one wraps another
   */
  readonly cause?: unknown;
}

/**
 * Base error class for all client operations
 *
 * Carries a category (`type`) for programmatic handling, an optional HTTP
 * status and error code, and whether the failed call can be repeated.
 */
export class RenterdError extends Error {
  readonly type: string;
  readonly status?: number;
  readonly code?: string;
  readonly isRetryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(params: RenterdErrorParams) {
    super(params.message, params.cause === undefined ? undefined : { cause: params.cause });

    // Set the prototype explicitly to maintain instanceof checks
    Object.setPrototypeOf(this, RenterdError.prototype);

    this.name = 'RenterdError';
    this.type = params.type;
    this.status = params.status;
    this.code = params.code;
    this.isRetryable = params.isRetryable;
    this.details = params.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RenterdError);
    }
  }

  /**
   * Converts the error to a JSON representation
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      status: this.status,
      code: this.code,
      isRetryable: this.isRetryable,
      details: this.details,
    };
  }

  toString(): string {
    const parts = [this.name, this.type];

    if (this.code) {
      parts.push(`[${this.code}]`);
    }

    if (this.status) {
      parts.push(`(${this.status})`);
    }

    parts.push(`- ${this.message}`);

    return parts.join(' ');
  }
}
