/**
 * access-engine - Errors
 */

export class AccessEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AccessEngineError';
  }
}

/**
 * Request is missing a required field. Raised before any store access.
 */
export class InvalidRequestError extends AccessEngineError {
  readonly fields: string[];

  constructor(fields: string[]) {
    super(`Invalid request: ${fields.join(', ')} must be a non-empty string`);
    this.name = 'InvalidRequestError';
    this.fields = fields;
  }
}

/**
 * The directory store could not answer. Never a deny.
 */
export class StoreUnavailableError extends AccessEngineError {
  override cause: unknown;

  constructor(message: string, cause?: unknown) {
    super(`Directory store unavailable: ${message}`);
    this.name = 'StoreUnavailableError';
    this.cause = cause;
  }
}
