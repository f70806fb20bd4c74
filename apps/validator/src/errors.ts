// --------------------------------------------------------------------------
// Error taxonomy for the claim -> validate -> reconcile pipeline
// --------------------------------------------------------------------------

interface ValidatorErrorOptions {
  cause?: unknown;
}

/** Base error with a machine-readable code */
export class ValidatorError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options: ValidatorErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ValidatorError';
    this.code = code;
  }
}

/**
 * No usable bearer credential. Fails the current cycle; the next cycle
 * retries acquisition.
 */
export class AuthError extends ValidatorError {
  constructor(message: string, options: ValidatorErrorOptions = {}) {
    super(message, 'E_AUTH', options);
    this.name = 'AuthError';
  }
}

/**
 * Network failure or timeout that survived every retry
 */
export class TransportError extends ValidatorError {
  constructor(
    message: string,
    public readonly attempts: number,
    options: ValidatorErrorOptions = {},
  ) {
    super(message, 'E_TRANSPORT', options);
    this.name = 'TransportError';
  }
}

/**
 * Non-200 response from the validation API. Never retried.
 */
export class ApiError extends ValidatorError {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message, 'E_API');
    this.name = 'ApiError';
  }
}

/**
 * Failure while writing one item's history/snapshot/status.
 * Scoped to that item; the rest of the batch continues.
 */
export class PersistenceError extends ValidatorError {
  constructor(
    message: string,
    public readonly queueId: string,
    options: ValidatorErrorOptions = {},
  ) {
    super(message, 'E_PERSISTENCE', options);
    this.name = 'PersistenceError';
  }
}

/**
 * Final sync failure. Logged; the next cycle retries.
 */
export class SyncError extends ValidatorError {
  constructor(message: string, options: ValidatorErrorOptions = {}) {
    super(message, 'E_SYNC', options);
    this.name = 'SyncError';
  }
}

/** Error message extraction used at log call sites */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
