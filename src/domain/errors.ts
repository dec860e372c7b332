/**
 * Raised for an invalid configuration value.
 *
 * Never thrown by the loader: it is collected as a warning and the
 * default takes the value's place.
 */
export class ConfigurationError extends Error {
  constructor(
    readonly variable: string,
    message: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * The calendar provider could not deliver a usable response.
 *
 * Aborts the refresh run before anything is written.
 */
export class FetchError extends Error {
  readonly status: number | undefined;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.status = options.status;
  }
}

/** A provider row skipped for lacking a usable `symbol` or `date`. */
export interface MalformedEntry {
  /** Position of the row in the provider payload. */
  readonly index: number;
  readonly reason: string;
}
