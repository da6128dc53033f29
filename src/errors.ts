/**
 * Error raised inside a single download attempt.
 *
 * `statusCode` is set for HTTP error responses and left undefined for
 * network failures and timeouts.
 */
export class DownloadError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'DownloadError';
  }
}

/**
 * Error raised for page-session misuse and fatal navigation failures.
 */
export class SessionError extends Error {
  constructor(
    message: string,
    public readonly url?: string,
  ) {
    super(message);
    this.name = 'SessionError';
  }
}

/**
 * Error thrown when a configuration file cannot be read or is invalid.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Render an unknown thrown value as a message string. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
