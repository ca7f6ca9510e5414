/**
 * Error types for the Home Assistant CLI.
 * @module errors
 */

/**
 * Base error class for Home Assistant client errors.
 * All custom errors in this module extend this class.
 */
export class HAClientError extends Error {
  /**
   * Create a new HAClientError.
   * @param message - Human-readable error message
   * @param code - Optional error code for programmatic handling
   * @param options - Standard error options, used to chain the underlying cause
   */
  constructor(
    message: string,
    public readonly code?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'HAClientError';
  }
}

/**
 * Error returned by the REST API for a non-2xx response.
 */
export class APIError extends HAClientError {
  constructor(
    public readonly statusCode: number,
    public readonly apiMessage: string,
    code?: string
  ) {
    super(
      code
        ? `${apiMessage} (${code}, HTTP ${statusCode})`
        : `${apiMessage} (HTTP ${statusCode})`,
      code
    );
    this.name = 'APIError';
  }

  static unauthorized(): APIError {
    return new APIError(401, 'Invalid or missing access token', 'unauthorized');
  }

  static notFound(): APIError {
    return new APIError(404, 'Resource not found', 'not_found');
  }

  static badRequest(): APIError {
    return new APIError(400, 'Bad request', 'bad_request');
  }

  static serverError(): APIError {
    return new APIError(500, 'Internal server error', 'server_error');
  }
}

/**
 * Thrown when no usable credentials exist.
 */
export class NotConfiguredError extends HAClientError {
  constructor() {
    super("hass-cli not configured. Run 'hass-cli login' first", 'NOT_CONFIGURED');
    this.name = 'NotConfiguredError';
  }
}

/**
 * Error thrown when the WebSocket authentication handshake fails.
 * Typically the access token is invalid or has been revoked.
 */
export class AuthenticationError extends HAClientError {
  /**
   * Create a new AuthenticationError.
   * @param message - Description of why authentication failed
   */
  constructor(message: string) {
    super(message, 'AUTH_FAILED');
    this.name = 'AuthenticationError';
  }
}

/**
 * A WebSocket command whose result frame reported `success: false`.
 */
export class CommandError extends HAClientError {
  constructor(error?: { readonly code?: string; readonly message?: string }) {
    super(
      error ? `${error.code ?? ''}: ${error.message ?? ''}` : 'command failed',
      error?.code
    );
    this.name = 'CommandError';
  }
}

/**
 * Prefix an error with context while keeping it reachable as `cause`.
 *
 * @example
 * ```typescript
 * throw wrapError('failed to get devices', err);
 * // Error: failed to get devices: unknown_command: Unknown command
 * ```
 */
export function wrapError(context: string, err: unknown): HAClientError {
  const code = err instanceof HAClientError ? err.code : undefined;
  return new HAClientError(`${context}: ${errorMessage(err)}`, code, { cause: err });
}

/** Message of an Error, or the stringified value of anything else thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function findAPIError(err: unknown): APIError | undefined {
  let current: unknown = err;
  while (current instanceof Error) {
    if (current instanceof APIError) return current;
    current = current.cause;
  }
  return undefined;
}

/** True if the error (or anything it wraps) is an HTTP 401. */
export function isUnauthorized(err: unknown): boolean {
  return findAPIError(err)?.statusCode === 401;
}

/** True if the error (or anything it wraps) is an HTTP 404. */
export function isNotFound(err: unknown): boolean {
  return findAPIError(err)?.statusCode === 404;
}
