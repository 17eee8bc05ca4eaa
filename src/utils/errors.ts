/**
 * Base class for errors that map onto an HTTP response.
 * `message` is safe to show to the caller; anything internal goes in `details` or `cause`.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly isOperational = true;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number,
    code: string,
    options: { details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = options.details;
  }
}

/** Request body, or the form nested in its `body` field, could not be parsed. */
export class MalformedRequestError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'MALFORMED_REQUEST', { details });
  }
}

/** Required fields missing or over their length limit. */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', { details });
  }
}

export class PersistenceError extends AppError {
  constructor(cause: unknown) {
    super('Failed to save message', 500, 'PERSISTENCE_ERROR', {
      cause,
      details: { reason: cause instanceof Error ? cause.message : String(cause) },
    });
  }
}

/**
 * The acknowledgment could not be delivered. Only ever logged: the message is
 * already stored by the time this can happen.
 */
export class ResponseWriteError extends AppError {
  constructor(details?: Record<string, unknown>) {
    super('Error writing acknowledgment response', 500, 'RESPONSE_WRITE_ERROR', { details });
  }
}

/** Invalid or incomplete environment configuration. */
export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}
