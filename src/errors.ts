/**
 * Application errors.
 * AppError subclasses carry an HTTP status and a machine-readable code,
 * which the error handler middleware turns into a JSON response.
 */

export class AppError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** The request body could not be read to completion. */
export class BodyReadError extends AppError {
  constructor(cause: unknown) {
    super('Failed to read request body', 'BODY_READ_FAILED', 400, {
      reason: cause instanceof Error ? cause.message : String(cause),
    });
    this.cause = cause;
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(maxBytes: number) {
    super(`Request body exceeds ${maxBytes} bytes`, 'PAYLOAD_TOO_LARGE', 413, {
      maxBytes,
    });
  }
}

/**
 * The captured response body is incomplete: the handler's stream errored
 * or the client went away. `partialText` holds what was seen before that.
 */
export class ResponseCaptureError extends AppError {
  constructor(
    message: string,
    readonly partialText: string,
    cause?: unknown
  ) {
    super(message, 'RESPONSE_CAPTURE_FAILED', 500);
    this.cause = cause;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, issues: string[]) {
    super(message, 'INVALID_CONFIG', 500, { issues });
  }
}
