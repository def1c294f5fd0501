/**
 * Custom Application Errors
 * Domain-specific error classes for the scoring pipeline and HTTP layer.
 */

/**
 * Base application error class.
 * All domain errors should extend this.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Resource not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} with id '${identifier}' not found`
      : `${resource} not found`;
    super(message, 404);
  }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/**
 * Malformed theology configuration.
 * Fatal: raised before any transcript is scored.
 */
export class ConfigError extends AppError {
  constructor(message: string, public issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, 500, false);
  }
}

/**
 * Transcript with no words to score.
 * Skips the single item; the batch carries on.
 */
export class EmptyInputError extends AppError {
  constructor(transcriptId?: string) {
    super(
      transcriptId
        ? `Transcript '${transcriptId}' has no words to score`
        : "Text has no words to score",
      422
    );
  }
}

/**
 * Store read/write failure for a single transcript.
 */
export class PersistenceError extends AppError {
  constructor(operation: string, detail: string) {
    super(`Failed to ${operation}: ${detail}`, 503);
  }
}

/**
 * Request failed schema validation (400).
 */
export class ValidationError extends BadRequestError {
  constructor(public details: { path: string; message: string }[]) {
    super("Validation failed");
  }
}
