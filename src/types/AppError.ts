/**
 * Application error hierarchy.
 *
 * Every error raised on purpose by the service carries a `type` (used as the
 * public error code), an optional HTTP status and free-form metadata. The
 * global express error handler maps these to JSON responses; anything else is
 * treated as an infrastructure failure.
 */
export type AppErrorType =
  | "DomainError"
  | "InfrastructureError"
  | "AppError"
  | "ValidationError";

export interface AppErrorMetadata {
  [key: string]: unknown;
}

export class AppError extends Error {
  public readonly type: AppErrorType;
  public readonly statusCode: number | undefined;
  public readonly metadata: AppErrorMetadata | undefined;

  constructor(
    message: string,
    type: AppErrorType = "AppError",
    statusCode?: number,
    metadata?: AppErrorMetadata,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.type = type;
    this.statusCode = statusCode;
    this.metadata = metadata;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class DomainError extends AppError {
  constructor(
    message: string,
    statusCode?: number,
    metadata?: AppErrorMetadata
  ) {
    super(message, "DomainError", statusCode, metadata);
  }
}

export class InfrastructureError extends AppError {
  constructor(
    message: string,
    statusCode?: number,
    metadata?: AppErrorMetadata,
    options?: { cause?: unknown }
  ) {
    super(message, "InfrastructureError", statusCode, metadata, options);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    statusOrMeta: number | AppErrorMetadata = 400,
    metadata?: AppErrorMetadata
  ) {
    if (typeof statusOrMeta === "number") {
      super(message, "ValidationError", statusOrMeta, metadata);
    } else {
      super(message, "ValidationError", 400, statusOrMeta);
    }
  }
}

/**
 * An embedding (stored or query) whose length differs from the dimensionality
 * the store established with its first document. Caller error; never retried.
 */
export class DimensionMismatchError extends ValidationError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number) {
    super(
      `Embedding dimension mismatch: store holds ${expected}-dimensional vectors, got ${actual}`,
      { expected, actual }
    );
    this.expected = expected;
    this.actual = actual;
  }
}

export class DocumentAlreadyExistsError extends DomainError {
  constructor(id: string) {
    super(`Document with ID ${id} already exists`, 409, { id });
  }
}

export class DocumentNotFoundError extends DomainError {
  constructor(id: string) {
    super(`Document with ID ${id} not found`, 404, { id });
  }
}

export class AuthenticationError extends DomainError {
  constructor(message: string) {
    super(message, 401);
  }
}

/**
 * The authorization collaborator failed to produce a decision. Surfaced as a
 * failed operation, never read as "not authorized".
 */
export class AuthorizationCheckError extends InfrastructureError {
  constructor(
    message: string,
    metadata?: AppErrorMetadata,
    options?: { cause?: unknown }
  ) {
    super(message, 502, metadata, options);
  }
}

export function isAppError(error: unknown): error is AppError {
  if (error instanceof AppError) {
    return true;
  }

  if (!error || typeof error !== "object") {
    return false;
  }

  return (
    typeof Reflect.get(error, "message") === "string" &&
    typeof Reflect.get(error, "type") === "string"
  );
}
