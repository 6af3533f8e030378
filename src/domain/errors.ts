/**
 * Typed failures raised by the services. Each carries an HTTP `status`, a stable machine `code`
 * and the taxonomy `kind`; the error middleware renders all of them the same way.
 */

export type ErrorKind =
  | "INVALID_INPUT"
  | "DUPLICATE_REQUEST"
  | "UNIQUENESS_VIOLATION"
  | "NOT_FOUND"
  | "FORBIDDEN"
  | "PRECONDITION_FAILED"
  | "UNAUTHORIZED";

export class AppError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    public readonly status: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string, code = "INVALID_INPUT", details?: unknown) {
    super("INVALID_INPUT", 400, code, message, details);
  }
}

export class DuplicateRequestError extends AppError {
  constructor(message = "A friend request already exists between these users") {
    super("DUPLICATE_REQUEST", 409, "DUPLICATE_REQUEST", message);
  }
}

export class UniquenessViolationError extends AppError {
  constructor(
    message: string,
    /** Field whose unique constraint was hit, e.g. "email" or "contactKey". */
    public readonly field?: string
  ) {
    super("UNIQUENESS_VIOLATION", 409, "UNIQUENESS_VIOLATION", message, field ? { field } : undefined);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, code = "NOT_FOUND") {
    super("NOT_FOUND", 404, code, `${resource} not found`);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = "Forbidden", code = "FORBIDDEN") {
    super("FORBIDDEN", 403, code, message);
  }
}

export class PreconditionFailedError extends AppError {
  constructor(code: string, message: string) {
    super("PRECONDITION_FAILED", 400, code, message);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Invalid credentials", code = "UNAUTHORIZED") {
    super("UNAUTHORIZED", 401, code, message);
  }
}
