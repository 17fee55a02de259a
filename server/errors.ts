export class HttpError extends Error {
  readonly status: number;
  readonly details?: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    if (details !== undefined) {
      this.details = details;
    }
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(400, message, details);
    this.name = "BadRequestError";
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message = "Could not validate credentials") {
    super(401, message);
    this.name = "UnauthorizedError";
  }
}

/** Missing resource, or one the acting user does not own. The two cases are indistinguishable to callers. */
export class NotFoundError extends HttpError {
  constructor(message = "Session not found") {
    super(404, message);
    this.name = "NotFoundError";
  }
}

export class ConflictError extends HttpError {
  constructor(message: string) {
    super(409, message);
    this.name = "ConflictError";
  }
}

/** A store write or read failed; the affected record is in an unknown state. */
export class PersistenceError extends HttpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(500, message);
    this.name = "PersistenceError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}
