export type EngineErrorCode = "not_found" | "conflict" | "bad_request";

/** Errors the engine surfaces to callers; routes render them as JSON */
export class EngineError extends Error {
  constructor(
    readonly status: number,
    readonly code: EngineErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends EngineError {
  constructor(message = "User not found") {
    super(404, "not_found", message);
  }
}

export class ConflictError extends EngineError {
  constructor(message = "User already exists") {
    super(409, "conflict", message);
  }
}

export class BadRequestError extends EngineError {
  constructor(message: string) {
    super(400, "bad_request", message);
  }
}
