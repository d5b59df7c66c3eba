// src/errors.ts

/**
 * Base class for errors that map onto an HTTP response.
 * `code` is the public error string rendered as `{ error: code }`;
 * `message` stays server-side unless `expose` is set.
 */
export class ApiError extends Error {
  readonly expose: boolean = false;

  constructor(readonly status: number, readonly code: string, message: string = code) {
    super(message);
    this.name = new.target.name;
  }
}

/** Token signing could not complete (bad key material, malformed claims). */
export class EncodingFailure extends ApiError {
  constructor(detail: string) {
    super(500, "internal_error", `cannot encode token: ${detail}`);
  }
}

export type DecodingFailureReason = "empty" | "signature" | "expired" | "malformed";

/** Signature invalid, payload malformed, or token expired. */
export class DecodingFailure extends ApiError {
  constructor(readonly reason: DecodingFailureReason, detail: string = reason) {
    super(401, "unauthorized", `cannot decode token: ${detail}`);
  }
}

export class Unauthorized extends ApiError {
  constructor(code = "unauthorized") {
    super(401, code);
  }
}

/** Malformed secret/salt configuration. Fatal at startup. */
export class ConfigurationError extends ApiError {
  constructor(detail: string) {
    super(500, "internal_error", `configuration error: ${detail}`);
  }
}

export class NotFound extends ApiError {
  override readonly expose = true;

  constructor(message: string) {
    super(404, "not_found", message);
  }
}

export class BadRequest extends ApiError {
  override readonly expose = true;

  constructor(message: string) {
    super(400, "bad_request", message);
  }
}
