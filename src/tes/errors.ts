/**
 * Error taxonomy of the TES client. Every failure the client raises is a
 * TesError; `kind` lets callers branch without instanceof chains.
 */

export type TesErrorKind =
  | "client"
  | "authentication"
  | "not_found"
  | "server"
  | "validation";

export interface TesErrorOptions {
  status?: number;
  cause?: unknown;
}

export abstract class TesError extends Error {
  abstract readonly kind: TesErrorKind;
  readonly status?: number;

  constructor(message: string, options: TesErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.status = options.status;
  }
}

/** Network failure, timeout, malformed response, or invalid call arguments. */
export class TesClientError extends TesError {
  readonly kind: TesErrorKind = "client";

  constructor(message: string, options?: TesErrorOptions) {
    super(message, options);
    this.name = "TesClientError";
  }
}

/** 401 or 403 from the service. */
export class TesAuthenticationError extends TesError {
  readonly kind = "authentication";

  constructor(message: string, options?: TesErrorOptions) {
    super(message, options);
    this.name = "TesAuthenticationError";
  }
}

/** 404 on a task lookup. */
export class TesNotFoundError extends TesError {
  readonly kind = "not_found";

  constructor(
    message: string,
    public readonly taskId: string,
    options?: TesErrorOptions
  ) {
    super(message, options);
    this.name = "TesNotFoundError";
  }
}

/** 5xx, or any other unexpected non-success status. */
export class TesServerError extends TesError {
  readonly kind = "server";

  constructor(message: string, options?: TesErrorOptions) {
    super(message, options);
    this.name = "TesServerError";
  }
}

/** The service accepted a request but its answer breaks the protocol (e.g. no task id). */
export class TesValidationError extends TesClientError {
  override readonly kind = "validation";

  constructor(message: string, options?: TesErrorOptions) {
    super(message, options);
    this.name = "TesValidationError";
  }
}
