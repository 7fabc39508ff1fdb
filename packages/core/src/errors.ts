/**
 * Error taxonomy shared by the CLI and the GUI.
 *
 * Every failure the user can act on is one of five kinds. The kind is the
 * stable field machine-readable output carries; the message is for humans.
 */

export type ErrorKind =
  | 'CredentialsMissing'
  | 'AuthenticationRejected'
  | 'ValidationFailed'
  | 'RemoteUnavailable'
  | 'UserCancelled';

export abstract class DshopError extends Error {
  abstract readonly kind: ErrorKind;
  /** HTTP status from the remote API, when the error came from a response. */
  readonly status?: number;
  /** Parsed error body returned by the remote API, if any. */
  readonly payload?: unknown;

  constructor(message: string, options: { status?: number; payload?: unknown } = {}) {
    super(message);
    this.status = options.status;
    this.payload = options.payload;
  }
}

export class CredentialsMissingError extends DshopError {
  readonly kind = 'CredentialsMissing';

  constructor(message = 'no API credentials found') {
    super(message);
    this.name = 'CredentialsMissingError';
  }
}

export class AuthenticationRejectedError extends DshopError {
  readonly kind = 'AuthenticationRejected';

  constructor(message: string, options: { status?: number; payload?: unknown } = {}) {
    super(message, options);
    this.name = 'AuthenticationRejectedError';
  }
}

export class ValidationFailedError extends DshopError {
  readonly kind = 'ValidationFailed';

  constructor(message: string, options: { status?: number; payload?: unknown } = {}) {
    super(message, options);
    this.name = 'ValidationFailedError';
  }
}

export class RemoteUnavailableError extends DshopError {
  readonly kind = 'RemoteUnavailable';

  constructor(message: string, options: { status?: number; payload?: unknown } = {}) {
    super(message, options);
    this.name = 'RemoteUnavailableError';
  }
}

export class UserCancelledError extends DshopError {
  readonly kind = 'UserCancelled';

  constructor(message = 'cancelled') {
    super(message);
    this.name = 'UserCancelledError';
  }
}

export interface ErrorBody {
  error: {
    kind: ErrorKind | 'Internal';
    message: string;
    status?: number;
  };
}

/**
 * Structured form of an error for JSON output.
 * Anything that is not a DshopError is reported with kind `Internal`.
 */
export function toErrorBody(err: unknown): ErrorBody {
  if (err instanceof DshopError) {
    const body: ErrorBody = { error: { kind: err.kind, message: err.message } };
    if (err.status !== undefined) body.error.status = err.status;
    return body;
  }
  const message = err instanceof Error ? err.message : String(err);
  return { error: { kind: 'Internal', message } };
}
