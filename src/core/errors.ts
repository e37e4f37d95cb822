/** Base class for every error raised by the client and the page builder. */
export abstract class ConfluenceError extends Error {
  override readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = new.target.name;
    this.cause = options?.cause;
  }
}

/** The space, page or attachment does not exist remotely. */
export class NotFoundError extends ConfluenceError {}

/** A name matched more than one remote entity. */
export class AmbiguousResultError extends ConfluenceError {}

/** Duplicate create or stale version rejected by the API. */
export class ConflictError extends ConfluenceError {}

export class InvalidArgumentError extends ConfluenceError {
  constructor(message: string, options?: { cause?: unknown; argument?: string }) {
    super(
      options?.argument ? `${message} (argument: ${options.argument})` : message,
      { cause: options?.cause }
    );
  }
}

/** Network failure or an HTTP status with no more specific meaning. */
export class TransportError extends ConfluenceError {
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, options?: { cause?: unknown; status?: number; body?: string }) {
    super(message, { cause: options?.cause });
    this.status = options?.status;
    this.body = options?.body;
  }
}
