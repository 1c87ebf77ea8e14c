/**
 * Typed error catalog for interactions with CUBE and local file transfers.
 *
 * Every error carries a stable `code` so that callers (and the CLI) can
 * branch on the kind of failure without string-matching messages.
 */

export class ChrisError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Transport and decoding

export type RequestFailure = "network" | "decode";

/** No usable response: connection failure, timeout, or a body that does not decode. */
export class RequestError extends ChrisError {
  constructor(
    public readonly kind: RequestFailure,
    public readonly url: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(
      kind === "network" ? "REQUEST_FAILED" : "DECODE_FAILED",
      message,
      { url },
      options,
    );
  }
}

/** Non-2xx response. `body` is the response text, verbatim. */
export class RemoteError extends ChrisError {
  constructor(
    public readonly status: number,
    public readonly reason: string,
    public readonly url: string,
    public readonly body: string,
  ) {
    super(
      "REMOTE_ERROR",
      body.length > 0
        ? `(${status} ${reason}): ${body}`
        : `(${status} ${reason})`,
      { status, url },
    );
  }
}

// Collection shape

export class EmptyCollectionError extends ChrisError {
  constructor(details?: Record<string, unknown>) {
    super("EMPTY_COLLECTION", "Empty collection", details);
  }
}

export class TooManyResultsError extends ChrisError {
  constructor(
    public readonly count: number,
    details?: Record<string, unknown>,
  ) {
    super("TOO_MANY_RESULTS", "More than one result in collection", {
      count,
      ...details,
    });
  }
}

export class NotFoundError extends ChrisError {
  constructor(what: string) {
    super("NOT_FOUND", `"${what}" not found`, { what });
  }
}

export class NotLoggedInError extends ChrisError {
  constructor(operation: string) {
    super("NOT_LOGGED_IN", `${operation} requires a username and token`, {
      operation,
    });
  }
}

export class InvalidCubeUrlError extends ChrisError {
  constructor(url: string, reason: string) {
    super("INVALID_CUBE_URL", `${reason}: ${url}`, { url });
  }
}

// Transfer executor invariants

export class UnderfullError extends ChrisError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(
      "UNDERFULL",
      `Expected ${expected} tasks but the source produced only ${actual}`,
      { expected, actual },
    );
  }
}

export class OverfullError extends ChrisError {
  constructor(public readonly expected: number) {
    super(
      "OVERFULL",
      `Expected ${expected} tasks but the source produced more`,
      { expected },
    );
  }
}

// Pipeline documents

export class InvalidPipelineError extends ChrisError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super("INVALID_PIPELINE", reason, details);
  }
}

// Local filesystem

export class FileIOError extends ChrisError {
  constructor(
    public readonly path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("FILE_IO", message, { path }, options);
  }
}
