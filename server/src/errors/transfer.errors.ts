/**
 * Transfer engine error types.
 *
 * Every error carries a stable `code`, whether retrying the same operation
 * can help (`retryable`), and whether the failure is permanent for the
 * caller (`permanent`, e.g. a bad range) rather than transient.
 */

export class TransferError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;
  public readonly permanent: boolean;

  constructor(
    message: string,
    code: string,
    options?: { retryable?: boolean; permanent?: boolean; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "TransferError";
    this.code = code;
    this.retryable = options?.retryable ?? false;
    this.permanent = options?.permanent ?? false;
    Object.setPrototypeOf(this, TransferError.prototype);
  }
}

/**
 * The source stream ended or failed before a clean end-of-stream.
 */
export class ShortReadError extends TransferError {
  public readonly bytesRead: number;
  public readonly expectedSize?: number;

  constructor(
    message: string,
    options: { bytesRead: number; expectedSize?: number; cause?: unknown },
  ) {
    super(message, "Source.ShortRead", { cause: options.cause });
    this.name = "ShortReadError";
    this.bytesRead = options.bytesRead;
    this.expectedSize = options.expectedSize;
    Object.setPrototypeOf(this, ShortReadError.prototype);
  }
}

export class ObjectTooLargeError extends TransferError {
  public readonly limit: number;

  constructor(limit: number, message?: string) {
    super(
      message ?? `Object exceeds the maximum size of ${limit} bytes`,
      "Source.TooLarge",
      { permanent: true },
    );
    this.name = "ObjectTooLargeError";
    this.limit = limit;
    Object.setPrototypeOf(this, ObjectTooLargeError.prototype);
  }
}

/**
 * A destination rejected or failed a chunk (or the upload lifecycle call
 * around it) after retries were exhausted.
 */
export class ChunkPutError extends TransferError {
  public readonly destination: string;
  public readonly sequenceNumber?: number;
  public readonly attempts: number;
  public readonly confirmedOffset: number;

  constructor(
    message: string,
    options: {
      destination: string;
      sequenceNumber?: number;
      attempts: number;
      confirmedOffset: number;
      cause?: unknown;
    },
  ) {
    super(message, "Destination.PutFailed", { cause: options.cause });
    this.name = "ChunkPutError";
    this.destination = options.destination;
    this.sequenceNumber = options.sequenceNumber;
    this.attempts = options.attempts;
    this.confirmedOffset = options.confirmedOffset;
    Object.setPrototypeOf(this, ChunkPutError.prototype);
  }
}

export class RangeNotSatisfiableError extends TransferError {
  public readonly start: number;
  public readonly totalSize?: number;

  constructor(start: number, totalSize?: number, message?: string) {
    super(
      message ??
        `Range starting at ${start} is not satisfiable` +
          (totalSize === undefined ? "" : ` for an object of ${totalSize} bytes`),
      "Range.NotSatisfiable",
      { permanent: true },
    );
    this.name = "RangeNotSatisfiableError";
    this.start = start;
    this.totalSize = totalSize;
    Object.setPrototypeOf(this, RangeNotSatisfiableError.prototype);
  }
}

export class ObjectNotFoundError extends TransferError {
  public readonly objectId: string;

  constructor(objectId: string) {
    super(`Object not found: ${objectId}`, "Object.NotFound", {
      permanent: true,
    });
    this.name = "ObjectNotFoundError";
    this.objectId = objectId;
    Object.setPrototypeOf(this, ObjectNotFoundError.prototype);
  }
}

export class InvalidStateError extends TransferError {
  constructor(message: string, code: string = "Session.InvalidState") {
    super(message, code);
    this.name = "InvalidStateError";
    Object.setPrototypeOf(this, InvalidStateError.prototype);
  }
}

export class AlreadyStartedError extends InvalidStateError {
  constructor(sessionId: string) {
    super(`Session ${sessionId} has already been started`, "Session.AlreadyStarted");
    this.name = "AlreadyStartedError";
    Object.setPrototypeOf(this, AlreadyStartedError.prototype);
  }
}

/**
 * Another session is still writing this object. Retry once it settles.
 */
export class ObjectBusyError extends TransferError {
  public readonly objectId: string;
  public readonly sessionId: string;

  constructor(objectId: string, sessionId: string) {
    super(
      `Object ${objectId} is still being written by session ${sessionId}`,
      "Object.UploadInProgress",
      { retryable: true },
    );
    this.name = "ObjectBusyError";
    this.objectId = objectId;
    this.sessionId = sessionId;
    Object.setPrototypeOf(this, ObjectBusyError.prototype);
  }
}

/**
 * Every reachable destination was exhausted. Safe to retry later.
 */
export class DestinationUnavailableError extends TransferError {
  public readonly destination?: string;

  constructor(message: string, options?: { destination?: string; cause?: unknown }) {
    super(message, "Destination.Unavailable", {
      retryable: true,
      cause: options?.cause,
    });
    this.name = "DestinationUnavailableError";
    this.destination = options?.destination;
    Object.setPrototypeOf(this, DestinationUnavailableError.prototype);
  }
}

export class ChunkTimeoutError extends TransferError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`, "Destination.Timeout", {
      retryable: true,
    });
    this.name = "ChunkTimeoutError";
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, ChunkTimeoutError.prototype);
  }
}

export class TransferCancelledError extends TransferError {
  constructor(message: string = "Transfer cancelled") {
    super(message, "Session.Cancelled");
    this.name = "TransferCancelledError";
    Object.setPrototypeOf(this, TransferCancelledError.prototype);
  }
}

export class ConfigurationError extends TransferError {
  constructor(message: string) {
    super(message, "Configuration");
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Errors outside the taxonomy (socket resets, DNS failures) are treated as
 * transient.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof TransferError) {
    return error.retryable;
  }
  return true;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
