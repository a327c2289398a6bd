/**
 * Structured error classes and error classification.
 */

/**
 * Error codes used throughout the library.
 */
export const ErrorCode = {
  TRANSIENT: 'TRANSIENT',
  END_OF_STREAM: 'END_OF_STREAM',
  STREAM_CLOSED: 'STREAM_CLOSED',
  MESSAGE_TOO_LONG: 'MESSAGE_TOO_LONG',
  HANDLER_FAILED: 'HANDLER_FAILED',
  VALIDATION_FAILED: 'VALIDATION_FAILED',
} as const;

/**
 * Type representing valid error codes.
 */
export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * How the read and send paths treat an error.
 */
export const ErrorKind = {
  /** Retriable at the transport layer; suppressed everywhere. */
  Transient: 'transient',
  /** End-of-stream or use of a closed stream; ends the read loop silently. */
  Closed: 'closed',
  /** Anything else; surfaced to the application. */
  Other: 'other',
} as const;

export type ErrorKindType = (typeof ErrorKind)[keyof typeof ErrorKind];

/**
 * Base error class with code property.
 */
abstract class BaseError extends Error {
  abstract readonly code: ErrorCodeType;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON() {
    return {
      message: this.message,
      name: this.name,
      code: this.code,
      stack: this.stack,
    };
  }
}

/**
 * A temporary transport condition. Stream adapters and framers throw this
 * to have the failed operation ignored.
 */
export class TransientError extends BaseError {
  readonly code = 'TRANSIENT' as const;
  readonly temporary = true;

  constructor(message = 'Temporary stream error', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * The peer finished sending.
 */
export class EndOfStreamError extends BaseError {
  readonly code = 'END_OF_STREAM' as const;

  constructor(message = 'End of stream') {
    super(message);
  }
}

/**
 * An operation was attempted on a stream that has been closed.
 */
export class StreamClosedError extends BaseError {
  readonly code = 'STREAM_CLOSED' as const;

  constructor(message = 'Use of closed stream', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * A framer gave up on a message exceeding its configured length.
 */
export class MessageTooLongError extends BaseError {
  readonly code = 'MESSAGE_TOO_LONG' as const;

  constructor(maxLength: number) {
    super(`Message exceeds maximum length of ${maxLength} bytes`);
  }
}

/**
 * A data handler threw while processing a message.
 */
export class HandlerError extends BaseError {
  readonly code = 'HANDLER_FAILED' as const;

  constructor(cause: unknown) {
    super(`Data handler failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

/**
 * Thrown when option validation fails.
 */
export class ValidationError extends BaseError {
  readonly code = 'VALIDATION_FAILED' as const;

  constructor(message: string) {
    super(`Validation failed! ${message}`);
  }
}

/**
 * Type guard for errors with a code property.
 */
export function hasErrorCode(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/**
 * Extract error code safely, returning undefined if not present.
 */
export function getErrorCode(err: unknown): string | undefined {
  if (hasErrorCode(err)) {
    return err.code;
  }
  return undefined;
}

function isTemporary(err: unknown): boolean {
  return err instanceof Error && 'temporary' in err && err.temporary === true;
}

/**
 * Classify a thrown value for the read loop and the send paths.
 */
export function classifyError(err: unknown): ErrorKindType {
  if (isTemporary(err)) return ErrorKind.Transient;

  const code = getErrorCode(err);
  if (code === ErrorCode.END_OF_STREAM || code === ErrorCode.STREAM_CLOSED) {
    return ErrorKind.Closed;
  }
  return ErrorKind.Other;
}

/**
 * Normalize a thrown value into an Error instance.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
