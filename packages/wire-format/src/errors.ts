/**
 * Error types for wire format encoding and decoding.
 */

/**
 * Error codes for envelope decode failures.
 */
export type DecodeErrorCode =
  | "truncated_header"
  | "truncated_frame"
  | "unknown_operation"

/**
 * Error describing why an envelope could not be decoded.
 *
 * Only the envelope decoder produces these; list payloads report problems as
 * diagnostics instead.
 */
export class DecodeError extends Error {
  override readonly name = "DecodeError"

  constructor(
    public readonly code: DecodeErrorCode,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message)
    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DecodeError)
    }
  }
}

export type EncodeErrorCode =
  | "payload_too_large"
  | "out_of_range"
  | "unknown_operation"

/**
 * Error thrown when a value cannot be represented on the wire.
 */
export class EncodeError extends Error {
  override readonly name = "EncodeError"

  constructor(
    public readonly code: EncodeErrorCode,
    message: string,
  ) {
    super(message)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EncodeError)
    }
  }
}
