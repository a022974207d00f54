/**
 * Envelope codec: the outer frame that tags a payload with its operation.
 *
 * Frame Structure:
 * ┌───────────┬────────────────────────┬──────────────────────────────┐
 * │ Operation │ Data Length            │ Data                         │
 * │ (1 byte)  │ (2 bytes, little-end.) │ (Data Length bytes)          │
 * └───────────┴────────────────────────┴──────────────────────────────┘
 *
 * There is no outer boundary to resynchronize on, so a malformed envelope is
 * rejected as a whole.
 */

import {
  ENVELOPE_HEADER_SIZE,
  isOperation,
  MAX_ENVELOPE_DATA_LENGTH,
  type Operation,
} from "./constants.js"
import { ByteCursor } from "./cursor.js"
import { DecodeError, EncodeError } from "./errors.js"
import type { Envelope } from "./types.js"

export type EnvelopeDecodeResult =
  | { status: "ok"; envelope: Envelope }
  | { status: "error"; error: DecodeError }

/**
 * Wrap `data` in an envelope.
 *
 * @throws EncodeError if the operation is unknown or `data` exceeds 65535 bytes
 */
export function encodeEnvelope(operation: Operation, data: Uint8Array): Uint8Array {
  if (!isOperation(operation)) {
    throw new EncodeError(
      "unknown_operation",
      `Unknown envelope operation: ${operation}`,
    )
  }
  if (data.length > MAX_ENVELOPE_DATA_LENGTH) {
    throw new EncodeError(
      "payload_too_large",
      `Envelope data of ${data.length} bytes exceeds ${MAX_ENVELOPE_DATA_LENGTH}`,
    )
  }

  const frame = new Uint8Array(ENVELOPE_HEADER_SIZE + data.length)
  const view = new DataView(frame.buffer)

  view.setUint8(0, operation)
  view.setUint16(1, data.length, true)
  frame.set(data, ENVELOPE_HEADER_SIZE)

  return frame
}

/**
 * Decode an envelope. Never throws; bytes past the declared data are ignored.
 */
export function decodeEnvelope(frame: Uint8Array): EnvelopeDecodeResult {
  const cursor = new ByteCursor(frame)

  const operation = cursor.readUint8()
  const dataLength = cursor.readUint16()
  if (operation === undefined || dataLength === undefined) {
    return fail(
      "truncated_header",
      `Envelope too short: expected at least ${ENVELOPE_HEADER_SIZE} bytes, got ${frame.length}`,
    )
  }

  if (!isOperation(operation)) {
    return fail("unknown_operation", `Unknown envelope operation: ${operation}`)
  }

  const data = cursor.take(dataLength)
  if (data === undefined) {
    return fail(
      "truncated_frame",
      `Envelope truncated: expected ${ENVELOPE_HEADER_SIZE + dataLength} bytes, got ${frame.length}`,
    )
  }

  // Copy into a plain Uint8Array; Buffer.slice would return a view
  return { status: "ok", envelope: { operation, data: new Uint8Array(data) } }
}

function fail(
  code: DecodeError["code"],
  message: string,
): EnvelopeDecodeResult {
  return { status: "error", error: new DecodeError(code, message) }
}
