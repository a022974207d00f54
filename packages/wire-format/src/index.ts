/**
 * @peer-cache/wire-format
 *
 * Binary encoding for the peer-to-peer cache synchronization protocol.
 *
 * - Envelope: `[operation u8][length u16][data]`, rejected as a whole when malformed
 * - Cache request: `[count u32]` + `[seq u64][contact]` per entry
 * - Cache response: `[count u32]` + `[length u32][message]` per entry
 *
 * List payloads never fail to decode. Entries that cannot be recovered are
 * reported as diagnostics next to the decoded value, and a corrupt message in
 * a response is skipped by its declared length.
 *
 * Contacts and messages are opaque: callers pass their codecs in.
 *
 * @example
 * ```typescript
 * import {
 *   decodeCacheResponse,
 *   decodeEnvelope,
 *   Operation,
 * } from "@peer-cache/wire-format"
 *
 * const result = decodeEnvelope(bytes)
 * if (result.status === "error") {
 *   console.error(`Envelope rejected: ${result.error.code}`)
 * } else if (result.envelope.operation === Operation.CacheResponse) {
 *   const { value, diagnostics } = decodeCacheResponse(
 *     result.envelope.data,
 *     messageCodec,
 *   )
 *   for (const entry of value.entries) store(entry.message)
 *   for (const d of diagnostics) console.warn(d.message)
 * }
 * ```
 */

// Constants
export {
  ENVELOPE_HEADER_SIZE,
  FRAME_LENGTH_SIZE,
  isOperation,
  LIST_COUNT_SIZE,
  MAX_ENVELOPE_DATA_LENGTH,
  MAX_UINT32,
  MAX_UINT64,
  Operation,
  SEQ_COUNTER_SIZE,
} from "./constants.js"
// Cache request
export { decodeCacheRequest, encodeCacheRequest } from "./cache-request.js"
// Cache response
export {
  decodeCacheResponse,
  encodeCacheResponse,
  encodeCacheResponseEnvelopes,
  type PackedCacheResponse,
} from "./cache-response.js"
// Cursor
export {
  ByteCursor,
  type FrameRead,
  readFrame,
  writeFrame,
} from "./cursor.js"
// Entries
export {
  decodeCacheSourceRef,
  decodeFramedMessage,
  encodeCacheSourceRef,
  encodeFramedMessage,
} from "./entries.js"
// Envelope
export {
  decodeEnvelope,
  type EnvelopeDecodeResult,
  encodeEnvelope,
} from "./envelope.js"
// Errors
export {
  DecodeError,
  type DecodeErrorCode,
  EncodeError,
  type EncodeErrorCode,
} from "./errors.js"
// Types
export type {
  CacheRequest,
  CacheRequestOptions,
  CacheResponse,
  CacheSourceRef,
  ContactCodec,
  ContactDecodeResult,
  ContactFraming,
  DecodeDiagnostic,
  DecodeOutcome,
  DiagnosticCode,
  EntryStep,
  Envelope,
  FramedMessage,
  MessageCodec,
} from "./types.js"
