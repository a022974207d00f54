/**
 * Cache response payload: the messages the requester is missing.
 *
 * ┌─────────────┬────────────┬─────────────────┬────────────┬─────────┬─────┐
 * │ Count (u32) │ Len (u32)  │ Message (Len)   │ Len (u32)  │ Message │ ... │
 * └─────────────┴────────────┴─────────────────┴────────────┴─────────┴─────┘
 *
 * Every message carries its own length so that one corrupted message can be
 * stepped over without losing the ones after it.
 */

import { withCount } from "./bytes.js"
import {
  FRAME_LENGTH_SIZE,
  LIST_COUNT_SIZE,
  MAX_ENVELOPE_DATA_LENGTH,
  MAX_UINT32,
  Operation,
} from "./constants.js"
import { decodeFramedMessage, encodeFramedMessage } from "./entries.js"
import { encodeEnvelope } from "./envelope.js"
import { EncodeError } from "./errors.js"
import { decodeList } from "./list.js"
import type { CacheResponse, DecodeOutcome, MessageCodec } from "./types.js"

/**
 * Encode a cache response carrying `messages` in order.
 */
export function encodeCacheResponse<M>(
  messages: readonly M[],
  codec: MessageCodec<M>,
): Uint8Array {
  if (messages.length > MAX_UINT32) {
    throw new EncodeError(
      "out_of_range",
      `Cache response with ${messages.length} entries exceeds u32 count`,
    )
  }
  return withCount(
    messages.length,
    messages.map(message => encodeFramedMessage(message, codec)),
  )
}

/**
 * Decode a cache response. Never throws.
 *
 * The result may hold fewer entries than `declaredCount`; corrupt messages
 * are dropped and reported in `diagnostics`.
 */
export function decodeCacheResponse<M>(
  bytes: Uint8Array,
  codec: MessageCodec<M>,
): DecodeOutcome<CacheResponse<M>> {
  return decodeList(bytes, "Cache response", (cursor, index) =>
    decodeFramedMessage(cursor, codec, index),
  )
}

export type PackedCacheResponse<M> = {
  /** Envelope-wrapped cache responses, in send order */
  envelopes: Uint8Array[]
  /** Messages too large to fit in any envelope */
  oversized: M[]
}

/**
 * Pack messages into as many cache response envelopes as needed, keeping
 * every envelope's data within `maxDataLength` bytes.
 *
 * Message order is preserved across envelopes. An empty message list still
 * yields one envelope with an empty response.
 *
 * @throws EncodeError if `maxDataLength` cannot hold a single-byte message
 */
export function encodeCacheResponseEnvelopes<M>(
  messages: readonly M[],
  codec: MessageCodec<M>,
  maxDataLength: number = MAX_ENVELOPE_DATA_LENGTH,
): PackedCacheResponse<M> {
  const minimum = LIST_COUNT_SIZE + FRAME_LENGTH_SIZE + 1
  if (
    !Number.isInteger(maxDataLength) ||
    maxDataLength < minimum ||
    maxDataLength > MAX_ENVELOPE_DATA_LENGTH
  ) {
    throw new EncodeError(
      "out_of_range",
      `maxDataLength must be an integer in [${minimum}, ${MAX_ENVELOPE_DATA_LENGTH}], got ${maxDataLength}`,
    )
  }

  const envelopes: Uint8Array[] = []
  const oversized: M[] = []
  let batch: Uint8Array[] = []
  let batchSize = LIST_COUNT_SIZE

  const flush = () => {
    envelopes.push(
      encodeEnvelope(Operation.CacheResponse, withCount(batch.length, batch)),
    )
    batch = []
    batchSize = LIST_COUNT_SIZE
  }

  for (const message of messages) {
    const frame = encodeFramedMessage(message, codec)

    if (LIST_COUNT_SIZE + frame.length > maxDataLength) {
      oversized.push(message)
      continue
    }
    if (batchSize + frame.length > maxDataLength) {
      flush()
    }

    batch.push(frame)
    batchSize += frame.length
  }

  if (batch.length > 0 || envelopes.length === 0) {
    flush()
  }

  return { envelopes, oversized }
}
