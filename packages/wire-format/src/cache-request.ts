/**
 * Cache request payload: the entries a node already holds, so the peer only
 * sends what is missing.
 *
 * ┌─────────────────┬──────────────────────┬──────────────────────┬─────┐
 * │ Count (u32)     │ Seq (u64) │ Contact  │ Seq (u64) │ Contact  │ ... │
 * └─────────────────┴──────────────────────┴──────────────────────┴─────┘
 */

import { withCount } from "./bytes.js"
import { MAX_UINT32 } from "./constants.js"
import { decodeCacheSourceRef, encodeCacheSourceRef } from "./entries.js"
import { EncodeError } from "./errors.js"
import { decodeList } from "./list.js"
import type {
  CacheRequest,
  CacheRequestOptions,
  CacheSourceRef,
  ContactCodec,
  DecodeOutcome,
} from "./types.js"

/**
 * Encode a cache request. The written count is always `entries.length`.
 */
export function encodeCacheRequest<C>(
  entries: readonly CacheSourceRef<C>[],
  codec: ContactCodec<C>,
  options: CacheRequestOptions = {},
): Uint8Array {
  if (entries.length > MAX_UINT32) {
    throw new EncodeError(
      "out_of_range",
      `Cache request with ${entries.length} entries exceeds u32 count`,
    )
  }

  const framing = options.contactFraming ?? "inline"
  return withCount(
    entries.length,
    entries.map(entry => encodeCacheSourceRef(entry, codec, framing)),
  )
}

/**
 * Decode a cache request. Never throws.
 *
 * In the default inline layout a corrupt contact ends decoding: the entries
 * before it are returned, the rest are lost. The framed layout skips the bad
 * entry and carries on.
 */
export function decodeCacheRequest<C>(
  bytes: Uint8Array,
  codec: ContactCodec<C>,
  options: CacheRequestOptions = {},
): DecodeOutcome<CacheRequest<C>> {
  const framing = options.contactFraming ?? "inline"
  return decodeList(bytes, "Cache request", (cursor, index) =>
    decodeCacheSourceRef(cursor, codec, index, framing),
  )
}
