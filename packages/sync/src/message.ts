/**
 * Reference message type and its CBOR codec.
 *
 * A message is encoded as a CBOR map with compact keys:
 * - `s`: source contact id
 * - `q`: sequence counter as a decimal string (u64 does not fit a JS number)
 * - `b`: body bytes
 */

import { type CBORType, decodeCBOR, encodeCBOR } from "@levischuck/tiny-cbor"
import { MAX_UINT64, type MessageCodec } from "@peer-cache/wire-format"
import {
  assertContactId,
  isValidContactId,
  type PeerContact,
} from "./contact.js"

export type CachedMessage = {
  source: PeerContact
  seq: bigint
  body: Uint8Array
}

function parseSeq(value: CBORType | undefined): bigint | undefined {
  if (typeof value !== "string" || !/^(0|[1-9]\d*)$/.test(value)) {
    return undefined
  }
  const seq = BigInt(value)
  return seq > MAX_UINT64 ? undefined : seq
}

/**
 * Copy `data` into a plain Uint8Array that owns its whole buffer.
 *
 * tiny-cbor only accepts plain Uint8Array or DataView, and reads from the
 * start of the underlying ArrayBuffer regardless of `byteOffset`.
 */
function normalizeUint8Array(data: Uint8Array): Uint8Array {
  if (
    data.constructor === Uint8Array &&
    data.byteOffset === 0 &&
    data.byteLength === data.buffer.byteLength
  ) {
    return data
  }
  return new Uint8Array(data)
}

export const cachedMessageCodec: MessageCodec<CachedMessage> = {
  encode(message) {
    assertContactId(message.source.id)
    const map = new Map<string | number, CBORType>([
      ["s", message.source.id],
      ["q", message.seq.toString()],
      ["b", message.body],
    ])
    return encodeCBOR(map)
  },

  decode(buf) {
    let decoded: CBORType
    try {
      decoded = decodeCBOR(normalizeUint8Array(buf))
    } catch {
      // not valid CBOR
      return undefined
    }

    if (!(decoded instanceof Map)) return undefined

    const source = decoded.get("s")
    const seq = parseSeq(decoded.get("q"))
    const body = decoded.get("b")

    if (typeof source !== "string" || !isValidContactId(source)) return undefined
    if (seq === undefined || !(body instanceof Uint8Array)) return undefined

    return { source: { id: source }, seq, body: new Uint8Array(body) }
  },
}
