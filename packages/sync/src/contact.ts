import { type ContactCodec, EncodeError } from "@peer-cache/wire-format"

/**
 * Reference peer identity: a non-empty id of at most 255 UTF-8 bytes.
 */
export type PeerContact = {
  id: string
}

export const MAX_CONTACT_ID_BYTES = 0xff

const textEncoder = new TextEncoder()
const textDecoder = new TextDecoder("utf-8", { fatal: true })

/**
 * Check that `id` encodes to 1-255 UTF-8 bytes.
 */
export function isValidContactId(id: string): boolean {
  const length = textEncoder.encode(id).length
  return length > 0 && length <= MAX_CONTACT_ID_BYTES
}

/**
 * @throws EncodeError if `id` is empty or longer than 255 UTF-8 bytes
 */
export function assertContactId(id: string): void {
  if (!isValidContactId(id)) {
    throw new EncodeError(
      "out_of_range",
      `Contact id must be 1-${MAX_CONTACT_ID_BYTES} bytes, got ${textEncoder.encode(id).length}`,
    )
  }
}

/**
 * Contact codec: `[id length u8][id UTF-8]`.
 */
export const peerContactCodec: ContactCodec<PeerContact> = {
  encode(contact) {
    assertContactId(contact.id)
    const id = textEncoder.encode(contact.id)

    const out = new Uint8Array(1 + id.length)
    out[0] = id.length
    out.set(id, 1)
    return out
  },

  decode(buf) {
    if (buf.length < 1) return undefined

    const length = buf[0]
    if (length === 0 || buf.length < 1 + length) return undefined

    let id: string
    try {
      id = textDecoder.decode(buf.subarray(1, 1 + length))
    } catch {
      // invalid UTF-8
      return undefined
    }

    return { contact: { id }, rest: buf.subarray(1 + length) }
  },
}
