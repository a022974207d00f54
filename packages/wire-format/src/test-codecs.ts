/**
 * Minimal contact and message codecs for exercising the wire format.
 *
 * Contact: `[length u8][printable ASCII]`
 * Message: `'M'` followed by printable ASCII
 */

import type { ContactCodec, MessageCodec } from "./types.js"

const MESSAGE_TAG = 0x4d

function isPrintable(bytes: Uint8Array): boolean {
  return bytes.every(b => b >= 0x20 && b <= 0x7e)
}

function ascii(text: string): Uint8Array {
  return Uint8Array.from(text, ch => ch.charCodeAt(0))
}

export const testContactCodec: ContactCodec<string> = {
  encode(contact) {
    const bytes = ascii(contact)
    const out = new Uint8Array(1 + bytes.length)
    out[0] = bytes.length
    out.set(bytes, 1)
    return out
  },
  decode(buf) {
    if (buf.length < 1) return undefined
    const length = buf[0]
    if (length === 0 || buf.length < 1 + length) return undefined
    const bytes = buf.subarray(1, 1 + length)
    if (!isPrintable(bytes)) return undefined
    return {
      contact: String.fromCharCode(...bytes),
      rest: buf.subarray(1 + length),
    }
  },
}

export const testMessageCodec: MessageCodec<string> = {
  encode(message) {
    const out = new Uint8Array(1 + message.length)
    out[0] = MESSAGE_TAG
    out.set(ascii(message), 1)
    return out
  },
  decode(buf) {
    if (buf.length < 1 || buf[0] !== MESSAGE_TAG) return undefined
    const text = buf.subarray(1)
    if (!isPrintable(text)) return undefined
    return String.fromCharCode(...text)
  },
}
