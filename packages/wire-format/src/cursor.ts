/**
 * Forward-only reader over a byte buffer.
 *
 * Reads never throw: when too few bytes remain they return `undefined` and
 * leave the offset where it was, so list decoders can stop cleanly at any
 * point in a truncated payload.
 */

import { FRAME_LENGTH_SIZE, MAX_UINT32 } from "./constants.js"
import { EncodeError } from "./errors.js"

export class ByteCursor {
  readonly buffer: Uint8Array
  readonly #view: DataView
  #offset: number

  constructor(buffer: Uint8Array, offset = 0) {
    if (!Number.isInteger(offset) || offset < 0 || offset > buffer.length) {
      throw new RangeError(
        `Cursor offset ${offset} outside buffer of ${buffer.length} bytes`,
      )
    }
    this.buffer = buffer
    this.#view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength)
    this.#offset = offset
  }

  get offset(): number {
    return this.#offset
  }

  get remaining(): number {
    return this.buffer.length - this.#offset
  }

  readUint8(): number | undefined {
    if (this.remaining < 1) return undefined
    const value = this.#view.getUint8(this.#offset)
    this.#offset += 1
    return value
  }

  readUint16(): number | undefined {
    if (this.remaining < 2) return undefined
    const value = this.#view.getUint16(this.#offset, true)
    this.#offset += 2
    return value
  }

  readUint32(): number | undefined {
    if (this.remaining < 4) return undefined
    const value = this.#view.getUint32(this.#offset, true)
    this.#offset += 4
    return value
  }

  /**
   * Read a u32 without advancing.
   */
  peekUint32(): number | undefined {
    if (this.remaining < 4) return undefined
    return this.#view.getUint32(this.#offset, true)
  }

  readUint64(): bigint | undefined {
    if (this.remaining < 8) return undefined
    const value = this.#view.getBigUint64(this.#offset, true)
    this.#offset += 8
    return value
  }

  /**
   * Take the next `length` bytes as a view into the buffer.
   */
  take(length: number): Uint8Array | undefined {
    if (length < 0 || this.remaining < length) return undefined
    const bytes = this.buffer.subarray(this.#offset, this.#offset + length)
    this.#offset += length
    return bytes
  }

  /**
   * Unread bytes, without advancing.
   */
  rest(): Uint8Array {
    return this.buffer.subarray(this.#offset)
  }

  skip(length: number): void {
    if (!Number.isInteger(length) || length < 0 || length > this.remaining) {
      throw new RangeError(
        `Cannot skip ${length} bytes with ${this.remaining} remaining`,
      )
    }
    this.#offset += length
  }
}

/**
 * Outcome of reading one `[length u32][payload]` frame.
 */
export type FrameRead =
  | { status: "frame"; start: number; length: number; bytes: Uint8Array }
  | { status: "truncated_length"; start: number; available: number }
  | { status: "out_of_bounds"; start: number; length: number; available: number }

/**
 * Read a length-prefixed frame.
 *
 * On success the cursor is already past the whole frame, whatever the caller
 * later makes of `bytes`. A payload that fails to parse therefore costs exactly
 * its declared length and the next frame starts where the sender put it.
 * On failure the cursor does not move.
 */
export function readFrame(cursor: ByteCursor): FrameRead {
  const start = cursor.offset

  const length = cursor.peekUint32()
  if (length === undefined) {
    return { status: "truncated_length", start, available: cursor.remaining }
  }

  const available = cursor.remaining - FRAME_LENGTH_SIZE
  if (available < length) {
    return { status: "out_of_bounds", start, length, available }
  }

  const payloadStart = start + FRAME_LENGTH_SIZE
  const bytes = cursor.buffer.subarray(payloadStart, payloadStart + length)
  cursor.skip(FRAME_LENGTH_SIZE + length)

  return { status: "frame", start, length, bytes }
}

/**
 * Prefix `payload` with its u32 length.
 */
export function writeFrame(payload: Uint8Array): Uint8Array {
  if (payload.length > MAX_UINT32) {
    throw new EncodeError(
      "out_of_range",
      `Frame payload of ${payload.length} bytes exceeds u32 length prefix`,
    )
  }
  const frame = new Uint8Array(FRAME_LENGTH_SIZE + payload.length)
  const view = new DataView(frame.buffer)
  view.setUint32(0, payload.length, true)
  frame.set(payload, FRAME_LENGTH_SIZE)
  return frame
}
