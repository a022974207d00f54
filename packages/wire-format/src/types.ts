/**
 * Protocol value types and the contracts for the external Contact and
 * Message codecs.
 */

import type { Operation } from "./constants.js"

/**
 * Outer frame tagging a payload with its operation.
 */
export type Envelope = {
  operation: Operation
  data: Uint8Array
}

/**
 * Cache request entry: the highest sequence counter a node holds for a source.
 */
export type CacheSourceRef<C> = {
  seqCounter: bigint
  source: C
}

/**
 * Cache response entry. `length` is the declared byte length of the message
 * as it was read from the wire.
 */
export type FramedMessage<M> = {
  length: number
  message: M
}

/**
 * `declaredCount` is whatever the sender wrote in the header. It is only an
 * upper bound for decoding; `entries.length` is what was recovered.
 */
export type CacheRequest<C> = {
  declaredCount: number
  entries: CacheSourceRef<C>[]
}

export type CacheResponse<M> = {
  declaredCount: number
  entries: FramedMessage<M>[]
}

/**
 * How cache request entries are laid out.
 *
 * - `inline`: `[seq u64][contact]`, contact must be self-delimiting
 * - `framed`: `[length u32][seq u64][contact]`, corrupt entries can be skipped
 */
export type ContactFraming = "inline" | "framed"

export type CacheRequestOptions = {
  contactFraming?: ContactFraming
}

/**
 * Result of a successful contact decode. `rest` is the unread tail of the
 * buffer handed to the decoder.
 */
export type ContactDecodeResult<C> = {
  contact: C
  rest: Uint8Array
}

/**
 * Codec for the opaque Contact type. Contact bytes are self-delimiting.
 */
export interface ContactCodec<C> {
  encode(contact: C): Uint8Array
  decode(buf: Uint8Array): ContactDecodeResult<C> | undefined
}

/**
 * Codec for the opaque Message type. The decoder receives exactly the bytes
 * of one message; the declared frame length decides where the next one starts.
 */
export interface MessageCodec<M> {
  encode(message: M): Uint8Array
  decode(buf: Uint8Array): M | undefined
}

export type DiagnosticCode =
  | "truncated_count"
  | "truncated_entry"
  | "frame_out_of_bounds"
  | "corrupt_contact"
  | "corrupt_message"
  | "short_list"
  | "trailing_bytes"

/**
 * A non-fatal problem found while decoding a list payload.
 */
export type DecodeDiagnostic = {
  code: DiagnosticCode
  /** Zero-based entry index the problem belongs to */
  index: number
  /** Byte offset into the payload where the entry started */
  offset: number
  message: string
  cause?: unknown
}

export type DecodeOutcome<T> = {
  value: T
  diagnostics: DecodeDiagnostic[]
}

/**
 * One step of a list decoder over a shared cursor. `next` is the cursor
 * offset after the step.
 */
export type EntryStep<T> =
  | { status: "ok"; value: T; next: number }
  | { status: "skipped"; diagnostic: DecodeDiagnostic; next: number }
  | { status: "stopped"; diagnostic: DecodeDiagnostic; next: number }
