/**
 * Codecs for the two list elements: cache source references (request) and
 * framed messages (response).
 *
 * Decoders work on a shared cursor and report one `EntryStep` per entry, so a
 * list decoder can chain them without re-slicing the payload.
 */

import { concatBytes } from "./bytes.js"
import { MAX_UINT64, SEQ_COUNTER_SIZE } from "./constants.js"
import { ByteCursor, readFrame, writeFrame } from "./cursor.js"
import { EncodeError } from "./errors.js"
import type {
  CacheSourceRef,
  ContactCodec,
  ContactFraming,
  DecodeDiagnostic,
  DiagnosticCode,
  EntryStep,
  FramedMessage,
  MessageCodec,
} from "./types.js"

export function diagnostic(
  code: DiagnosticCode,
  index: number,
  offset: number,
  message: string,
  cause?: unknown,
): DecodeDiagnostic {
  return cause === undefined
    ? { code, index, offset, message }
    : { code, index, offset, message, cause }
}

//
// Cache source references
//

/**
 * Encode `[seq u64][contact]`, length-prefixed when `framing` is `framed`.
 *
 * @throws EncodeError if the counter is outside the u64 range
 */
export function encodeCacheSourceRef<C>(
  ref: CacheSourceRef<C>,
  codec: ContactCodec<C>,
  framing: ContactFraming = "inline",
): Uint8Array {
  if (ref.seqCounter < 0n || ref.seqCounter > MAX_UINT64) {
    throw new EncodeError(
      "out_of_range",
      `Sequence counter ${ref.seqCounter} is outside the u64 range`,
    )
  }

  const counter = new Uint8Array(SEQ_COUNTER_SIZE)
  new DataView(counter.buffer).setBigUint64(0, ref.seqCounter, true)
  const body = concatBytes([counter, codec.encode(ref.source)])

  return framing === "framed" ? writeFrame(body) : body
}

/**
 * Decode one cache source reference at the cursor.
 *
 * Inline entries carry no length, so a contact that fails to decode leaves no
 * way to find the next entry and the step is `stopped`. Framed entries are
 * `skipped` past their declared length instead.
 */
export function decodeCacheSourceRef<C>(
  cursor: ByteCursor,
  codec: ContactCodec<C>,
  index: number,
  framing: ContactFraming = "inline",
): EntryStep<CacheSourceRef<C>> {
  return framing === "framed"
    ? decodeFramedSourceRef(cursor, codec, index)
    : decodeInlineSourceRef(cursor, codec, index)
}

function decodeInlineSourceRef<C>(
  cursor: ByteCursor,
  codec: ContactCodec<C>,
  index: number,
): EntryStep<CacheSourceRef<C>> {
  const start = cursor.offset

  // counter plus at least one contact byte
  if (cursor.remaining < SEQ_COUNTER_SIZE + 1) {
    return {
      status: "stopped",
      diagnostic: diagnostic(
        "truncated_entry",
        index,
        start,
        `Cache entry ${index} truncated: ${cursor.remaining} bytes left, need at least ${SEQ_COUNTER_SIZE + 1}`,
      ),
      next: cursor.offset,
    }
  }

  const seqCounter = cursor.readUint64() ?? 0n
  const contact = tryDecodeContact(codec, cursor.rest())

  if (contact.status === "failed") {
    return {
      status: "stopped",
      diagnostic: diagnostic(
        "corrupt_contact",
        index,
        start,
        `Cache entry ${index}: ${contact.reason}`,
        contact.cause,
      ),
      next: cursor.offset,
    }
  }

  cursor.skip(contact.consumed)
  return {
    status: "ok",
    value: { seqCounter, source: contact.contact },
    next: cursor.offset,
  }
}

function decodeFramedSourceRef<C>(
  cursor: ByteCursor,
  codec: ContactCodec<C>,
  index: number,
): EntryStep<CacheSourceRef<C>> {
  const frame = readFrame(cursor)

  switch (frame.status) {
    case "truncated_length":
      return {
        status: "stopped",
        diagnostic: diagnostic(
          "truncated_entry",
          index,
          frame.start,
          `Cache entry ${index} truncated: ${frame.available} bytes left for a length prefix`,
        ),
        next: cursor.offset,
      }

    case "out_of_bounds":
      return {
        status: "stopped",
        diagnostic: diagnostic(
          "frame_out_of_bounds",
          index,
          frame.start,
          `Cache entry ${index} declares ${frame.length} bytes, ${frame.available} available`,
        ),
        next: cursor.offset,
      }

    case "frame": {
      const inner = new ByteCursor(frame.bytes)
      const seqCounter = inner.readUint64()
      const contact =
        seqCounter === undefined || inner.remaining === 0
          ? undefined
          : tryDecodeContact(codec, inner.rest())

      if (seqCounter === undefined || contact === undefined) {
        return skipped(
          index,
          frame.start,
          `Cache entry ${index}: frame of ${frame.length} bytes too short for counter and contact`,
          cursor,
        )
      }
      if (contact.status === "failed") {
        return skipped(
          index,
          frame.start,
          `Cache entry ${index}: ${contact.reason}`,
          cursor,
          contact.cause,
        )
      }
      if (contact.consumed !== inner.remaining) {
        return skipped(
          index,
          frame.start,
          `Cache entry ${index}: contact used ${contact.consumed} of ${inner.remaining} framed bytes`,
          cursor,
        )
      }

      return {
        status: "ok",
        value: { seqCounter, source: contact.contact },
        next: cursor.offset,
      }
    }
  }
}

function skipped<T>(
  index: number,
  offset: number,
  message: string,
  cursor: ByteCursor,
  cause?: unknown,
): EntryStep<T> {
  return {
    status: "skipped",
    diagnostic: diagnostic("corrupt_contact", index, offset, message, cause),
    next: cursor.offset,
  }
}

type ContactAttempt<C> =
  | { status: "ok"; contact: C; consumed: number }
  | { status: "failed"; reason: string; cause?: unknown }

function tryDecodeContact<C>(
  codec: ContactCodec<C>,
  bytes: Uint8Array,
): ContactAttempt<C> {
  let result: ReturnType<ContactCodec<C>["decode"]>
  try {
    result = codec.decode(bytes)
  } catch (error) {
    return { status: "failed", reason: "contact decoder threw", cause: error }
  }

  if (result === undefined) {
    return { status: "failed", reason: "contact could not be decoded" }
  }
  if (result.rest.length > bytes.length) {
    return {
      status: "failed",
      reason: `contact decoder returned ${result.rest.length} remaining bytes from ${bytes.length}`,
    }
  }

  return {
    status: "ok",
    contact: result.contact,
    consumed: bytes.length - result.rest.length,
  }
}

//
// Framed messages
//

/**
 * Encode `[length u32][message bytes]`.
 */
export function encodeFramedMessage<M>(
  message: M,
  codec: MessageCodec<M>,
): Uint8Array {
  return writeFrame(codec.encode(message))
}

/**
 * Decode one framed message at the cursor.
 *
 * The message decoder sees exactly the declared bytes. When it fails the
 * entry is skipped and the cursor is already at the next frame.
 */
export function decodeFramedMessage<M>(
  cursor: ByteCursor,
  codec: MessageCodec<M>,
  index: number,
): EntryStep<FramedMessage<M>> {
  const frame = readFrame(cursor)

  switch (frame.status) {
    case "truncated_length":
      return {
        status: "stopped",
        diagnostic: diagnostic(
          "truncated_entry",
          index,
          frame.start,
          `Payload entry ${index} truncated: ${frame.available} bytes left for a length prefix`,
        ),
        next: cursor.offset,
      }

    case "out_of_bounds":
      return {
        status: "stopped",
        diagnostic: diagnostic(
          "frame_out_of_bounds",
          index,
          frame.start,
          `Payload entry ${index} declares ${frame.length} bytes, ${frame.available} available`,
        ),
        next: cursor.offset,
      }

    case "frame": {
      let message: M | undefined
      let cause: unknown
      try {
        message = codec.decode(frame.bytes)
      } catch (error) {
        cause = error
      }

      if (message === undefined) {
        return {
          status: "skipped",
          diagnostic: diagnostic(
            "corrupt_message",
            index,
            frame.start,
            `Payload entry ${index}: message of ${frame.length} bytes could not be decoded, skipped`,
            cause,
          ),
          next: cursor.offset,
        }
      }

      return {
        status: "ok",
        value: { length: frame.length, message },
        next: cursor.offset,
      }
    }
  }
}
