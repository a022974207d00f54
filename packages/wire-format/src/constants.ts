/**
 * Wire format constants for the peer-cache synchronization protocol.
 *
 * All multi-byte integers on the wire are little-endian.
 */

/** Envelope operation codes */
export const Operation = {
  CacheRequest: 0,
  CacheResponse: 1,
} as const

export type Operation = (typeof Operation)[keyof typeof Operation]

/** Envelope header: operation (1 byte) + data length (2 bytes) */
export const ENVELOPE_HEADER_SIZE = 3

/** Largest payload an envelope can carry (u16 length field) */
export const MAX_ENVELOPE_DATA_LENGTH = 0xffff

/** Entry count prefix of both list payloads */
export const LIST_COUNT_SIZE = 4

/** Length prefix of a framed entry */
export const FRAME_LENGTH_SIZE = 4

/** Sequence counter of a cache source reference */
export const SEQ_COUNTER_SIZE = 8

export const MAX_UINT32 = 0xffff_ffff

export const MAX_UINT64 = 0xffff_ffff_ffff_ffffn

/**
 * Check whether a byte is a known operation code.
 */
export function isOperation(value: number): value is Operation {
  return value === Operation.CacheRequest || value === Operation.CacheResponse
}
