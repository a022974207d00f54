import {
  type ContactFraming,
  FRAME_LENGTH_SIZE,
  LIST_COUNT_SIZE,
  MAX_ENVELOPE_DATA_LENGTH,
} from "@peer-cache/wire-format"

/**
 * Configuration for a cache sync peer.
 */
export interface CacheSyncConfig {
  /** Largest envelope payload sent or accepted for packing (default: 65535) */
  maxEnvelopeDataLength: number
  /** Upper bound on messages sent in reply to one request (default: 1024) */
  maxMessagesPerReply: number
  /** Cache request entry layout; both peers must agree (default: "inline") */
  contactFraming: ContactFraming
}

export const DEFAULT_CONFIG: CacheSyncConfig = {
  maxEnvelopeDataLength: MAX_ENVELOPE_DATA_LENGTH,
  maxMessagesPerReply: 1024,
  contactFraming: "inline",
}

/** Count prefix, one frame length and a single message byte */
const MIN_ENVELOPE_DATA_LENGTH = LIST_COUNT_SIZE + FRAME_LENGTH_SIZE + 1

/**
 * Merge `config` over the defaults and validate the result.
 *
 * @throws Error if a value is out of range
 */
export function resolveConfig(config: Partial<CacheSyncConfig> = {}): CacheSyncConfig {
  const resolved: CacheSyncConfig = { ...DEFAULT_CONFIG, ...config }

  const { maxEnvelopeDataLength, maxMessagesPerReply, contactFraming } = resolved

  if (
    !Number.isInteger(maxEnvelopeDataLength) ||
    maxEnvelopeDataLength < MIN_ENVELOPE_DATA_LENGTH ||
    maxEnvelopeDataLength > MAX_ENVELOPE_DATA_LENGTH
  ) {
    throw new Error(
      `Invalid config: maxEnvelopeDataLength must be an integer in [${MIN_ENVELOPE_DATA_LENGTH}, ${MAX_ENVELOPE_DATA_LENGTH}], got ${maxEnvelopeDataLength}`,
    )
  }

  if (!Number.isInteger(maxMessagesPerReply) || maxMessagesPerReply < 1) {
    throw new Error(
      `Invalid config: maxMessagesPerReply must be a positive integer, got ${maxMessagesPerReply}`,
    )
  }

  if (contactFraming !== "inline" && contactFraming !== "framed") {
    throw new Error(
      `Invalid config: contactFraming must be "inline" or "framed", got ${String(contactFraming)}`,
    )
  }

  return resolved
}
