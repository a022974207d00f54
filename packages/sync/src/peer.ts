import { getLogger, type Logger } from "@logtape/logtape"
import {
  type ContactCodec,
  type DecodeDiagnostic,
  type DecodeError,
  decodeCacheRequest,
  decodeCacheResponse,
  decodeEnvelope,
  EncodeError,
  encodeCacheRequest,
  encodeCacheResponseEnvelopes,
  encodeEnvelope,
  type MessageCodec,
  Operation,
} from "@peer-cache/wire-format"
import { type CacheSyncConfig, resolveConfig } from "./config.js"
import type { MessageCache } from "./message-cache.js"

/**
 * What became of one received envelope.
 */
export type ReceiveResult<M> =
  | {
      kind: "reply"
      /** Cache response envelopes to send back, in order */
      envelopes: Uint8Array[]
      /** Cache request entries that could be decoded */
      requestEntries: number
      /** Messages packed into `envelopes` */
      sent: number
      /** Missing messages left out because they exceed the envelope size */
      oversized: number
    }
  | {
      kind: "merged"
      declaredCount: number
      received: M[]
      /** Received messages that were new to the cache */
      inserted: number
    }
  | { kind: "rejected"; error: DecodeError }

export interface CacheSyncPeerParams<C, M> {
  contactCodec: ContactCodec<C>
  messageCodec: MessageCodec<M>
  cache: MessageCache<C, M>
  config?: Partial<CacheSyncConfig>
  logger?: Logger
}

const OPERATION_NAMES: Record<Operation, string> = {
  [Operation.CacheRequest]: "cache-request",
  [Operation.CacheResponse]: "cache-response",
}

/**
 * One side of the cache synchronization protocol.
 *
 * A peer asks for what it is missing with `createRequest()`. Whatever arrives
 * from the other side goes through `receive()`: requests are answered from
 * the cache, responses are merged into it. Deciding when to sync and moving
 * the bytes are left to the caller.
 *
 * Decode problems in list payloads never fail a call; they are logged at
 * warning level and whatever could be recovered is used.
 */
export class CacheSyncPeer<C, M> {
  readonly logger: Logger
  readonly config: CacheSyncConfig

  readonly #contactCodec: ContactCodec<C>
  readonly #messageCodec: MessageCodec<M>
  readonly #cache: MessageCache<C, M>

  constructor({
    contactCodec,
    messageCodec,
    cache,
    config,
    logger,
  }: CacheSyncPeerParams<C, M>) {
    this.config = resolveConfig(config)
    this.logger = logger ?? getLogger(["peer-cache", "sync"])
    this.#contactCodec = contactCodec
    this.#messageCodec = messageCodec
    this.#cache = cache
  }

  /**
   * Build an envelope asking the remote peer for messages newer than the
   * ones in the local cache.
   *
   * @throws EncodeError if the request exceeds `maxEnvelopeDataLength`
   */
  createRequest(): Uint8Array {
    const refs = this.#cache.summary()
    const payload = encodeCacheRequest(refs, this.#contactCodec, {
      contactFraming: this.config.contactFraming,
    })

    if (payload.length > this.config.maxEnvelopeDataLength) {
      throw new EncodeError(
        "payload_too_large",
        `Cache request of ${payload.length} bytes exceeds maxEnvelopeDataLength ${this.config.maxEnvelopeDataLength}`,
      )
    }

    this.logger.debug("cache-sync/request {entries} entries, {bytes} bytes", {
      entries: refs.length,
      bytes: payload.length,
    })

    return encodeEnvelope(Operation.CacheRequest, payload)
  }

  /**
   * Handle one envelope received from the remote peer.
   */
  receive(frame: Uint8Array): ReceiveResult<M> {
    const result = decodeEnvelope(frame)

    if (result.status === "error") {
      this.logger.warn("cache-sync/envelope-rejected {code}: {detail}", {
        code: result.error.code,
        detail: result.error.message,
        bytes: frame.length,
      })
      return { kind: "rejected", error: result.error }
    }

    const { operation, data } = result.envelope
    switch (operation) {
      case Operation.CacheRequest:
        return this.#answerRequest(data)
      case Operation.CacheResponse:
        return this.#mergeResponse(data)
    }
  }

  #answerRequest(data: Uint8Array): ReceiveResult<M> {
    const { value, diagnostics } = decodeCacheRequest(data, this.#contactCodec, {
      contactFraming: this.config.contactFraming,
    })
    this.#report(Operation.CacheRequest, diagnostics)

    const missing = this.#cache.missingFor(value.entries)
    const selected = missing.slice(0, this.config.maxMessagesPerReply)

    if (selected.length < missing.length) {
      this.logger.info(
        "cache-sync/reply-capped {missing} missing, sending {selected}",
        { missing: missing.length, selected: selected.length },
      )
    }

    const { envelopes, oversized } = encodeCacheResponseEnvelopes(
      selected,
      this.#messageCodec,
      this.config.maxEnvelopeDataLength,
    )

    if (oversized.length > 0) {
      this.logger.warn(
        "cache-sync/oversized {count} messages do not fit in an envelope",
        { count: oversized.length, limit: this.config.maxEnvelopeDataLength },
      )
    }

    const sent = selected.length - oversized.length
    this.logger.debug(
      "cache-sync/reply {sent} messages in {envelopes} envelopes",
      { sent, envelopes: envelopes.length, requestEntries: value.entries.length },
    )

    return {
      kind: "reply",
      envelopes,
      requestEntries: value.entries.length,
      sent,
      oversized: oversized.length,
    }
  }

  #mergeResponse(data: Uint8Array): ReceiveResult<M> {
    const { value, diagnostics } = decodeCacheResponse(data, this.#messageCodec)
    this.#report(Operation.CacheResponse, diagnostics)

    const received = value.entries.map(entry => entry.message)
    let inserted = 0
    for (const message of received) {
      if (this.#cache.insert(message)) inserted++
    }

    this.logger.debug(
      "cache-sync/merged {inserted} of {received} received messages",
      { inserted, received: received.length, declaredCount: value.declaredCount },
    )

    return {
      kind: "merged",
      declaredCount: value.declaredCount,
      received,
      inserted,
    }
  }

  #report(operation: Operation, diagnostics: DecodeDiagnostic[]): void {
    for (const diagnostic of diagnostics) {
      this.logger.warn("cache-sync/{code} {detail}", {
        operation: OPERATION_NAMES[operation],
        code: diagnostic.code,
        index: diagnostic.index,
        offset: diagnostic.offset,
        detail: diagnostic.message,
        cause: diagnostic.cause,
      })
    }
  }
}
