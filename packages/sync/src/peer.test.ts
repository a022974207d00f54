import { type CBORType, encodeCBOR } from "@levischuck/tiny-cbor"
import { configure, type LogRecord, reset } from "@logtape/logtape"
import {
  decodeEnvelope,
  EncodeError,
  encodeCacheResponse,
  encodeEnvelope,
  Operation,
} from "@peer-cache/wire-format"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { peerContactCodec } from "./contact.js"
import { type CachedMessage, cachedMessageCodec } from "./message.js"
import { InMemoryMessageCache } from "./message-cache.js"
import { CacheSyncPeer } from "./peer.js"
import type { CacheSyncConfig } from "./config.js"

function msg(source: string, seq: bigint, body: number[] = [1]): CachedMessage {
  return { source: { id: source }, seq, body: new Uint8Array(body) }
}

function keys(cache: InMemoryMessageCache): string[] {
  return cache
    .messages()
    .map(m => `${m.source.id}:${m.seq}`)
    .sort()
}

function createPeer(
  messages: CachedMessage[],
  config?: Partial<CacheSyncConfig>,
) {
  const cache = new InMemoryMessageCache(messages)
  const peer = new CacheSyncPeer({
    contactCodec: peerContactCodec,
    messageCodec: cachedMessageCodec,
    cache,
    config,
  })
  return { cache, peer }
}

describe("CacheSyncPeer", () => {
  let records: LogRecord[]

  beforeEach(async () => {
    records = []
    await configure({
      reset: true,
      sinks: {
        capture: record => {
          records.push(record)
        },
      },
      loggers: [
        { category: ["peer-cache"], sinks: ["capture"], lowestLevel: "debug" },
        { category: ["logtape", "meta"], sinks: [], lowestLevel: "warning" },
      ],
    })
  })

  afterEach(async () => {
    await reset()
  })

  const warnings = () => records.filter(record => record.level === "warning")

  it("brings two caches to the same contents", () => {
    const alice = createPeer([msg("alice", 1n), msg("alice", 2n)])
    const bob = createPeer([msg("bob", 1n), msg("alice", 1n)])

    const fromAlice = alice.peer.receive(bob.peer.createRequest())
    expect(fromAlice).toMatchObject({
      kind: "reply",
      requestEntries: 2,
      sent: 1,
      oversized: 0,
    })
    if (fromAlice.kind !== "reply") return
    expect(fromAlice.envelopes).toHaveLength(1)

    const merged = bob.peer.receive(fromAlice.envelopes[0])
    expect(merged).toEqual({
      kind: "merged",
      declaredCount: 1,
      received: [msg("alice", 2n)],
      inserted: 1,
    })

    const fromBob = bob.peer.receive(alice.peer.createRequest())
    expect(fromBob).toMatchObject({ kind: "reply", requestEntries: 1, sent: 1 })
    if (fromBob.kind !== "reply") return
    for (const envelope of fromBob.envelopes) {
      alice.peer.receive(envelope)
    }

    expect(keys(alice.cache)).toEqual(["alice:1", "alice:2", "bob:1"])
    expect(keys(bob.cache)).toEqual(keys(alice.cache))
    expect(warnings()).toEqual([])
  })

  it("inserts nothing when the same reply arrives twice", () => {
    const alice = createPeer([msg("alice", 1n)])
    const bob = createPeer([])

    const reply = alice.peer.receive(bob.peer.createRequest())
    if (reply.kind !== "reply") throw new Error(`unexpected ${reply.kind}`)

    expect(bob.peer.receive(reply.envelopes[0])).toMatchObject({ inserted: 1 })
    expect(bob.peer.receive(reply.envelopes[0])).toMatchObject({ inserted: 0 })
  })

  it("sends an empty request from an empty cache", () => {
    const { peer } = createPeer([])
    expect(Array.from(peer.createRequest())).toEqual([0, 4, 0, 0, 0, 0, 0])
  })

  it("answers an empty request with one empty response when it has nothing", () => {
    const { peer } = createPeer([])
    const reply = peer.receive(
      encodeEnvelope(Operation.CacheRequest, new Uint8Array(4)),
    )

    expect(reply).toEqual({
      kind: "reply",
      envelopes: [new Uint8Array([1, 4, 0, 0, 0, 0, 0])],
      requestEntries: 0,
      sent: 0,
      oversized: 0,
    })
  })

  it("keeps the good messages of a reply with a corrupted one", () => {
    const first = msg("alice", 1n)
    const payload = encodeCacheResponse(
      [first, msg("alice", 2n), msg("alice", 3n)],
      cachedMessageCodec,
    )
    // second frame starts after the count and the first frame
    const secondFrame = 4 + 4 + cachedMessageCodec.encode(first).length
    payload[secondFrame + 4] = 0

    const { cache, peer } = createPeer([])
    const result = peer.receive(encodeEnvelope(Operation.CacheResponse, payload))

    expect(result).toEqual({
      kind: "merged",
      declaredCount: 3,
      received: [first, msg("alice", 3n)],
      inserted: 2,
    })
    expect(cache.has({ id: "alice" }, 2n)).toBe(false)

    expect(warnings()).toHaveLength(1)
    expect(warnings()[0].rawMessage).toBe("cache-sync/{code} {detail}")
    expect(warnings()[0].category).toEqual(["peer-cache", "sync"])
    expect(warnings()[0].properties).toMatchObject({
      operation: "cache-response",
      code: "corrupt_message",
      index: 1,
      offset: secondFrame,
    })
  })

  it("drops a received message whose source id is too long to request", () => {
    const raw = encodeCBOR(
      new Map<string | number, CBORType>([
        ["s", "x".repeat(300)],
        ["q", "1"],
        ["b", new Uint8Array([1])],
      ]),
    )
    const payload = encodeCacheResponse([raw], {
      encode: bytes => bytes,
      decode: bytes => bytes,
    })

    const { cache, peer } = createPeer([])
    const result = peer.receive(encodeEnvelope(Operation.CacheResponse, payload))

    expect(result).toMatchObject({ kind: "merged", declaredCount: 1, inserted: 0 })
    expect(cache.size).toBe(0)
    expect(Array.from(peer.createRequest())).toEqual([0, 4, 0, 0, 0, 0, 0])
    expect(warnings().map(record => record.properties.code)).toEqual([
      "corrupt_message",
    ])
  })

  it("answers a request whose entries could not be read with everything", () => {
    const { peer } = createPeer([msg("alice", 1n), msg("bob", 1n)])
    // declares two entries, carries none
    const request = encodeEnvelope(
      Operation.CacheRequest,
      new Uint8Array([2, 0, 0, 0]),
    )

    expect(peer.receive(request)).toMatchObject({
      kind: "reply",
      requestEntries: 0,
      sent: 2,
    })
    expect(warnings().map(record => record.properties)).toEqual([
      expect.objectContaining({
        operation: "cache-request",
        code: "short_list",
        index: 0,
        offset: 4,
      }),
    ])
  })

  it("rejects envelopes it cannot read", () => {
    const { peer } = createPeer([msg("alice", 1n)])

    const unknown = peer.receive(new Uint8Array([9, 0, 0]))
    expect(unknown.kind).toBe("rejected")
    if (unknown.kind === "rejected") {
      expect(unknown.error.code).toBe("unknown_operation")
    }

    const short = peer.receive(new Uint8Array([0, 5, 0, 1]))
    expect(short).toMatchObject({
      kind: "rejected",
      error: { code: "truncated_frame" },
    })

    expect(warnings().map(record => record.properties.code)).toEqual([
      "unknown_operation",
      "truncated_frame",
    ])
  })

  it("caps the number of messages in one reply", () => {
    const alice = createPeer(
      [msg("alice", 1n), msg("alice", 2n), msg("alice", 3n)],
      { maxMessagesPerReply: 2 },
    )
    const bob = createPeer([])

    const reply = alice.peer.receive(bob.peer.createRequest())
    expect(reply).toMatchObject({ kind: "reply", sent: 2 })
    if (reply.kind !== "reply") return

    for (const envelope of reply.envelopes) bob.peer.receive(envelope)
    expect(keys(bob.cache)).toEqual(["alice:1", "alice:2"])
  })

  it("splits a reply across envelopes within the configured size", () => {
    const messages = [1n, 2n, 3n, 4n].map(seq =>
      msg("alice", seq, Array.from({ length: 20 }, () => 7)),
    )
    const frameSize = 4 + cachedMessageCodec.encode(messages[0]).length
    const alice = createPeer(messages, {
      maxEnvelopeDataLength: 4 + 2 * frameSize,
    })

    const reply = alice.peer.receive(createPeer([]).peer.createRequest())
    if (reply.kind !== "reply") throw new Error(`unexpected ${reply.kind}`)

    expect(reply.sent).toBe(4)
    expect(reply.envelopes).toHaveLength(2)
    for (const envelope of reply.envelopes) {
      const decoded = decodeEnvelope(envelope)
      expect(decoded).toMatchObject({
        status: "ok",
        envelope: { operation: Operation.CacheResponse },
      })
      expect(envelope.length).toBe(3 + 4 + 2 * frameSize)
    }
  })

  it("leaves out messages too large for any envelope", () => {
    const alice = createPeer(
      [msg("alice", 1n, Array.from({ length: 64 }, () => 0)), msg("alice", 2n)],
      { maxEnvelopeDataLength: 48 },
    )

    const reply = alice.peer.receive(createPeer([]).peer.createRequest())
    expect(reply).toMatchObject({ kind: "reply", sent: 1, oversized: 1 })
    expect(warnings().map(record => record.properties)).toEqual([
      { count: 1, limit: 48 },
    ])
  })

  it("refuses to build a request larger than the envelope limit", () => {
    const { peer } = createPeer([msg("alice", 1n)], {
      maxEnvelopeDataLength: 9,
    })

    expect(() => peer.createRequest()).toThrow(EncodeError)
    expect(() => peer.createRequest()).toThrow(
      "Cache request of 18 bytes exceeds maxEnvelopeDataLength 9",
    )
  })

  it("synchronizes with framed contacts when both sides use them", () => {
    const config = { contactFraming: "framed" } as const
    const alice = createPeer([msg("alice", 1n), msg("alice", 2n)], config)
    const bob = createPeer([msg("alice", 1n)], config)

    const request = bob.peer.createRequest()
    // count + frame length + counter + contact
    expect(request.length).toBe(3 + 4 + 4 + 8 + 6)

    const reply = alice.peer.receive(request)
    expect(reply).toMatchObject({ kind: "reply", requestEntries: 1, sent: 1 })
  })
})
