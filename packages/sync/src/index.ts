/**
 * @peer-cache/sync
 *
 * Runs the cache synchronization protocol between two peers on top of
 * `@peer-cache/wire-format`, with reference contact and message types and an
 * in-memory cache.
 *
 * @example
 * ```typescript
 * import {
 *   CacheSyncPeer,
 *   cachedMessageCodec,
 *   InMemoryMessageCache,
 *   peerContactCodec,
 * } from "@peer-cache/sync"
 *
 * const peer = new CacheSyncPeer({
 *   contactCodec: peerContactCodec,
 *   messageCodec: cachedMessageCodec,
 *   cache: new InMemoryMessageCache(),
 * })
 *
 * socket.send(peer.createRequest())
 * socket.on("message", bytes => {
 *   const result = peer.receive(bytes)
 *   if (result.kind === "reply") {
 *     for (const envelope of result.envelopes) socket.send(envelope)
 *   }
 * })
 * ```
 */

export { type CacheSyncConfig, DEFAULT_CONFIG, resolveConfig } from "./config.js"
export {
  assertContactId,
  isValidContactId,
  MAX_CONTACT_ID_BYTES,
  type PeerContact,
  peerContactCodec,
} from "./contact.js"
export { type CachedMessage, cachedMessageCodec } from "./message.js"
export { InMemoryMessageCache, type MessageCache } from "./message-cache.js"
export {
  CacheSyncPeer,
  type CacheSyncPeerParams,
  type ReceiveResult,
} from "./peer.js"
