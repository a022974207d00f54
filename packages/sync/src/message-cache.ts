import type { CacheSourceRef } from "@peer-cache/wire-format"
import type { PeerContact } from "./contact.js"
import type { CachedMessage } from "./message.js"

/**
 * The store a peer synchronizes. `C` is the contact type, `M` the message type.
 */
export interface MessageCache<C, M> {
  /**
   * One reference per source: the highest sequence counter held for it.
   */
  summary(): CacheSourceRef<C>[]

  /**
   * Messages the holder of `known` is missing: for each source, everything
   * above its known counter, and everything from sources not listed.
   */
  missingFor(known: readonly CacheSourceRef<C>[]): M[]

  /**
   * Store a message. Returns false if it was already held.
   */
  insert(message: M): boolean
}

type SourceEntry = {
  contact: PeerContact
  messages: Map<bigint, CachedMessage>
}

export class InMemoryMessageCache
  implements MessageCache<PeerContact, CachedMessage>
{
  #sources = new Map<string, SourceEntry>()

  constructor(messages: Iterable<CachedMessage> = []) {
    for (const message of messages) {
      this.insert(message)
    }
  }

  get size(): number {
    let total = 0
    for (const entry of this.#sources.values()) {
      total += entry.messages.size
    }
    return total
  }

  has(source: PeerContact, seq: bigint): boolean {
    return this.#sources.get(source.id)?.messages.has(seq) ?? false
  }

  /**
   * All held messages, ordered by source (first seen first) then counter.
   */
  messages(): CachedMessage[] {
    return [...this.#sources.values()].flatMap(entry => this.#sorted(entry))
  }

  insert(message: CachedMessage): boolean {
    let entry = this.#sources.get(message.source.id)
    if (!entry) {
      entry = { contact: message.source, messages: new Map() }
      this.#sources.set(message.source.id, entry)
    }

    if (entry.messages.has(message.seq)) {
      return false
    }
    entry.messages.set(message.seq, message)
    return true
  }

  summary(): CacheSourceRef<PeerContact>[] {
    const refs: CacheSourceRef<PeerContact>[] = []
    for (const entry of this.#sources.values()) {
      let highest = -1n
      for (const seq of entry.messages.keys()) {
        if (seq > highest) highest = seq
      }
      if (highest >= 0n) {
        refs.push({ seqCounter: highest, source: entry.contact })
      }
    }
    return refs
  }

  missingFor(
    known: readonly CacheSourceRef<PeerContact>[],
  ): CachedMessage[] {
    const knownBySource = new Map<string, bigint>()
    for (const ref of known) {
      const previous = knownBySource.get(ref.source.id)
      // keep the highest counter per source
      if (previous === undefined || ref.seqCounter > previous) {
        knownBySource.set(ref.source.id, ref.seqCounter)
      }
    }

    const missing: CachedMessage[] = []
    for (const [id, entry] of this.#sources) {
      const since = knownBySource.get(id)
      for (const message of this.#sorted(entry)) {
        if (since === undefined || message.seq > since) {
          missing.push(message)
        }
      }
    }
    return missing
  }

  #sorted(entry: SourceEntry): CachedMessage[] {
    return [...entry.messages.values()].sort((a, b) =>
      a.seq < b.seq ? -1 : a.seq > b.seq ? 1 : 0,
    )
  }
}
