export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0)
  const out = new Uint8Array(total)
  let offset = 0
  for (const part of parts) {
    out.set(part, offset)
    offset += part.length
  }
  return out
}

/**
 * Prefix the concatenated `parts` with a u32 entry count.
 */
export function withCount(count: number, parts: readonly Uint8Array[]): Uint8Array {
  const header = new Uint8Array(4)
  new DataView(header.buffer).setUint32(0, count, true)
  return concatBytes([header, ...parts])
}
