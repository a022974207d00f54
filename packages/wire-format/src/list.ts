import { ByteCursor } from "./cursor.js"
import { diagnostic } from "./entries.js"
import type { DecodeDiagnostic, DecodeOutcome, EntryStep } from "./types.js"

export type DecodedList<T> = {
  declaredCount: number
  entries: T[]
}

/**
 * Shared loop of both list decoders: `[count u32]` followed by entries.
 *
 * The declared count only bounds the loop. Decoding ends early when the
 * buffer runs out or a step reports `stopped`.
 */
export function decodeList<T>(
  bytes: Uint8Array,
  label: string,
  step: (cursor: ByteCursor, index: number) => EntryStep<T>,
): DecodeOutcome<DecodedList<T>> {
  const cursor = new ByteCursor(bytes)
  const diagnostics: DecodeDiagnostic[] = []
  const entries: T[] = []

  const declaredCount = cursor.readUint32()
  if (declaredCount === undefined) {
    diagnostics.push(
      diagnostic(
        "truncated_count",
        0,
        0,
        `${label} too short for an entry count: ${bytes.length} bytes`,
      ),
    )
    return { value: { declaredCount: 0, entries }, diagnostics }
  }

  for (let index = 0; index < declaredCount; index++) {
    if (cursor.remaining === 0) {
      diagnostics.push(
        diagnostic(
          "short_list",
          index,
          cursor.offset,
          `${label} declares ${declaredCount} entries, buffer ends after ${index}`,
        ),
      )
      return { value: { declaredCount, entries }, diagnostics }
    }

    const result = step(cursor, index)
    if (result.status === "ok") {
      entries.push(result.value)
      continue
    }

    diagnostics.push(result.diagnostic)
    if (result.status === "stopped") {
      return { value: { declaredCount, entries }, diagnostics }
    }
  }

  if (cursor.remaining > 0) {
    diagnostics.push(
      diagnostic(
        "trailing_bytes",
        declaredCount,
        cursor.offset,
        `${label} has ${cursor.remaining} bytes after ${declaredCount} declared entries`,
      ),
    )
  }

  return { value: { declaredCount, entries }, diagnostics }
}
