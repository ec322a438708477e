import { defineTranscoding } from "../core/define-transcoding"
import type { Transcoding } from "../ports/transcoding"

/**
 * Keys and values may be any transcodable value, including custom types,
 * since the entries are walked like any other payload.
 */
export function mapAsEntries(): Transcoding<Map<unknown, unknown>, [unknown, unknown][]> {
  return defineTranscoding({
    type: Map,
    name: "map_as_entries",
    encode: (map: Map<unknown, unknown>) => [...map.entries()],
    decode: (entries: [unknown, unknown][]) => new Map(entries),
  })
}
