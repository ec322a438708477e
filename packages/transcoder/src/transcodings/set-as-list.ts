import { defineTranscoding } from "../core/define-transcoding"
import type { Transcoding } from "../ports/transcoding"

export function setAsList(): Transcoding<Set<unknown>, unknown[]> {
  return defineTranscoding({
    type: Set,
    name: "set_as_list",
    encode: (set: Set<unknown>) => [...set],
    decode: (members: unknown[]) => new Set(members),
  })
}
