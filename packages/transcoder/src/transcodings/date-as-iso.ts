import { defineTranscoding } from "../core/define-transcoding"
import type { Transcoding } from "../ports/transcoding"

/** Millisecond-precision ISO-8601 in UTC. An invalid date throws `RangeError` on encode. */
export function dateAsIso(): Transcoding<Date, string> {
  return defineTranscoding({
    type: Date,
    name: "datetime_iso",
    encode: (date: Date) => date.toISOString(),
    decode: (iso: string) => new Date(iso),
  })
}
