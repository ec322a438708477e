import type { Transcoding } from "../ports/transcoding"
import { bigintAsString } from "./bigint-as-string"
import { bytesAsBase64 } from "./bytes-as-base64"
import { dateAsIso } from "./date-as-iso"
import { mapAsEntries } from "./map-as-entries"
import { setAsList } from "./set-as-list"
import { tupleAsList } from "./tuple"

export { bigintAsString } from "./bigint-as-string"
export { bytesAsBase64 } from "./bytes-as-base64"
export { dateAsIso } from "./date-as-iso"
export { mapAsEntries } from "./map-as-entries"
export { setAsList } from "./set-as-list"
export { Tuple, tupleAsList } from "./tuple"

/** Fresh instances of every built-in transcoding. */
export function builtinTranscodings(): Transcoding[] {
  return [tupleAsList(), dateAsIso(), bigintAsString(), mapAsEntries(), setAsList(), bytesAsBase64()]
}
