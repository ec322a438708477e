import { defineTranscoding } from "../core/define-transcoding"
import type { Transcoding } from "../ports/transcoding"

/** Plain `Uint8Array` only; `Buffer` and other subclasses need their own rule. */
export function bytesAsBase64(): Transcoding<Uint8Array, string> {
  return defineTranscoding({
    type: Uint8Array,
    name: "bytes_base64",
    encode: (bytes: Uint8Array) =>
      Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64"),
    decode: (base64: string) => new Uint8Array(Buffer.from(base64, "base64")),
  })
}
