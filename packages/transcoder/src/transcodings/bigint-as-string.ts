import { defineTranscoding } from "../core/define-transcoding"
import type { Transcoding } from "../ports/transcoding"

export function bigintAsString(): Transcoding<bigint, string> {
  return defineTranscoding({
    type: BigInt,
    name: "bigint_str",
    encode: (value: bigint) => value.toString(),
    decode: (digits: string) => BigInt(digits),
  })
}
