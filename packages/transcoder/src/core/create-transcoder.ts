import { type Logger, NullLogger } from "@wirecraft/logger"
import { JsonNativeCodec } from "../adapters/json/json-native-codec"
import { MsgpackNativeCodec } from "../adapters/msgpack/msgpack-native-codec"
import type { NativeCodecName } from "../config/schema"
import type { EnvelopeKeys } from "../ports/envelope"
import type { NativeCodec } from "../ports/native-codec"
import type { Transcoding } from "../ports/transcoding"
import { builtinTranscodings } from "../transcodings"
import { RecursiveTranscoder } from "./recursive-transcoder"
import { TranscodingRegistry } from "./transcoding-registry"

export type CreateTranscoderOptions = {
  /** Native codec name or instance. Default: "json" */
  codec?: NativeCodecName | NativeCodec
  /** Registered after the built-ins, in order. */
  transcodings?: readonly Transcoding[]
  /** Register the built-in transcodings. Default: true */
  builtins?: boolean
  envelope?: EnvelopeKeys
  logger?: Logger
}

export function createNativeCodec(name: NativeCodecName): NativeCodec {
  switch (name) {
    case "json":
      return new JsonNativeCodec()
    case "msgpack":
      return new MsgpackNativeCodec()
  }
}

/**
 * Build a transcoder with its own registry.
 *
 * @example
 * ```ts
 * const transcoder = createTranscoder({
 *   codec: "msgpack",
 *   transcodings: [moneyAsList],
 * })
 *
 * const bytes = transcoder.encode({ total: new Money(12, "EUR") })
 * ```
 */
export function createTranscoder(options: CreateTranscoderOptions = {}): RecursiveTranscoder {
  const codecOption = options.codec ?? "json"
  const codec = typeof codecOption === "string" ? createNativeCodec(codecOption) : codecOption
  const logger = (options.logger ?? new NullLogger()).child({ codec: codec.name })

  const registry = new TranscodingRegistry({ logger })
  const transcoder = new RecursiveTranscoder(
    { codec, registry, logger },
    options.envelope ? { envelope: options.envelope } : {},
  )

  const transcodings = [
    ...(options.builtins === false ? [] : builtinTranscodings()),
    ...(options.transcodings ?? []),
  ]

  for (const transcoding of transcodings) {
    transcoder.register(transcoding)
  }

  logger.info("transcoder created", {
    transcodings: registry.size,
    typeKey: transcoder.envelope.typeKey,
    dataKey: transcoder.envelope.dataKey,
  })

  return transcoder
}
