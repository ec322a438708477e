import { type Logger, NullLogger } from "@wirecraft/logger"
import { DEFAULT_ENVELOPE_KEYS, type EnvelopeKeys } from "../ports/envelope"
import type { NativeCodec } from "../ports/native-codec"
import type { NativeMap, NativeValue } from "../ports/native-value"
import type { Transcoder } from "../ports/transcoder"
import type { Transcoding } from "../ports/transcoding"
import { InvalidEnvelopeKeysError, UnknownWireNameError, UnsupportedTypeError } from "./errors"
import {
  isEnvelopeShape,
  isNativeMapping,
  isNativeSequence,
  typeKeyOf,
  typeNameOf,
} from "./native-kind"
import { TranscodingRegistry } from "./transcoding-registry"

export type RecursiveTranscoderDeps = {
  codec: NativeCodec
  registry?: TranscodingRegistry
  logger?: Logger
}

export type RecursiveTranscoderOptions = {
  envelope?: EnvelopeKeys
}

/**
 * Depth-first transcoder: custom values become `{typeKey: name, dataKey: payload}`
 * envelopes on the way out, and envelopes become custom values on the way in.
 *
 * @remarks
 * Both walks build new containers and never touch their input, so an
 * instance holds no per-call state. Depth is bounded by the call stack.
 */
export class RecursiveTranscoder implements Transcoder {
  readonly registry: TranscodingRegistry
  readonly envelope: EnvelopeKeys

  private readonly codec: NativeCodec
  private readonly typeKey: string
  private readonly dataKey: string

  constructor(deps: RecursiveTranscoderDeps, opts: RecursiveTranscoderOptions = {}) {
    const envelope = opts.envelope ?? DEFAULT_ENVELOPE_KEYS
    const { typeKey, dataKey } = envelope

    if (!typeKey || !dataKey || typeKey === dataKey) {
      throw new InvalidEnvelopeKeysError(typeKey, dataKey)
    }

    this.codec = deps.codec
    this.envelope = Object.freeze({ typeKey, dataKey })
    this.typeKey = typeKey
    this.dataKey = dataKey
    this.registry =
      deps.registry ?? new TranscodingRegistry({ logger: deps.logger ?? new NullLogger() })
  }

  get codecName(): string {
    return this.codec.name
  }

  register<T, D>(transcoding: Transcoding<T, D>): void {
    this.registry.register(transcoding)
  }

  encode(value: unknown): Uint8Array {
    return this.codec.serialize(this.reduce(value))
  }

  decode(bytes: Uint8Array): unknown {
    return this.restore(this.codec.deserialize(bytes))
  }

  reduce(value: unknown): NativeValue {
    switch (typeof value) {
      case "string":
      case "number":
      case "boolean":
        return value
      case "object":
        if (value === null) return null
        // Array.from reads holes as undefined, so they fail like an explicit one
        if (isNativeSequence(value)) return Array.from(value, (item) => this.reduce(item))
        if (isNativeMapping(value)) return this.reduceMapping(value)
        return this.reduceCustom(value)
      default:
        return this.reduceCustom(value)
    }
  }

  restore(tree: NativeValue): unknown {
    if (tree === null || typeof tree !== "object") return tree

    if (Array.isArray(tree)) return tree.map((item) => this.restore(item))

    return this.restoreMapping(tree)
  }

  private reduceMapping(mapping: Record<string, unknown>): NativeMap {
    return Object.fromEntries(
      Object.entries(mapping).map(([key, item]): [string, NativeValue] => [
        key,
        this.reduce(item),
      ]),
    )
  }

  private reduceCustom(value: unknown): NativeValue {
    const transcoding = this.registry.findByType(typeKeyOf(value))
    if (!transcoding) throw new UnsupportedTypeError(typeNameOf(value))

    // The envelope is reduced like any other mapping, so custom values inside
    // the payload are transcoded as well.
    return this.reduceMapping({
      [this.typeKey]: transcoding.name,
      [this.dataKey]: transcoding.encode(value),
    })
  }

  private restoreMapping(mapping: NativeMap): unknown {
    const restored: Record<string, unknown> = Object.fromEntries(
      Object.entries(mapping).map(([key, item]): [string, unknown] => [
        key,
        this.restore(item),
      ]),
    )

    if (!isEnvelopeShape(restored, this.typeKey, this.dataKey)) return restored

    const name = restored[this.typeKey]
    const transcoding = typeof name === "string" ? this.registry.findByName(name) : undefined
    if (!transcoding) throw new UnknownWireNameError(name)

    return transcoding.decode(restored[this.dataKey])
  }
}
