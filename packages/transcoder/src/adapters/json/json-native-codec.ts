import { BaseError } from "@wirecraft/errors"
import { NegativeZeroError } from "../../core/errors"
import type { NativeCodec } from "../../ports/native-codec"
import type { NativeValue } from "../../ports/native-value"

/** JSON has no NaN or Infinity; writing them as `null` would break round-trips. */
export class NonFiniteNumberError extends BaseError<"non_finite_number"> {
  constructor(value: number) {
    super(`Cannot write non-finite number ${value} as JSON`, {
      code: "non_finite_number",
      context: { value: String(value) },
      isOperational: false,
    })
  }
}

function rejectUnrepresentable(_key: string, value: unknown): unknown {
  if (typeof value === "number" && !Number.isFinite(value)) {
    throw new NonFiniteNumberError(value)
  }
  if (Object.is(value, -0)) throw new NegativeZeroError("json")

  return value
}

/**
 * UTF-8 encoded JSON.
 *
 * Malformed input surfaces as the platform's own errors: `TypeError` for
 * invalid UTF-8, `SyntaxError` for invalid JSON.
 */
export class JsonNativeCodec implements NativeCodec {
  readonly name = "json"

  private readonly encoder = new TextEncoder()
  private readonly decoder = new TextDecoder("utf-8", { fatal: true })

  serialize(value: NativeValue): Uint8Array {
    return this.encoder.encode(JSON.stringify(value, rejectUnrepresentable))
  }

  deserialize(bytes: Uint8Array): NativeValue {
    return JSON.parse(this.decoder.decode(bytes))
  }
}
