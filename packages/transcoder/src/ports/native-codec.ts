import type { NativeValue } from "./native-value"

/**
 * Converts between bytes and native values.
 *
 * @remarks
 * The transcoder reduces every value to a {@link NativeValue} tree before
 * calling `serialize`, so implementations never see custom types. Parse
 * errors from `deserialize` propagate to the caller unchanged.
 */
export interface NativeCodec {
  /** Short identifier used in logs and configuration, e.g. "json" */
  readonly name: string

  serialize(value: NativeValue): Uint8Array

  deserialize(bytes: Uint8Array): NativeValue
}
