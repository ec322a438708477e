import type { NativeValue } from "./native-value"
import type { Transcoding } from "./transcoding"

/**
 * Encodes arbitrary values to bytes and back, substituting registered
 * custom types with tagged envelopes.
 *
 * @remarks
 * Register every transcoding before the first `encode`/`decode`. After that
 * the instance is read-only and safe to share between concurrent callers.
 */
export interface Transcoder {
  register<T, D>(transcoding: Transcoding<T, D>): void

  /**
   * @throws UnsupportedTypeError when a reachable value is neither native nor registered
   */
  encode(value: unknown): Uint8Array

  /**
   * @throws UnknownWireNameError when an envelope names an unregistered transcoding
   */
  decode(bytes: Uint8Array): unknown

  /** Reduce a value to its native tree without serializing it. */
  reduce(value: unknown): NativeValue

  /** Rebuild a value from a native tree produced by {@link reduce}. */
  restore(tree: NativeValue): unknown
}
