/**
 * Anything with a runtime constructor the transcoder can dispatch on:
 * classes (`Date`, `Map`, user classes) and callable wrappers such as `BigInt`.
 */
export type TypeKey<T = unknown> =
  | (abstract new (
      ...args: never[]
    ) => T)
  | ((...args: never[]) => T)

/**
 * A named, bidirectional conversion between one custom type and a value
 * the transcoder can reduce to native form.
 *
 * @typeParam T - the custom type handled
 * @typeParam D - the data `encode` produces and `decode` receives
 *
 * @remarks
 * - Dispatch is on the exact constructor; subclasses need their own rule.
 * - `encode` may return further custom values; they are transcoded too.
 *   Likewise `decode` receives data whose inner envelopes are already decoded.
 * - `name` is persisted inside every envelope. Renaming a rule breaks
 *   decoding of bytes written under the old name.
 * - `decode(encode(x))` must equal `x`.
 *
 * @example
 * ```ts
 * const moneyAsList: Transcoding<Money, [number, string]> = {
 *   type: Money,
 *   name: "money",
 *   encode: (m) => [m.amount, m.currency],
 *   decode: ([amount, currency]) => new Money(amount, currency),
 * }
 * ```
 */
export interface Transcoding<T = unknown, D = unknown> {
  readonly type: TypeKey<T>
  readonly name: string
  encode(value: T): D
  decode(data: D): T
}
