import type { TypeKey } from "../ports/transcoding"

export function isNativeMapping(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false

  const proto: unknown = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}

export function isNativeSequence(value: unknown): value is unknown[] {
  return Array.isArray(value) && Object.getPrototypeOf(value) === Array.prototype
}

/**
 * The constructor a custom value dispatches on, or `undefined` for values
 * without one (`undefined`, objects whose prototype has no constructor).
 * Primitives resolve through their wrapper, so `10n` yields `BigInt`.
 */
export function typeKeyOf(value: unknown): unknown {
  if (value === undefined || value === null) return undefined

  const proto: unknown = Object.getPrototypeOf(Object(value))
  if (typeof proto !== "object" || proto === null) return undefined

  return "constructor" in proto ? proto.constructor : undefined
}

export function typeNameOf(value: unknown): string {
  if (value === undefined) return "undefined"

  const key = typeKeyOf(value)
  if (typeof key === "function" && key.name) return key.name

  return typeof value
}

export function describeTypeKey(type: TypeKey): string {
  return type.name || "<anonymous>"
}

/** Own key set is exactly `{typeKey, dataKey}`. */
export function isEnvelopeShape(node: object, typeKey: string, dataKey: string): boolean {
  return (
    Object.keys(node).length === 2 &&
    Object.hasOwn(node, typeKey) &&
    Object.hasOwn(node, dataKey)
  )
}
