import { BaseError } from "@wirecraft/errors"
import { Packr } from "msgpackr"
import { NegativeZeroError } from "../../core/errors"
import { typeNameOf } from "../../core/native-kind"
import type { NativeCodec } from "../../ports/native-codec"
import type { NativeMap, NativeValue } from "../../ports/native-value"

/**
 * The bytes hold something a native tree cannot: a map key that is not a
 * string, binary data, a timestamp or a 64-bit integer.
 */
export class NonNativeValueError extends BaseError<"non_native_value"> {
  constructor(what: string, typeName: string) {
    super(`MessagePack data holds ${what} of type ${typeName}, which has no native counterpart`, {
      code: "non_native_value",
      context: { typeName },
    })
  }
}

function rejectNegativeZero(node: NativeValue): void {
  if (typeof node === "number") {
    if (Object.is(node, -0)) throw new NegativeZeroError("msgpack")
    return
  }
  if (node === null || typeof node !== "object") return

  for (const item of Array.isArray(node) ? node : Object.values(node)) {
    rejectNegativeZero(item)
  }
}

function toNativeTree(node: unknown): NativeValue {
  switch (typeof node) {
    case "string":
    case "number":
    case "boolean":
      return node
    case "object":
      if (node === null) return null
      if (Array.isArray(node)) return node.map(toNativeTree)
      if (node instanceof Map) return toNativeMap(node)
  }

  throw new NonNativeValueError("a value", typeNameOf(node))
}

function toNativeMap(map: Map<unknown, unknown>): NativeMap {
  return Object.fromEntries(
    Array.from(map, ([key, item]): [string, NativeValue] => {
      if (typeof key !== "string") throw new NonNativeValueError("a map key", typeNameOf(key))

      return [key, toNativeTree(item)]
    }),
  )
}

/**
 * MessagePack via msgpackr.
 *
 * Objects are written as plain maps (the record extension is off) so the
 * bytes stay readable by any MessagePack implementation. Map headers are
 * sized to the key count (fixmap for small objects) instead of msgpackr's
 * fixed map16.
 *
 * Maps are read as `Map` and rebuilt with `Object.fromEntries`, so every key,
 * `__proto__` included, comes back as an own data property.
 */
export class MsgpackNativeCodec implements NativeCodec {
  readonly name = "msgpack"

  private readonly packr = new Packr({
    useRecords: false,
    mapsAsObjects: false,
    variableMapSize: true,
  })

  serialize(value: NativeValue): Uint8Array {
    rejectNegativeZero(value)

    return this.packr.pack(value)
  }

  deserialize(bytes: Uint8Array): NativeValue {
    return toNativeTree(this.packr.unpack(bytes))
  }
}
