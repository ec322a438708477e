import { Widget } from "../../ports/__tests__/fixtures"
import { Tuple } from "../../transcodings"
import {
  describeTypeKey,
  isEnvelopeShape,
  isNativeMapping,
  isNativeSequence,
  typeKeyOf,
  typeNameOf,
} from "../native-kind"

describe("isNativeMapping", () => {
  it("accepts plain and prototype-less objects", () => {
    expect(isNativeMapping({})).toBe(true)
    expect(isNativeMapping(Object.create(null))).toBe(true)
  })

  it.each([[[]], [null], [new Map()], [new Widget()], [new Date(0)], ["text"]])(
    "rejects %o",
    (value) => {
      expect(isNativeMapping(value)).toBe(false)
    },
  )
})

describe("isNativeSequence", () => {
  it("accepts plain arrays only", () => {
    class Row extends Array<number> {}

    expect(isNativeSequence([1, 2])).toBe(true)
    expect(isNativeSequence(new Row())).toBe(false)
    expect(isNativeSequence(new Uint8Array(2))).toBe(false)
    expect(isNativeSequence({ length: 0 })).toBe(false)
  })
})

describe("typeKeyOf", () => {
  it("returns the exact constructor", () => {
    expect(typeKeyOf(Tuple.of(1))).toBe(Tuple)
    expect(typeKeyOf(new Date(0))).toBe(Date)
    expect(typeKeyOf(10n)).toBe(BigInt)
  })

  it("returns undefined for values without a constructor", () => {
    expect(typeKeyOf(undefined)).toBeUndefined()
    expect(typeKeyOf(null)).toBeUndefined()
    expect(typeKeyOf(Object.create(null))).toBeUndefined()
  })
})

describe("typeNameOf", () => {
  it.each<[unknown, string]>([
    [undefined, "undefined"],
    [10n, "BigInt"],
    [new Widget(), "Widget"],
    [Object.create(null), "object"],
  ])("names %o as %s", (value, name) => {
    expect(typeNameOf(value)).toBe(name)
  })
})

describe("describeTypeKey", () => {
  it("falls back for anonymous classes", () => {
    const types = [class {}]

    expect(describeTypeKey(Tuple)).toBe("Tuple")
    expect(describeTypeKey(types[0] ?? Tuple)).toBe("<anonymous>")
  })
})

describe("isEnvelopeShape", () => {
  it("requires exactly the two envelope keys", () => {
    expect(isEnvelopeShape({ _type_: "a", _data_: 1 }, "_type_", "_data_")).toBe(true)
    expect(isEnvelopeShape({ _type_: "a" }, "_type_", "_data_")).toBe(false)
    expect(isEnvelopeShape({ _type_: "a", _data_: 1, x: 0 }, "_type_", "_data_")).toBe(false)
    expect(isEnvelopeShape({ t: "a", d: 1 }, "_type_", "_data_")).toBe(false)
  })
})
