import { JsonNativeCodec } from "../../adapters/json/json-native-codec"
import { issuedAt, Money, moneyAsList, Widget } from "../../ports/__tests__/fixtures"
import { builtinTranscodings, Tuple } from "../../transcodings"
import { InvalidEnvelopeKeysError, UnknownWireNameError, UnsupportedTypeError } from "../errors"
import { RecursiveTranscoder } from "../recursive-transcoder"
import { TranscodingRegistry } from "../transcoding-registry"

function makeTranscoder(): RecursiveTranscoder {
  const transcoder = new RecursiveTranscoder({ codec: new JsonNativeCodec() })
  for (const transcoding of builtinTranscodings()) transcoder.register(transcoding)
  return transcoder
}

describe("RecursiveTranscoder", () => {
  describe("reduce", () => {
    it("wraps custom values in envelopes", () => {
      const transcoder = makeTranscoder()

      expect(transcoder.reduce({ data: [Tuple.of(1, 2, 3)] })).toEqual({
        data: [{ _type_: "tuple_as_list", _data_: [1, 2, 3] }],
      })
    })

    it("reduces custom values found inside a payload", () => {
      const transcoder = makeTranscoder()

      expect(transcoder.reduce(Tuple.of<unknown>(issuedAt, 10n))).toEqual({
        _type_: "tuple_as_list",
        _data_: [
          { _type_: "datetime_iso", _data_: "2024-01-15T10:30:00.000Z" },
          { _type_: "bigint_str", _data_: "10" },
        ],
      })
    })

    it("returns native values as equal trees", () => {
      const transcoder = makeTranscoder()
      const value = { a: [1, "b", null, true], c: { d: 2.5 } }

      const reduced = transcoder.reduce(value)

      expect(reduced).toEqual(value)
      expect(reduced).not.toBe(value)
    })

    it("treats prototype-less objects as mappings", () => {
      const transcoder = makeTranscoder()
      const bare: Record<string, unknown> = Object.create(null)
      bare.key = Tuple.of(1)

      expect(transcoder.reduce(bare)).toEqual({ key: { _type_: "tuple_as_list", _data_: [1] } })
    })

    it("does not modify its input", () => {
      const transcoder = makeTranscoder()
      const tuple = Tuple.of(1)
      const input = { list: [tuple], when: issuedAt }

      transcoder.reduce(input)

      expect(input.list[0]).toBe(tuple)
      expect(input.when).toBe(issuedAt)
    })

    it.each<[string, unknown, string]>([
      ["undefined", undefined, "undefined"],
      ["a function", () => 1, "Function"],
      ["a symbol", Symbol("s"), "Symbol"],
      ["an unregistered class", new Widget(), "Widget"],
      ["a Buffer", Buffer.from("hi"), "Buffer"],
      ["an Array subclass", new (class Row extends Array<number> {})(), "Row"],
    ])("rejects %s", (_label, value, typeName) => {
      const transcoder = makeTranscoder()

      expect(() => transcoder.reduce({ nested: [value] })).toThrow(
        `Object of type ${typeName} is not serializable.`,
      )
    })

    it("rejects a hole in a list the same way as an explicit undefined", () => {
      const transcoder = makeTranscoder()
      const sparse: number[] = [1]
      sparse[2] = 3

      expect(1 in sparse).toBe(false)
      expect(() => transcoder.reduce({ list: sparse })).toThrow(UnsupportedTypeError)
      expect(() => transcoder.reduce({ list: [1, undefined, 3] })).toThrow(UnsupportedTypeError)
    })

    it("reports the unsupported type in the error context", () => {
      const transcoder = makeTranscoder()

      try {
        transcoder.reduce(new Widget())
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(UnsupportedTypeError)
        expect(err).toMatchObject({
          code: "unsupported_type",
          context: { typeName: "Widget" },
          isOperational: false,
          isRetryable: false,
        })
      }
    })
  })

  describe("restore", () => {
    it("decodes inner envelopes before the outer one", () => {
      const transcoder = makeTranscoder()

      const restored = transcoder.restore({
        _type_: "tuple_as_list",
        _data_: [{ _type_: "datetime_iso", _data_: "2024-01-15T10:30:00.000Z" }],
      })

      expect(restored).toStrictEqual(Tuple.of(issuedAt))
    })

    it("keeps mappings that only partly look like envelopes", () => {
      const transcoder = makeTranscoder()

      expect(transcoder.restore({ _type_: "tuple_as_list" })).toEqual({ _type_: "tuple_as_list" })
      expect(transcoder.restore({ _type_: "x", _data_: 1, more: 2 })).toEqual({
        _type_: "x",
        _data_: 1,
        more: 2,
      })
    })

    it("rejects envelopes with an unknown name", () => {
      const transcoder = makeTranscoder()

      expect(() => transcoder.restore({ _type_: "money", _data_: [1, "EUR"] })).toThrow(
        UnknownWireNameError,
      )
    })

    it("rejects envelopes whose name is not a string", () => {
      const transcoder = makeTranscoder()

      expect(() => transcoder.restore({ _type_: 5, _data_: 1 })).toThrow(
        "Data serialized with name of type Number is not deserializable. Register a transcoding for this name.",
      )
    })

    it("marks unknown wire names as retryable", () => {
      const err = new UnknownWireNameError("money")

      expect(err.isRetryable).toBe(true)
      expect(err.isOperational).toBe(true)
      expect(err.context).toEqual({ wireName: "money" })
    })

    it("keeps __proto__ as an ordinary key", () => {
      const transcoder = makeTranscoder()

      const restored = transcoder.restore(JSON.parse('{"__proto__":{"polluted":true}}'))

      expect(Object.getPrototypeOf(restored)).toBe(Object.prototype)
      expect(Object.hasOwn(Object(restored), "__proto__")).toBe(true)
      expect(Object.hasOwn(Object.prototype, "polluted")).toBe(false)
    })
  })

  describe("encode", () => {
    it("writes envelopes through the codec", () => {
      const transcoder = makeTranscoder()

      const text = new TextDecoder().decode(transcoder.encode({ data: [Tuple.of(1, 2)] }))

      expect(text).toBe('{"data":[{"_type_":"tuple_as_list","_data_":[1,2]}]}')
    })

    it("writes custom envelope keys", () => {
      const transcoder = new RecursiveTranscoder(
        { codec: new JsonNativeCodec() },
        { envelope: { typeKey: "kind", dataKey: "value" } },
      )
      transcoder.register(moneyAsList)

      const text = new TextDecoder().decode(transcoder.encode(new Money(5, "EUR")))

      expect(text).toBe('{"kind":"money","value":[5,"EUR"]}')
      expect(transcoder.envelope).toEqual({ typeKey: "kind", dataKey: "value" })
    })
  })

  describe("construction", () => {
    it.each([
      ["", "_data_"],
      ["_type_", ""],
      ["same", "same"],
    ])("rejects envelope keys %j and %j", (typeKey, dataKey) => {
      expect(
        () => new RecursiveTranscoder({ codec: new JsonNativeCodec() }, { envelope: { typeKey, dataKey } }),
      ).toThrow(InvalidEnvelopeKeysError)
    })

    it("shares a supplied registry", () => {
      const registry = new TranscodingRegistry()
      const transcoder = new RecursiveTranscoder({ codec: new JsonNativeCodec(), registry })

      transcoder.register(moneyAsList)

      expect(transcoder.registry).toBe(registry)
      expect(registry.names()).toEqual(["money"])
      expect(transcoder.codecName).toBe("json")
    })
  })
})
