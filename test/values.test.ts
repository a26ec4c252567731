import { describe, test, expect } from "vitest"

import { DBusError } from "../lib/errors"
import { fromReply, renderValue } from "../lib/values"

function show(outSignature: string, body: unknown[]): string | null {
  const value = fromReply(outSignature, body)
  return value ? renderValue(value) : null
}

// dbus-native variants: [signature tree, values]
const stringVariant = (value: string) => [[{ type: "s", child: [] }], [value]]
const int32Variant = (value: number) => [[{ type: "i", child: [] }], [value]]

describe("fromReply", () => {
  test("returns null for a method without outputs", () => {
    expect(fromReply("", [])).toBeNull()
  })

  test("returns a single scalar output as is", () => {
    expect(fromReply("s", ["hello"])).toEqual({
      kind: "scalar",
      value: "hello",
    })
  })

  test("keeps a single struct output as one value", () => {
    expect(fromReply("(is)", [[1, "a"]])).toEqual({
      kind: "struct",
      members: [
        { kind: "scalar", value: 1 },
        { kind: "scalar", value: "a" },
      ],
    })
  })

  test("gathers several outputs into a struct", () => {
    expect(fromReply("is", [1, "a"])).toEqual({
      kind: "struct",
      members: [
        { kind: "scalar", value: 1 },
        { kind: "scalar", value: "a" },
      ],
    })
  })

  test("turns an array of dict entries into a mapping", () => {
    expect(fromReply("a{su}", [[["one", 1]]])).toEqual({
      kind: "mapping",
      entries: [
        [
          { kind: "scalar", value: "one" },
          { kind: "scalar", value: 1 },
        ],
      ],
    })
  })

  test("unwraps variants", () => {
    expect(fromReply("v", [stringVariant("inside")])).toEqual({
      kind: "scalar",
      value: "inside",
    })
  })

  test("reads booleans sent as numbers", () => {
    expect(fromReply("b", [1])).toEqual({ kind: "scalar", value: true })
  })

  test("reads 64-bit values sent as strings", () => {
    expect(fromReply("t", ["18446744073709551615"])).toEqual({
      kind: "scalar",
      value: 18446744073709551615n,
    })
  })

  test("rejects a value of the wrong type", () => {
    expect(() => fromReply("s", [5])).toThrow(DBusError)
    expect(() => fromReply("s", [5])).toThrow("Expected String, got 5")
  })

  test("rejects a reply with the wrong number of values", () => {
    expect(() => fromReply("ss", ["a"])).toThrow(
      "Expected 2 value(s) in reply, got 1",
    )
  })
})

describe("renderValue", () => {
  test("quotes strings", () => {
    expect(show("s", ['say "hi"'])).toBe('"say \\"hi\\""')
  })

  test("renders numbers and booleans bare", () => {
    expect(show("ib", [-3, false])).toBe("(-3, false)")
  })

  test("renders arrays", () => {
    expect(show("ai", [[1, 2, 3]])).toBe("[1, 2, 3]")
    expect(show("as", [[]])).toBe("[]")
  })

  test("renders mappings", () => {
    expect(
      show("a{sv}", [
        [
          ["name", stringVariant("disk")],
          ["size", int32Variant(512)],
        ],
      ]),
    ).toBe('{"name": "disk", "size": 512}')
  })

  test("renders nested containers", () => {
    expect(show("a(sai)", [[["x", [1]], ["y", []]]])).toBe(
      '[("x", [1]), ("y", [])]',
    )
  })

  test("renders bigints without quotes", () => {
    expect(show("x", ["-9007199254740993"])).toBe("-9007199254740993")
  })
})
