import { describe, test, expect } from "vitest"

import { coerceValue, evaluateArgument, parseArguments } from "../lib/args"
import { ArgumentError } from "../lib/errors"
import { parseSignature } from "../lib/signature"

describe("evaluateArgument", () => {
  test("reads JSON", () => {
    expect(evaluateArgument("42")).toBe(42)
    expect(evaluateArgument('{"a":[1,true]}')).toEqual({ a: [1, true] })
  })

  test("falls back to the bare string", () => {
    expect(evaluateArgument("/org/example")).toBe("/org/example")
    expect(evaluateArgument("")).toBe("")
  })
})

describe("parseArguments", () => {
  test("takes no arguments for the empty signature", () => {
    expect(parseArguments("", [])).toEqual([])
  })

  test("converts each word to its declared type", () => {
    expect(parseArguments("su", ["hello", "42"])).toEqual(["hello", 42])
  })

  test("keeps numbers passed for strings as text", () => {
    expect(parseArguments("s", ["42"])).toEqual(["42"])
    expect(parseArguments("s", ['"quoted"'])).toEqual(["quoted"])
  })

  test("rejects the wrong number of arguments", () => {
    expect(() => parseArguments("su", ["x"])).toThrow(
      'Expected 2 argument(s) for signature "su" (String, UInt32), got 1',
    )
    expect(() => parseArguments("", ["x"])).toThrow(
      'Expected 0 argument(s) for signature "", got 1',
    )
  })

  test("reads booleans", () => {
    expect(parseArguments("bb", ["true", "0"])).toEqual([true, false])
    expect(() => parseArguments("b", ["yes"])).toThrow(
      'Expected Boolean, got "yes"',
    )
  })

  test("checks integer ranges", () => {
    expect(parseArguments("y", ["255"])).toEqual([255])
    expect(() => parseArguments("y", ["256"])).toThrow(
      "256 is out of range for Byte",
    )
    expect(() => parseArguments("u", ["-1"])).toThrow(
      "-1 is out of range for UInt32",
    )
  })

  test("passes 64-bit integers as exact decimal strings", () => {
    expect(parseArguments("t", ["18446744073709551615"])).toEqual([
      "18446744073709551615",
    ])
    expect(parseArguments("x", ["9007199254740993"])).toEqual([
      "9007199254740993",
    ])
    expect(parseArguments("xx", ["-9223372036854775808", "42"])).toEqual([
      "-9223372036854775808",
      "42",
    ])
    expect(parseArguments("at", ['["18446744073709551615", 3]'])).toEqual([
      ["18446744073709551615", "3"],
    ])
  })

  test("checks 64-bit integer ranges", () => {
    expect(() => parseArguments("t", ["18446744073709551616"])).toThrow(
      "18446744073709551616 is out of range for UInt64",
    )
    expect(() => parseArguments("t", ["-1"])).toThrow(
      "-1 is out of range for UInt64",
    )
    expect(() => parseArguments("x", ["9223372036854775808"])).toThrow(
      "9223372036854775808 is out of range for Int64",
    )
    expect(() => parseArguments("x", ["1.5"])).toThrow(
      "Expected Int64, got 1.5",
    )
  })

  test("rejects fractions for integers", () => {
    expect(() => parseArguments("i", ["1.5"])).toThrow(ArgumentError)
    expect(() => parseArguments("i", ["1.5"])).toThrow(
      "Expected Int32, got 1.5",
    )
  })

  test("reads doubles", () => {
    expect(parseArguments("d", ["2.5"])).toEqual([2.5])
  })

  test("reads arrays and structs", () => {
    expect(parseArguments("as", ['["a","b"]'])).toEqual([["a", "b"]])
    expect(parseArguments("(si)", ['["x", 3]'])).toEqual([["x", 3]])
    expect(() => parseArguments("(si)", ['["x"]'])).toThrow(
      'Expected Struct {String, Int32}, got ["x"]',
    )
  })

  test("reads dictionaries from objects and from pairs", () => {
    expect(parseArguments("a{si}", ['{"a":1,"b":2}'])).toEqual([
      [
        ["a", 1],
        ["b", 2],
      ],
    ])
    expect(parseArguments("a{is}", ['[[1,"one"]]'])).toEqual([[[1, "one"]]])
  })
})

describe("coerceValue for variants", () => {
  const [variant] = parseSignature("v")
  if (!variant) throw new Error("variant is undefined")

  test("infers the signature of plain values", () => {
    expect(coerceValue(variant, "text")).toEqual(["s", "text"])
    expect(coerceValue(variant, 7)).toEqual(["i", 7])
    expect(coerceValue(variant, 2.5)).toEqual(["d", 2.5])
    expect(coerceValue(variant, true)).toEqual(["b", true])
    expect(coerceValue(variant, ["a", "b"])).toEqual(["as", ["a", "b"]])
  })

  test("takes an explicit signature and value pair", () => {
    expect(coerceValue(variant, ["u", 7])).toEqual(["u", 7])
    expect(coerceValue(variant, ["a{sb}", { on: true }])).toEqual([
      "a{sb}",
      [["on", true]],
    ])
  })

  test("refuses values it cannot type", () => {
    expect(() => coerceValue(variant, { a: 1 })).toThrow(ArgumentError)
  })
})
