import { describe, test, expect } from "vitest"

import { SignatureError } from "../lib/errors"
import { parseSignature, stringifyNode } from "../lib/signature"

describe("parseSignature", () => {
  test("parses basic types one node per type", () => {
    expect(parseSignature("su")).toEqual([
      { type: "s", child: [] },
      { type: "u", child: [] },
    ])
  })

  test("parses a dictionary", () => {
    expect(parseSignature("a{sv}")).toEqual([
      {
        type: "a",
        child: [
          {
            type: "{",
            child: [
              { type: "s", child: [] },
              { type: "v", child: [] },
            ],
          },
        ],
      },
    ])
  })

  test("parses nested structs and arrays", () => {
    expect(parseSignature("(iai)")).toEqual([
      {
        type: "(",
        child: [
          { type: "i", child: [] },
          { type: "a", child: [{ type: "i", child: [] }] },
        ],
      },
    ])
  })

  test("returns no nodes for the empty signature", () => {
    expect(parseSignature("")).toEqual([])
  })

  test("rejects unknown type codes", () => {
    expect(() => parseSignature("z")).toThrow(SignatureError)
    expect(() => parseSignature("z")).toThrow(
      'Unknown type: "z" in signature "z"',
    )
  })

  test("rejects an array without element type", () => {
    expect(() => parseSignature("a")).toThrow("Bad signature: unexpected end")
  })

  test("rejects an unterminated struct", () => {
    expect(() => parseSignature("(is")).toThrow(
      "Bad signature: unexpected end",
    )
  })

  test("rejects a stray closing bracket", () => {
    expect(() => parseSignature("i)")).toThrow(
      'Unexpected ")" in signature "i)"',
    )
  })

  test("rejects a dict entry outside of an array", () => {
    expect(() => parseSignature("{sv}")).toThrow(
      'Dict entry outside of an array in signature "{sv}"',
    )
  })

  test("rejects a dict entry without exactly two members", () => {
    expect(() => parseSignature("a{s}")).toThrow(SignatureError)
    expect(() => parseSignature("a{sii}")).toThrow(SignatureError)
  })

  test("rejects an empty struct", () => {
    expect(() => parseSignature("()")).toThrow('Empty struct in signature "()"')
  })

  test("keeps the offending signature on the error", () => {
    try {
      parseSignature("ai)")
      throw new Error("Expected to throw")
    } catch (error) {
      expect(error).toBeInstanceOf(SignatureError)
      if (!(error instanceof SignatureError)) return
      expect(error.signature).toBe("ai)")
    }
  })
})

describe("stringifyNode", () => {
  test("writes a parsed node back to its signature", () => {
    const [node] = parseSignature("a{s(ia{sv})}")
    if (!node) throw new Error("node is undefined")
    expect(stringifyNode(node)).toBe("a{s(ia{sv})}")
  })
})
