/**
 * Parse D-Bus type signature strings into a tree structure.
 *
 * D-Bus type codes:
 * - Basic types: y(byte), b(bool), n(int16), q(uint16), i(int32), u(uint32),
 *                x(int64), t(uint64), d(double), s(string), o(object path),
 *                g(signature), h(unix fd)
 * - Container types: a(array), v(variant), ()(struct), {}(dict entry)
 *
 * @see https://dbus.freedesktop.org/doc/dbus-specification.html#type-system
 */

import { SignatureError } from "./errors"

/** Type codes that carry no children */
export type AtomicTypeCode =
  | "y"
  | "b"
  | "n"
  | "q"
  | "i"
  | "u"
  | "x"
  | "t" // integers
  | "d"
  | "s"
  | "o"
  | "g" // double, string, object path, signature
  | "v"
  | "h" // variant, unix fd

/** Type codes a node in the parsed tree can have */
export type DBusTypeCode = AtomicTypeCode | "a" | "(" | "{"

/** A node in the parsed signature tree */
export interface SignatureNode {
  type: DBusTypeCode
  child: SignatureNode[]
}

const ATOMIC_TYPES: ReadonlySet<string> = new Set("ybnqiuxtdsogvh".split(""))

const CLOSING: Record<"(" | "{", string> = {
  "(": ")",
  "{": "}",
}

export function isAtomicTypeCode(char: string): char is AtomicTypeCode {
  return ATOMIC_TYPES.has(char)
}

/**
 * Parse a D-Bus signature string into a tree structure.
 *
 * @param signature - The D-Bus type signature string (e.g., "a{sv}", "(ii)")
 * @returns One node per complete top-level type
 * @throws SignatureError if the signature contains unknown types or is malformed
 *
 * @example
 * parseSignature("a{sv}")
 * // Returns: [{ type: "a", child: [{ type: "{", child: [
 * //   { type: "s", child: [] },
 * //   { type: "v", child: [] }
 * // ]}]}]
 */
export function parseSignature(signature: string): SignatureNode[] {
  let index = 0

  function next(): string | null {
    if (index < signature.length) {
      const char = signature.charAt(index)
      ++index
      return char
    }
    return null
  }

  function fail(message: string): never {
    throw new SignatureError(signature, message)
  }

  function checkNotEnd(char: string | null): string {
    if (char === null) fail("Bad signature: unexpected end")
    return char
  }

  function parseOne(char: string, parent: DBusTypeCode | null): SignatureNode {
    if (isAtomicTypeCode(char)) {
      return { type: char, child: [] }
    }

    switch (char) {
      case "a": {
        // array - next character is the element type
        const element = checkNotEnd(next())
        return { type: "a", child: [parseOne(element, "a")] }
      }
      case "{": // dict entry
      case "(": {
        // struct
        if (char === "{" && parent !== "a") {
          fail(`Dict entry outside of an array in signature "${signature}"`)
        }
        const node: SignatureNode = { type: char, child: [] }
        let element = checkNotEnd(next())
        while (element !== CLOSING[char]) {
          node.child.push(parseOne(element, char))
          element = checkNotEnd(next())
        }
        if (char === "(" && node.child.length === 0) {
          fail(`Empty struct in signature "${signature}"`)
        }
        if (char === "{" && node.child.length !== 2) {
          fail(
            `Dict entry must have exactly two members in signature "${signature}"`,
          )
        }
        return node
      }
      case ")":
      case "}":
        return fail(`Unexpected "${char}" in signature "${signature}"`)
    }

    return fail(`Unknown type: "${char}" in signature "${signature}"`)
  }

  const result: SignatureNode[] = []
  let char: string | null
  while ((char = next()) !== null) {
    result.push(parseOne(char, null))
  }
  return result
}

/** Serialize a parsed node back to its signature text. */
export function stringifyNode(node: SignatureNode): string {
  switch (node.type) {
    case "a":
      return "a" + node.child.map(stringifyNode).join("")
    case "(":
      return "(" + node.child.map(stringifyNode).join("") + ")"
    case "{":
      return "{" + node.child.map(stringifyNode).join("") + "}"
    default:
      return node.type
  }
}

export default parseSignature
