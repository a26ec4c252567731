import { ArgumentError } from "./errors"
import { formatNode, formatSignature } from "./format"
import { type SignatureNode, parseSignature, stringifyNode } from "./signature"

const INTEGER_RANGES: Record<string, [number, number]> = {
  y: [0, 0xff],
  n: [-0x8000, 0x7fff],
  q: [0, 0xffff],
  i: [-0x80000000, 0x7fffffff],
  u: [0, 0xffffffff],
  h: [0, 0xffffffff],
}

const INTEGER64_RANGES: Record<string, [bigint, bigint]> = {
  x: [-(2n ** 63n), 2n ** 63n - 1n],
  t: [0n, 2n ** 64n - 1n],
}

const INTEGER_TEXT = /^-?\d+$/

function show(value: unknown): string {
  return typeof value === "string" ? JSON.stringify(value) : String(value)
}

function expected(node: SignatureNode, value: unknown): ArgumentError {
  let shown: string
  try {
    shown = JSON.stringify(value) ?? show(value)
  } catch {
    shown = show(value)
  }
  return new ArgumentError(`Expected ${formatNode(node)}, got ${shown}`)
}

/** Read one command-line word as JSON, falling back to the bare string. */
export function evaluateArgument(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return text
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function inferVariantSignature(value: unknown): string | null {
  switch (typeof value) {
    case "string":
      return "s"
    case "boolean":
      return "b"
    case "number":
      return Number.isInteger(value) ? "i" : "d"
  }
  if (Array.isArray(value) && value.every((item) => typeof item === "string")) {
    return "as"
  }
  return null
}

function toVariant(node: SignatureNode, value: unknown): [string, unknown] {
  // An explicit ["signature", value] pair
  if (Array.isArray(value) && value.length === 2 && typeof value[0] === "string") {
    const [signature, inner] = value
    let nodes: SignatureNode[] | null = null
    try {
      nodes = parseSignature(signature)
    } catch {
      nodes = null
    }
    const [only] = nodes ?? []
    if (only && nodes?.length === 1) {
      return [stringifyNode(only), coerceValue(only, inner)]
    }
  }

  const signature = inferVariantSignature(value)
  if (signature === null) {
    throw new ArgumentError(
      `Cannot infer a type for variant value ${show(value)}; pass ["signature", value]`,
    )
  }
  const [inferred] = parseSignature(signature)
  if (!inferred) throw expected(node, value)
  return [signature, coerceValue(inferred, value)]
}

function toInteger(node: SignatureNode, value: unknown): number {
  const number =
    typeof value === "string" && value.trim() !== "" ? Number(value) : value
  if (typeof number !== "number" || !Number.isInteger(number)) {
    throw expected(node, value)
  }
  const range = INTEGER_RANGES[node.type]
  if (range && (number < range[0] || number > range[1])) {
    throw new ArgumentError(
      `${number} is out of range for ${formatNode(node)}`,
    )
  }
  return number
}

/** 64-bit integers go to dbus-native as decimal strings. */
function toInteger64(node: SignatureNode, value: unknown): string {
  let integer: bigint
  if (typeof value === "bigint") {
    integer = value
  } else if (typeof value === "number" && Number.isSafeInteger(value)) {
    integer = BigInt(value)
  } else if (typeof value === "string" && INTEGER_TEXT.test(value.trim())) {
    integer = BigInt(value.trim())
  } else {
    throw expected(node, value)
  }

  const range = INTEGER64_RANGES[node.type]
  if (range && (integer < range[0] || integer > range[1])) {
    throw new ArgumentError(
      `${integer} is out of range for ${formatNode(node)}`,
    )
  }
  return integer.toString()
}

/**
 * Convert an evaluated command-line value into the shape dbus-native
 * marshals for the given type.
 */
export function coerceValue(node: SignatureNode, value: unknown): unknown {
  switch (node.type) {
    case "y":
    case "n":
    case "q":
    case "i":
    case "u":
    case "h":
      return toInteger(node, value)
    case "x":
    case "t":
      return toInteger64(node, value)
    case "d": {
      const number =
        typeof value === "string" && value.trim() !== "" ? Number(value) : value
      if (typeof number !== "number" || Number.isNaN(number)) {
        throw expected(node, value)
      }
      return number
    }
    case "b":
      if (typeof value === "boolean") return value
      if (value === 1 || value === 0) return value === 1
      throw expected(node, value)
    case "s":
    case "o":
    case "g":
      if (typeof value === "string") return value
      if (typeof value === "number" || typeof value === "boolean") {
        return String(value)
      }
      throw expected(node, value)
    case "v":
      return toVariant(node, value)
    case "(": {
      if (!Array.isArray(value) || value.length !== node.child.length) {
        throw expected(node, value)
      }
      return node.child.map((member, index) => coerceValue(member, value[index]))
    }
    case "a": {
      const [element] = node.child
      if (!element) throw expected(node, value)

      if (element.type === "{") {
        const [keyNode, valueNode] = element.child
        if (!keyNode || !valueNode) throw expected(node, value)
        let pairs: unknown[]
        if (isPlainObject(value)) {
          pairs = Object.entries(value)
        } else if (Array.isArray(value)) {
          pairs = value
        } else {
          throw expected(node, value)
        }
        return pairs.map((pair) => {
          if (!Array.isArray(pair) || pair.length !== 2) {
            throw expected(element, pair)
          }
          return [coerceValue(keyNode, pair[0]), coerceValue(valueNode, pair[1])]
        })
      }

      if (!Array.isArray(value)) throw expected(node, value)
      return value.map((item) => coerceValue(element, item))
    }
    case "{":
      throw expected(node, value)
  }
}

function readWord(node: SignatureNode, word: string): unknown {
  // JSON would round a 64-bit integer to the nearest double
  const is64Bit = node.type === "x" || node.type === "t"
  if (is64Bit && INTEGER_TEXT.test(word.trim())) return word.trim()
  return evaluateArgument(word)
}

/**
 * Evaluate command-line words against a method's input signature.
 *
 * @example
 * parseArguments("su", ["hello", "42"]) // ["hello", 42]
 */
export function parseArguments(
  inSignature: string,
  rawArgs: string[],
): unknown[] {
  const nodes = parseSignature(inSignature)
  if (nodes.length !== rawArgs.length) {
    throw new ArgumentError(
      `Expected ${nodes.length} argument(s) for signature "${inSignature}"`
        + (nodes.length > 0 ? ` (${formatSignature(inSignature)})` : "")
        + `, got ${rawArgs.length}`,
    )
  }

  return nodes.map((node, index) =>
    coerceValue(node, readWord(node, rawArgs[index] ?? "")),
  )
}
