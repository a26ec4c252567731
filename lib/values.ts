import { errorNames } from "./constants"
import { DBusError } from "./errors"
import { formatNode } from "./format"
import {
  type SignatureNode,
  isAtomicTypeCode,
  parseSignature,
} from "./signature"

// =============================================================================
// Types
// =============================================================================

export type Scalar = boolean | number | bigint | string

export type DisplayValue =
  | { kind: "struct"; members: DisplayValue[] }
  | { kind: "array"; items: DisplayValue[] }
  | { kind: "mapping"; entries: Array<[DisplayValue, DisplayValue]> }
  | { kind: "scalar"; value: Scalar }

// =============================================================================
// Wire value -> DisplayValue
// =============================================================================

function mismatch(node: SignatureNode, raw: unknown): DBusError {
  let shown: string
  try {
    shown = JSON.stringify(raw) ?? String(raw)
  } catch {
    shown = String(raw)
  }
  return new DBusError(
    errorNames.invalidArgs,
    `Expected ${formatNode(node)}, got ${shown}`,
  )
}

function isSignatureNode(value: unknown): value is SignatureNode {
  if (typeof value !== "object" || value === null) return false
  if (!("type" in value) || !("child" in value)) return false
  const { type, child } = value
  if (typeof type !== "string" || !Array.isArray(child)) return false
  if (!isAtomicTypeCode(type) && type !== "a" && type !== "(" && type !== "{") {
    return false
  }
  return child.every(isSignatureNode)
}

/** dbus-native hands variants over as `[signatureTree, values]`. */
function isWireVariant(raw: unknown): raw is [SignatureNode[], unknown[]] {
  if (!Array.isArray(raw) || raw.length !== 2) return false
  const [tree, values] = raw
  return (
    Array.isArray(tree) && tree.every(isSignatureNode) && Array.isArray(values)
  )
}

function toScalar(node: SignatureNode, raw: unknown): Scalar {
  switch (node.type) {
    case "b":
      if (typeof raw === "boolean") return raw
      if (typeof raw === "number") return raw !== 0
      break
    case "x":
    case "t": {
      // 64-bit values may arrive as numbers, strings or Long-like objects
      if (typeof raw === "number" || typeof raw === "bigint") return raw
      const text =
        typeof raw === "string" || (typeof raw === "object" && raw !== null) ?
          String(raw)
        : ""
      if (/^-?\d+$/.test(text)) return BigInt(text)
      break
    }
    case "s":
    case "o":
    case "g":
      if (typeof raw === "string") return raw
      break
    default:
      if (typeof raw === "number") return raw
  }
  throw mismatch(node, raw)
}

function toArray(node: SignatureNode, raw: unknown): unknown[] {
  if (!Array.isArray(raw)) throw mismatch(node, raw)
  return raw
}

function toMembers(nodes: SignatureNode[], raw: unknown[]): DisplayValue[] {
  return nodes.map((member, index) => toDisplayValue(member, raw[index]))
}

export function toDisplayValue(node: SignatureNode, raw: unknown): DisplayValue {
  switch (node.type) {
    case "(": {
      const members = toArray(node, raw)
      if (members.length !== node.child.length) throw mismatch(node, raw)
      return { kind: "struct", members: toMembers(node.child, members) }
    }
    case "a": {
      const [element] = node.child
      const items = toArray(node, raw)
      if (!element) throw mismatch(node, raw)

      if (element.type === "{") {
        const [keyNode, valueNode] = element.child
        if (!keyNode || !valueNode) throw mismatch(node, raw)
        return {
          kind: "mapping",
          entries: items.map((item) => {
            const pair = toArray(element, item)
            if (pair.length !== 2) throw mismatch(element, item)
            return [
              toDisplayValue(keyNode, pair[0]),
              toDisplayValue(valueNode, pair[1]),
            ]
          }),
        }
      }

      return {
        kind: "array",
        items: items.map((item) => toDisplayValue(element, item)),
      }
    }
    case "v": {
      if (!isWireVariant(raw)) throw mismatch(node, raw)
      const [tree, values] = raw
      const [only] = tree
      if (only && tree.length === 1) {
        return toDisplayValue(only, values[0])
      }
      return { kind: "struct", members: toMembers(tree, values) }
    }
    case "{":
      throw mismatch(node, raw)
    default:
      return { kind: "scalar", value: toScalar(node, raw) }
  }
}

/**
 * Turn a reply body into the value to show: nothing for a method without
 * outputs, the value itself for a single output (a struct stays one value),
 * and a struct of all outputs otherwise.
 */
export function fromReply(
  outSignature: string,
  body: unknown[],
): DisplayValue | null {
  const nodes = parseSignature(outSignature)
  const [only] = nodes
  if (!only) return null

  if (body.length !== nodes.length) {
    throw new DBusError(
      errorNames.invalidArgs,
      `Expected ${nodes.length} value(s) in reply, got ${body.length}`,
    )
  }

  if (nodes.length === 1) {
    return toDisplayValue(only, body[0])
  }
  return { kind: "struct", members: toMembers(nodes, body) }
}

// =============================================================================
// DisplayValue -> text
// =============================================================================

export function renderValue(value: DisplayValue): string {
  switch (value.kind) {
    case "struct":
      return "(" + value.members.map(renderValue).join(", ") + ")"
    case "array":
      return "[" + value.items.map(renderValue).join(", ") + "]"
    case "mapping":
      return (
        "{"
        + value.entries
          .map(([key, item]) => `${renderValue(key)}: ${renderValue(item)}`)
          .join(", ")
        + "}"
      )
    case "scalar":
      return typeof value.value === "string" ?
          JSON.stringify(value.value)
        : String(value.value)
  }
}
