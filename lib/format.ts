import { SignatureError } from "./errors"
import type { DBusArgument, DBusCallable } from "./introspect"
import {
  type AtomicTypeCode,
  type SignatureNode,
  parseSignature,
  stringifyNode,
} from "./signature"

// Names follow the D-Bus type system's own vocabulary
const ATOMIC_NAMES: Record<AtomicTypeCode, string> = {
  y: "Byte",
  b: "Boolean",
  n: "Int16",
  q: "UInt16",
  i: "Int32",
  u: "UInt32",
  x: "Int64",
  t: "UInt64",
  d: "Double",
  s: "String",
  o: "ObjectPath",
  g: "Signature",
  v: "Variant",
  h: "UnixFd",
}

function formatNodes(nodes: SignatureNode[]): string {
  return nodes.map(formatNode).join(", ")
}

export function formatNode(node: SignatureNode): string {
  switch (node.type) {
    case "(":
      return "Struct {" + formatNodes(node.child) + "}"
    case "a": {
      const [element] = node.child
      if (!element) {
        throw new SignatureError("a", "Array without an element type")
      }
      if (element.type === "{") {
        return "Dictionary {" + formatNodes(element.child) + "}"
      }
      return formatNode(element) + "[]"
    }
    case "{":
      throw new SignatureError(
        stringifyNode(node),
        "Dict entry outside of an array",
      )
    default:
      return ATOMIC_NAMES[node.type]
  }
}

/**
 * Render a type signature as a human-readable type expression.
 *
 * A signature holding several complete types (an argument list) renders as
 * their comma-separated names; the empty signature renders as "".
 *
 * @example
 * formatSignature("a{sv}") // "Dictionary {String, Variant}"
 * formatSignature("a(ii)") // "Struct {Int32, Int32}[]"
 * formatSignature("su")    // "String, UInt32"
 */
export function formatSignature(signature: string): string {
  return formatNodes(parseSignature(signature))
}

/**
 * `"<type> <name>"`, or just the type when the name is empty. An empty
 * signature with a name gives `" name"`, leading space included.
 */
export function pprintArgument(signature: string, name: string): string {
  const formatted = formatSignature(signature)
  return name ? `${formatted} ${name}` : formatted
}

function pprintArgs(args: DBusArgument[]): string {
  return args.map((arg) => pprintArgument(arg.signature, arg.name)).join(", ")
}

/**
 * One-line rendering of a method or signal:
 *
 *     void AddMatch(String rule)
 *     String GetId()
 *     (Int32 x, Int32 y) GetPosition()
 *     signal NameLost(String name)
 */
export function pprintCallable(callable: DBusCallable): string {
  if (callable.kind === "signal") {
    return `signal ${callable.name}(${pprintArgs(callable.outArgs)})`
  }

  const outArgs = callable.outArgs
  const [onlyOut] = outArgs
  let returnPart: string
  if (!onlyOut) {
    returnPart = "void"
  } else if (outArgs.length === 1 && !onlyOut.name) {
    returnPart = formatSignature(onlyOut.signature)
  } else {
    returnPart = `(${pprintArgs(outArgs)})`
  }

  return `${returnPart} ${callable.name}(${pprintArgs(callable.inArgs)})`
}
