import { Parser } from "xml2js"

import type { Bus, DBusCallback } from "./bus"
import { INTROSPECTABLE_INTERFACE, errorNames } from "./constants"
import { DBusError } from "./errors"

// =============================================================================
// Types
// =============================================================================

export interface DBusArgument {
  name: string
  signature: string
}

export type CallableKind = "method" | "signal"

export interface DBusCallable {
  kind: CallableKind
  name: string
  inArgs: DBusArgument[]
  outArgs: DBusArgument[]
}

export interface DBusInterfaceInfo {
  name: string
  methods: DBusCallable[]
  signals: DBusCallable[]
}

export interface IntrospectResult {
  interfaces: DBusInterfaceInfo[]
  nodes: string[]
}

// =============================================================================
// XML Parsing Types (internal)
// =============================================================================

interface XmlArg {
  $?: {
    name?: string
    direction?: string
    type?: string
  }
}

interface XmlCallable {
  $?: { name?: string }
  arg?: XmlArg[]
}

interface XmlInterface {
  $?: { name?: string }
  method?: XmlCallable[]
  signal?: XmlCallable[]
}

interface XmlNode {
  $?: { name?: string }
  interface?: XmlInterface[]
  node?: XmlNode[]
}

interface XmlRoot {
  // xml2js yields "" for an element with neither attributes nor children
  node?: XmlNode | string
}

// =============================================================================
// Helper Functions
// =============================================================================

function parseCallable(
  xml: XmlCallable,
  kind: CallableKind,
): DBusCallable | null {
  const name = xml.$?.name
  if (!name) return null

  const callable: DBusCallable = { kind, name, inArgs: [], outArgs: [] }
  const defaultDirection = kind === "signal" ? "out" : "in"

  for (const arg of xml.arg ?? []) {
    const argument: DBusArgument = {
      name: arg.$?.name ?? "",
      signature: arg.$?.type ?? "",
    }
    const direction = arg.$?.direction ?? defaultDirection
    if (direction === "out") {
      callable.outArgs.push(argument)
    } else {
      callable.inArgs.push(argument)
    }
  }

  return callable
}

function parseInterface(xml: XmlInterface): DBusInterfaceInfo | null {
  const name = xml.$?.name
  if (!name) return null

  const methods: DBusCallable[] = []
  const signals: DBusCallable[] = []

  for (const xmlMethod of xml.method ?? []) {
    const method = parseCallable(xmlMethod, "method")
    if (method) methods.push(method)
  }

  for (const xmlSignal of xml.signal ?? []) {
    const signal = parseCallable(xmlSignal, "signal")
    if (signal) signals.push(signal)
  }

  return { name, methods, signals }
}

/** Append a child node name to an object path. */
export function joinPath(parent: string, child: string): string {
  if (child.startsWith("/")) return child
  return parent.endsWith("/") ? parent + child : parent + "/" + child
}

// =============================================================================
// XML Processing
// =============================================================================

export function processXML(
  xml: string | Buffer,
  callback: (error: DBusError | null, result?: IntrospectResult) => void,
): void {
  const parser = new Parser()

  parser.parseString(xml, (parseError: Error | null, root: XmlRoot | null) => {
    if (parseError) {
      callback(new DBusError(errorNames.invalidXml, parseError.message))
      return
    }

    const rootNode = root?.node
    if (rootNode === undefined) {
      callback(new DBusError(errorNames.invalidXml, "No root node"))
      return
    }

    // <node/>
    if (typeof rootNode === "string") {
      callback(null, { interfaces: [], nodes: [] })
      return
    }

    const interfaces: DBusInterfaceInfo[] = []
    const nodes: string[] = []

    for (const xmlNode of rootNode.node ?? []) {
      const nodeName = xmlNode.$?.name
      if (nodeName) {
        nodes.push(nodeName)
      }
    }

    for (const xmlInterface of rootNode.interface ?? []) {
      const iface = parseInterface(xmlInterface)
      if (iface) interfaces.push(iface)
    }

    callback(null, { interfaces, nodes })
  })
}

export function processXMLAsync(
  xml: string | Buffer,
): Promise<IntrospectResult> {
  return new Promise((resolve, reject) => {
    processXML(xml, (error, result) => {
      if (error) {
        reject(error)
      } else if (result) {
        resolve(result)
      } else {
        reject(new DBusError(errorNames.invalidXml, "No result"))
      }
    })
  })
}

// =============================================================================
// Introspection Entry Points
// =============================================================================

/** Fetch the raw introspection document of an object. */
export function fetchXML(
  bus: Bus,
  service: string,
  path: string,
  callback: DBusCallback<string>,
): void {
  bus.invoke(
    {
      destination: service,
      path,
      interface: INTROSPECTABLE_INTERFACE,
      member: "Introspect",
    },
    (error, body) => {
      if (error) {
        callback(error)
        return
      }

      const [xml] = body ?? []
      if (typeof xml !== "string") {
        callback(
          new DBusError(
            errorNames.invalidSignature,
            `Introspect on ${service} ${path} did not return a string`,
          ),
        )
        return
      }

      callback(null, xml)
    },
  )
}

export function fetchXMLAsync(
  bus: Bus,
  service: string,
  path: string,
): Promise<string> {
  return new Promise((resolve, reject) => {
    fetchXML(bus, service, path, (error, xml) => {
      if (error) {
        reject(error)
      } else {
        resolve(xml ?? "")
      }
    })
  })
}

export function introspectBus(
  bus: Bus,
  service: string,
  path: string,
  callback: (error: DBusError | null, result?: IntrospectResult) => void,
): void {
  fetchXML(bus, service, path, (error, xml) => {
    if (error) {
      callback(error)
      return
    }

    processXML(xml ?? "", callback)
  })
}

export function introspectBusAsync(
  bus: Bus,
  service: string,
  path: string,
): Promise<IntrospectResult> {
  return new Promise((resolve, reject) => {
    introspectBus(bus, service, path, (error, result) => {
      if (error) {
        reject(error)
      } else if (result) {
        resolve(result)
      } else {
        reject(new DBusError(errorNames.invalidXml, "No result"))
      }
    })
  })
}
