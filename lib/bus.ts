import * as dbus from "dbus-native"

import {
  BUS_INTERFACE,
  BUS_PATH,
  BUS_SERVICE,
  type BusType,
  errorNames,
} from "./constants"
import { DBusError } from "./errors"

// =============================================================================
// Types
// =============================================================================

export interface DBusMessage {
  destination?: string
  path?: string
  interface?: string
  member?: string
  signature?: string
  body?: unknown[]
}

export type DBusCallback<T = unknown> = (
  error: DBusError | null,
  result?: T,
) => void

/**
 * The one call the explorer needs from a bus: send a method call and get
 * back the reply body, one element per top-level output.
 */
export interface Bus {
  invoke(message: DBusMessage, callback: DBusCallback<unknown[]>): void
}

export interface ClosableBus extends Bus {
  close(): void
}

export interface MethodCall {
  service: string
  path: string
  iface: string
  method: string
  /** Input signature; empty for a method without arguments */
  signature: string
  args: unknown[]
}

// =============================================================================
// dbus-native adapter
// =============================================================================

function toDBusError(error: dbus.NativeError): DBusError {
  const { name, message } = error
  let text: string
  if (Array.isArray(message) && typeof message[0] === "string") {
    text = message[0]
  } else if (typeof message === "string") {
    text = message
  } else {
    text = name
  }
  return new DBusError(name, text)
}

export function connectBus(type: BusType): ClosableBus {
  const native = type === "system" ? dbus.systemBus() : dbus.sessionBus()
  const pending = new Set<DBusCallback<unknown[]>>()
  let connectionError: DBusError | null = null

  native.connection.on("error", (error: Error) => {
    connectionError = new DBusError(
      errorNames.failed,
      `Cannot connect to the ${type} bus: ${error.message}`,
    )
    for (const callback of pending) {
      callback(connectionError)
    }
    pending.clear()
  })

  return {
    invoke(message, callback) {
      if (connectionError) {
        callback(connectionError)
        return
      }

      pending.add(callback)
      native.invoke(message, (error, ...body) => {
        if (!pending.delete(callback)) return
        if (error) {
          callback(toDBusError(error))
        } else {
          callback(null, body)
        }
      })
    },
    close() {
      native.connection.end()
    },
  }
}

// =============================================================================
// Calls
// =============================================================================

export function invokeMethod(
  bus: Bus,
  call: MethodCall,
  callback: DBusCallback<unknown[]>,
): void {
  const message: DBusMessage = {
    destination: call.service,
    path: call.path,
    interface: call.iface,
    member: call.method,
  }

  if (call.signature !== "") {
    message.signature = call.signature
    message.body = call.args
  }

  bus.invoke(message, callback)
}

export function invokeMethodAsync(
  bus: Bus,
  call: MethodCall,
): Promise<unknown[]> {
  return new Promise((resolve, reject) => {
    invokeMethod(bus, call, (error, body) => {
      if (error) {
        reject(error)
      } else {
        resolve(body ?? [])
      }
    })
  })
}

function isStringArray(value: unknown): value is string[] {
  return (
    Array.isArray(value) && value.every((item) => typeof item === "string")
  )
}

async function callNameList(bus: Bus, member: string): Promise<string[]> {
  const [names] = await invokeMethodAsync(bus, {
    service: BUS_SERVICE,
    path: BUS_PATH,
    iface: BUS_INTERFACE,
    method: member,
    signature: "",
    args: [],
  })

  if (!isStringArray(names)) {
    throw new DBusError(
      errorNames.invalidSignature,
      `${member} did not return a list of names`,
    )
  }
  return names
}

export function listNames(bus: Bus): Promise<string[]> {
  return callNameList(bus, "ListNames")
}

export function listActivatableNames(bus: Bus): Promise<string[]> {
  return callNameList(bus, "ListActivatableNames")
}
