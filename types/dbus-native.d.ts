// dbus-native ships no type declarations
declare module "dbus-native" {
  import { EventEmitter } from "events"

  export interface InvokeMessage {
    destination?: string
    path?: string
    interface?: string
    member?: string
    signature?: string
    body?: unknown[]
  }

  /** Error replies carry the D-Bus error name and the reply body */
  export interface NativeError {
    name: string
    message: unknown
  }

  export interface ReplyContext {
    signature?: string
  }

  export type InvokeCallback = (
    this: ReplyContext,
    error: NativeError | null | undefined,
    ...body: unknown[]
  ) => void

  export class BusConnection extends EventEmitter {
    end(): void
  }

  export class MessageBus {
    connection: BusConnection
    invoke(message: InvokeMessage, callback: InvokeCallback): void
  }

  export interface BusOptions {
    busAddress?: string
  }

  export function sessionBus(options?: BusOptions): MessageBus
  export function systemBus(): MessageBus
}
