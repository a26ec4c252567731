import type { Bus } from "./bus"
import {
  type DBusInterfaceInfo,
  type IntrospectResult,
  introspectBusAsync,
  joinPath,
} from "./introspect"

type FetchState =
  | { status: "unfetched" }
  | { status: "fetched"; result: IntrospectResult }
  | { status: "failed"; error: Error }

/**
 * An object exported by a bus service.
 *
 * Construction only records where the object lives. The introspection call
 * is issued on the first read of `interfaces()` or `children()` and its
 * outcome is kept for the lifetime of the instance. An object that cannot be
 * introspected reads as having no interfaces and no children; the reason is
 * available from `introspectionError`.
 */
export class IntrospectedObject {
  readonly bus: Bus
  readonly service: string
  readonly path: string

  private state: FetchState = { status: "unfetched" }
  private fetching: Promise<void> | null = null
  private childObjects: IntrospectedObject[] | null = null

  constructor(bus: Bus, service: string, path: string) {
    this.bus = bus
    this.service = service
    this.path = path
  }

  get fetched(): boolean {
    return this.state.status !== "unfetched"
  }

  get introspectionError(): Error | null {
    return this.state.status === "failed" ? this.state.error : null
  }

  async interfaces(): Promise<DBusInterfaceInfo[]> {
    const result = await this.fetch()
    return result ? result.interfaces : []
  }

  async children(): Promise<IntrospectedObject[]> {
    if (this.childObjects) return this.childObjects

    const result = await this.fetch()
    const nodes = result ? result.nodes : []
    this.childObjects = nodes.map(
      (node) =>
        new IntrospectedObject(this.bus, this.service, joinPath(this.path, node)),
    )
    return this.childObjects
  }

  private async fetch(): Promise<IntrospectResult | null> {
    if (this.state.status === "unfetched") {
      this.fetching ??= this.populate()
      await this.fetching
    }
    return this.state.status === "fetched" ? this.state.result : null
  }

  private async populate(): Promise<void> {
    try {
      const result = await introspectBusAsync(this.bus, this.service, this.path)
      this.state = { status: "fetched", result }
    } catch (error) {
      this.state = {
        status: "failed",
        error: error instanceof Error ? error : new Error(String(error)),
      }
    }
  }
}
