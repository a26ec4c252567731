import { readFile } from "fs/promises"
import yargs from "yargs"

import { parseArguments } from "./args"
import {
  type Bus,
  type ClosableBus,
  connectBus,
  invokeMethodAsync,
  listActivatableNames,
  listNames,
} from "./bus"
import { type BusType, ROOT_PATH } from "./constants"
import { UsageError } from "./errors"
import { pprintCallable } from "./format"
import {
  type DBusInterfaceInfo,
  fetchXMLAsync,
  processXMLAsync,
} from "./introspect"
import { IntrospectedObject } from "./object"
import { isEmpty, isInterfaceEmpty, listObjects, resolveMethod } from "./tree"
import { fromReply, renderValue } from "./values"

export interface CliOptions {
  bus: BusType
  signals: boolean
  unnamed: boolean
  activatable: boolean
  hideEmpty: boolean
  complete: boolean
  dump: boolean
  xml?: string
  positionals: string[]
}

export interface CliDeps {
  connect(type: BusType): ClosableBus
  readFile(path: string): Promise<string>
}

const defaultDeps: CliDeps = {
  connect: connectBus,
  readFile: (path) => readFile(path, "utf-8"),
}

const INDENT = "    "

// =============================================================================
// Argument parsing
// =============================================================================

/** Returns null when only help was asked for. */
export async function parseOptions(args: string[]): Promise<CliOptions | null> {
  const argv = await yargs(args)
    .scriptName("dbus-explore")
    .usage(
      "$0 [options] [service] [path] [method] [args..]\n\n"
        + "Lists services, lists the objects of a service, describes an object\n"
        + "or calls a method, depending on how many positionals are given.\n"
        + "Negative numbers pass as method arguments; put -- before arguments\n"
        + "that otherwise start with a dash.",
    )
    .parserConfiguration({ "parse-positional-numbers": false })
    .option("bus", {
      type: "string",
      choices: ["session", "system"] as const,
      default: "session",
      description: "D-Bus to connect to",
    })
    .option("system", {
      alias: "y",
      type: "boolean",
      default: false,
      description: "Shorthand for --bus system",
    })
    .option("signals", {
      alias: "s",
      type: "boolean",
      default: false,
      description: "Show signals",
    })
    .option("unnamed", {
      alias: "u",
      type: "boolean",
      default: false,
      description: "Show unique (unnamed) peer names",
    })
    .option("activatable", {
      alias: "a",
      type: "boolean",
      default: false,
      description: "Show activatable services",
    })
    .option("hide-empty", {
      alias: "e",
      type: "boolean",
      default: false,
      description: "Hide services, objects and interfaces with nothing to call",
    })
    .option("complete", {
      type: "boolean",
      default: false,
      description: "Print completion candidates for the next positional",
    })
    .option("dump", {
      type: "boolean",
      default: false,
      description: "Dump the raw introspection XML of an object and exit",
    })
    .option("xml", {
      type: "string",
      description: "Describe interfaces from an XML file instead of D-Bus",
    })
    .check((argv) => {
      if (argv.dump && argv._.length < 2) {
        throw new Error("--dump requires a service and an object path")
      }
      if (argv.xml !== undefined && argv._.length > 2) {
        throw new Error("--xml can only be used to describe interfaces")
      }
      return true
    })
    // Positionals are free-form, so only options are checked
    .strictOptions()
    .help()
    .alias("help", "h")
    .version(false)
    .exitProcess(false)
    .fail((message, error) => {
      throw new UsageError(error ? error.message : message)
    })
    .parseAsync()

  if ("help" in argv && argv.help) return null

  return {
    bus: argv.system || argv.bus === "system" ? "system" : "session",
    signals: argv.signals,
    unnamed: argv.unnamed,
    activatable: argv.activatable,
    hideEmpty: argv["hide-empty"],
    complete: argv.complete,
    dump: argv.dump,
    xml: argv.xml,
    positionals: argv._.map(String),
  }
}

// =============================================================================
// Modes
// =============================================================================

export async function listServices(
  bus: Bus,
  options: CliOptions,
): Promise<string[]> {
  let names = await listNames(bus)
  if (options.activatable) {
    names = names.concat(await listActivatableNames(bus))
  }
  if (!options.unnamed) {
    names = names.filter((name) => !name.startsWith(":"))
  }

  const unique = [...new Set(names)].sort()
  if (!options.hideEmpty) return unique

  const shown: string[] = []
  for (const name of unique) {
    const root = new IntrospectedObject(bus, name, ROOT_PATH)
    if (!(await isEmpty(root, options.signals, true))) {
      shown.push(name)
    }
  }
  return shown
}

export async function listObjectPaths(
  bus: Bus,
  service: string,
  options: CliOptions,
): Promise<string[]> {
  const root = new IntrospectedObject(bus, service, ROOT_PATH)
  const objects = await listObjects(root, options.hideEmpty, options.signals)
  return objects.map((object) => object.path)
}

export function describeInterfaces(
  interfaces: DBusInterfaceInfo[],
  options: CliOptions,
): string[] {
  const lines: string[] = []
  for (const iface of interfaces) {
    if (options.hideEmpty && isInterfaceEmpty(iface, options.signals)) continue

    lines.push(iface.name)
    for (const method of iface.methods) {
      lines.push(INDENT + pprintCallable(method))
    }
    if (options.signals) {
      for (const signal of iface.signals) {
        lines.push(INDENT + pprintCallable(signal))
      }
    }
  }
  return lines
}

async function callMethod(
  bus: Bus,
  service: string,
  path: string,
  name: string,
  rawArgs: string[],
): Promise<string | null> {
  const object = new IntrospectedObject(bus, service, path)
  const match = await resolveMethod(object, name)
  if (!match) {
    throw new UsageError(`Method "${name}" not found on ${service} ${path}`)
  }

  const { iface, method } = match
  const signature = method.inArgs.map((arg) => arg.signature).join("")
  const body = await invokeMethodAsync(bus, {
    service,
    path,
    iface: iface.name,
    method: method.name,
    signature,
    args: parseArguments(signature, rawArgs),
  })

  const outSignature = method.outArgs.map((arg) => arg.signature).join("")
  const value = fromReply(outSignature, body)
  return value ? renderValue(value) : null
}

async function complete(bus: Bus, options: CliOptions): Promise<string[]> {
  const [service, path] = options.positionals
  if (service === undefined) return listServices(bus, options)
  if (path === undefined) return listObjectPaths(bus, service, options)
  if (options.positionals.length > 2) return []

  const object = new IntrospectedObject(bus, service, path)
  const candidates: string[] = []
  for (const iface of await object.interfaces()) {
    for (const method of iface.methods) {
      candidates.push(`${iface.name}.${method.name}`)
    }
  }
  return candidates
}

async function dispatch(bus: Bus, options: CliOptions): Promise<number> {
  if (options.complete) {
    for (const candidate of await complete(bus, options)) {
      console.log(candidate)
    }
    return 0
  }

  const [service, path, method, ...rawArgs] = options.positionals

  if (service === undefined) {
    for (const name of await listServices(bus, options)) {
      console.log(name)
    }
    return 0
  }

  if (path === undefined) {
    for (const objectPath of await listObjectPaths(bus, service, options)) {
      console.log(objectPath)
    }
    return 0
  }

  if (options.dump) {
    console.log(await fetchXMLAsync(bus, service, path))
    return 0
  }

  if (method === undefined) {
    const object = new IntrospectedObject(bus, service, path)
    const interfaces = await object.interfaces()
    const error = object.introspectionError
    if (error) {
      console.error(`Cannot introspect ${service} ${path}: ${error.message}`)
      return 1
    }
    for (const line of describeInterfaces(interfaces, options)) {
      console.log(line)
    }
    return 0
  }

  const result = await callMethod(bus, service, path, method, rawArgs)
  if (result !== null) {
    console.log(result)
  }
  return 0
}

// =============================================================================
// Entry point
// =============================================================================

export async function run(
  args: string[],
  deps: CliDeps = defaultDeps,
): Promise<number> {
  let bus: ClosableBus | null = null

  try {
    const options = await parseOptions(args)
    if (!options) return 0

    if (options.xml !== undefined) {
      const { interfaces } = await processXMLAsync(
        await deps.readFile(options.xml),
      )
      for (const line of describeInterfaces(interfaces, options)) {
        console.log(line)
      }
      return 0
    }

    bus = deps.connect(options.bus)
    return await dispatch(bus, options)
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message)
      console.error("Run with --help for usage.")
      return 2
    }
    console.error(
      `Error: ${error instanceof Error ? error.message : String(error)}`,
    )
    return 1
  } finally {
    bus?.close()
  }
}
