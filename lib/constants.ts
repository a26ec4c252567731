// Well-known names of the message bus itself
export const BUS_SERVICE = "org.freedesktop.DBus" as const
export const BUS_PATH = "/org/freedesktop/DBus" as const
export const BUS_INTERFACE = "org.freedesktop.DBus" as const

export const INTROSPECTABLE_INTERFACE =
  "org.freedesktop.DBus.Introspectable" as const

export const ROOT_PATH = "/" as const

export const errorNames = {
  failed: "org.freedesktop.DBus.Error.Failed",
  invalidArgs: "org.freedesktop.DBus.Error.InvalidArgs",
  invalidXml: "org.freedesktop.DBus.Error.InvalidXml",
  invalidSignature: "org.freedesktop.DBus.Error.InvalidSignature",
} as const

export type ErrorName = (typeof errorNames)[keyof typeof errorNames]

export const busTypes = ["session", "system"] as const

export type BusType = (typeof busTypes)[number]
