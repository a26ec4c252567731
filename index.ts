export {
  type AtomicTypeCode,
  type DBusTypeCode,
  type SignatureNode,
  parseSignature,
  stringifyNode,
} from "./lib/signature"

export {
  formatNode,
  formatSignature,
  pprintArgument,
  pprintCallable,
} from "./lib/format"

export {
  type CallableKind,
  type DBusArgument,
  type DBusCallable,
  type DBusInterfaceInfo,
  type IntrospectResult,
  fetchXML,
  fetchXMLAsync,
  introspectBus,
  introspectBusAsync,
  joinPath,
  processXML,
  processXMLAsync,
} from "./lib/introspect"

export {
  type Bus,
  type ClosableBus,
  type DBusCallback,
  type DBusMessage,
  type MethodCall,
  connectBus,
  invokeMethod,
  invokeMethodAsync,
  listActivatableNames,
  listNames,
} from "./lib/bus"

export { IntrospectedObject } from "./lib/object"

export {
  type MethodMatch,
  isEmpty,
  isInterfaceEmpty,
  listObjects,
  resolveMethod,
} from "./lib/tree"

export {
  type DisplayValue,
  type Scalar,
  fromReply,
  renderValue,
  toDisplayValue,
} from "./lib/values"

export { coerceValue, evaluateArgument, parseArguments } from "./lib/args"

export { type BusType, busTypes } from "./lib/constants"

export { ArgumentError, DBusError, SignatureError, UsageError } from "./lib/errors"

export { run } from "./lib/cli"
