import type { DBusCallable, DBusInterfaceInfo } from "./introspect"
import type { IntrospectedObject } from "./object"

export interface MethodMatch {
  iface: DBusInterfaceInfo
  method: DBusCallable
}

export function isInterfaceEmpty(
  iface: DBusInterfaceInfo,
  includeSignals: boolean,
): boolean {
  if (iface.methods.length > 0) return false
  return !includeSignals || iface.signals.length === 0
}

/**
 * Whether an object exposes nothing callable. With `recursive`, the whole
 * subtree below it must be empty as well.
 */
export async function isEmpty(
  object: IntrospectedObject,
  includeSignals: boolean,
  recursive: boolean,
): Promise<boolean> {
  const interfaces = await object.interfaces()
  if (!interfaces.every((iface) => isInterfaceEmpty(iface, includeSignals))) {
    return false
  }
  if (!recursive) return true

  for (const child of await object.children()) {
    if (!(await isEmpty(child, includeSignals, true))) {
      return false
    }
  }
  return true
}

/**
 * Objects of a subtree in display order: depth-first, each parent before its
 * children.
 *
 * With `hideEmpty`, a subtree without anything callable is dropped whole and
 * an object that is empty itself but has callable descendants is skipped
 * while its children are still listed.
 */
export async function listObjects(
  root: IntrospectedObject,
  hideEmpty: boolean,
  includeSignals: boolean,
): Promise<IntrospectedObject[]> {
  const objects: IntrospectedObject[] = []

  if (hideEmpty) {
    if (await isEmpty(root, includeSignals, true)) return objects
    if (!(await isEmpty(root, includeSignals, false))) objects.push(root)
  } else {
    objects.push(root)
  }

  for (const child of await root.children()) {
    objects.push(...(await listObjects(child, hideEmpty, includeSignals)))
  }
  return objects
}

/**
 * Find a method by bare name ("GetId") or by name qualified with its
 * interface ("org.freedesktop.DBus.GetId"). The first match in listing order
 * wins.
 */
export async function resolveMethod(
  object: IntrospectedObject,
  name: string,
): Promise<MethodMatch | null> {
  const separator = name.lastIndexOf(".")
  const ifaceName = separator === -1 ? null : name.slice(0, separator)
  const methodName = separator === -1 ? name : name.slice(separator + 1)

  for (const iface of await object.interfaces()) {
    if (ifaceName !== null && iface.name !== ifaceName) continue

    const method = iface.methods.find((m) => m.name === methodName)
    if (method) return { iface, method }
  }
  return null
}
