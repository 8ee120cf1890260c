/**
 * Object-name derivation from a managed-interface descriptor.
 *
 * The namespace comes from the descriptor and the "type" attribute always
 * carries the interface's simple name, overriding any caller-supplied "type".
 */

import { typeNameOf, type ManagedInterfaceDescriptor } from "./descriptor.js";
import { ManagementError } from "./errors.js";
import { ObjectName, isAttributeMap, type ObjectNameAttributes } from "./object-name.js";

const SERVICE_NAME = "mbeankit:naming";

export const TYPE_ATTRIBUTE = "type";

export function buildName(
  descriptor: ManagedInterfaceDescriptor | undefined,
  attributes?: ObjectNameAttributes,
): ObjectName;
export function buildName(
  descriptor: ManagedInterfaceDescriptor | undefined,
  key: string,
  value: string,
): ObjectName;
export function buildName(
  descriptor: ManagedInterfaceDescriptor | undefined,
  attributesOrKey?: ObjectNameAttributes | string,
  value?: string,
): ObjectName {
  if (!descriptor) {
    throw new ManagementError({
      code: "INVALID_ARGUMENT",
      message: `${SERVICE_NAME}:buildName - The interface descriptor is missing.`,
    });
  }

  const table = new Map<string, string>();
  if (typeof attributesOrKey === "string") {
    table.set(attributesOrKey, value ?? "");
  } else if (attributesOrKey && isAttributeMap(attributesOrKey)) {
    for (const [k, v] of attributesOrKey) table.set(k, v);
  } else if (attributesOrKey) {
    for (const [k, v] of Object.entries(attributesOrKey)) table.set(k, v);
  }
  table.set(TYPE_ATTRIBUTE, descriptor.name);

  try {
    return ObjectName.of(descriptor.namespace, table);
  } catch (err) {
    throw new ManagementError({
      code: "INVALID_ARGUMENT",
      message: `${SERVICE_NAME}:buildName - Unable to build the object name for ${typeNameOf(descriptor)}.`,
      cause: err,
    });
  }
}
