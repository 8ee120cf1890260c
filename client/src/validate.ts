/**
 * Managed-object validation against a registry connection.
 *
 * Descriptor checks run first and never touch the registry, so a malformed call
 * fails before any network access. Registry lookups follow; a not-found reported
 * during the instance-of check (the object was unregistered in between) maps to
 * the same INVALID_ARGUMENT as an unregistered name.
 */

import {
  ManagementError,
  errorMessage,
  isManagementError,
  isManagedInterface,
  isRegistryError,
  typeNameOf,
  type ManagedInterfaceDescriptor,
  type ObjectName,
  type RegistryConnection,
} from "@mbeankit/core";

const SERVICE_NAME = "mbeankit-client:validate";

/**
 * @throws ManagementError INVALID_ARGUMENT if the descriptor is missing or is not a managed interface
 */
export function assertManagedInterface(
  descriptor: ManagedInterfaceDescriptor | undefined,
): asserts descriptor is ManagedInterfaceDescriptor {
  if (!descriptor) {
    throw new ManagementError({
      code: "INVALID_ARGUMENT",
      message: `${SERVICE_NAME}:validate - The interface descriptor is missing.`,
    });
  }
  if (!isManagedInterface(descriptor)) {
    throw new ManagementError({
      code: "INVALID_ARGUMENT",
      message: `${SERVICE_NAME}:validate - The interface ${typeNameOf(descriptor)} is not a managed interface.`,
    });
  }
}

/**
 * Confirm `name` is registered on `connection` as an instance of `descriptor`.
 *
 * @throws ManagementError INVALID_ARGUMENT for a bad descriptor, an unregistered name or a wrong type
 * @throws ManagementError OPERATION_FAILED if the registry lookup itself fails
 */
export async function validate(
  descriptor: ManagedInterfaceDescriptor | undefined,
  name: ObjectName,
  connection: RegistryConnection,
): Promise<void> {
  assertManagedInterface(descriptor);

  const typeName = typeNameOf(descriptor);
  const canonical = name.canonicalName;

  try {
    if (!(await connection.isRegistered(name))) {
      throw new ManagementError({
        code: "INVALID_ARGUMENT",
        message: `${SERVICE_NAME}:validate - The object name ${canonical} is not registered.`,
      });
    }

    if (!(await connection.isInstanceOf(name, typeName))) {
      throw new ManagementError({
        code: "INVALID_ARGUMENT",
        message: `${SERVICE_NAME}:validate - The object name ${canonical} is not an instance of the interface ${typeName}.`,
      });
    }
  } catch (err) {
    if (isManagementError(err)) throw err;
    if (isRegistryError(err, "INSTANCE_NOT_FOUND")) {
      throw new ManagementError({
        code: "INVALID_ARGUMENT",
        message: `${SERVICE_NAME}:validate - The object name ${canonical} is not found.`,
        cause: err,
      });
    }
    throw new ManagementError({
      code: "OPERATION_FAILED",
      message: `${SERVICE_NAME}:validate - Unable to validate the managed object for interface ${typeName} and object name ${canonical}: ${errorMessage(err)}`,
      cause: err,
    });
  }
}
