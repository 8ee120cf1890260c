/**
 * Managed-object helpers: register and unregister against the in-process
 * registry, and look objects up locally or remotely as typed proxies.
 */

import {
  ManagementError,
  ObjectName,
  buildName,
  isManagementError,
  isRegistryError,
  platformRegistry,
  typeNameOf,
  type LocalRegistry,
  type ManagedInterface,
  type ManagedInterfaceDescriptor,
  type ObjectNameAttributes,
} from "@mbeankit/core";
import { ConnectionCaller, createManagedProxy, type ManagedProxy } from "./caller.js";
import type { ConfigSource } from "./config.js";
import { implementations as defaultImplementations, type ImplementationRegistry } from "./implementations.js";
import { createRemoteProxy, type RemoteProxyOptions } from "./remote-proxy.js";
import { validate } from "./validate.js";

const SERVICE_NAME = "mbeankit-client:beans";

export interface LocalOptions {
  /** Registry to work against. Default: platformRegistry() */
  registry?: LocalRegistry;
}

export interface RegisterOptions extends LocalOptions {
  /** Where implementations are looked up. Default: the process-wide registry */
  implementations?: ImplementationRegistry;
}

/**
 * Register the single implementation of `descriptor`.
 *
 * The name is `nameOrAttributes` when it is an ObjectName, otherwise it is built
 * from the descriptor and the given attributes. Registering an already
 * registered name is a no-op that returns the name.
 *
 * @throws ManagementError INVALID_ARGUMENT for a missing descriptor, a malformed name, or not exactly one implementation
 * @throws ManagementError OPERATION_FAILED if the registry rejects the registration
 */
export async function register(
  descriptor: ManagedInterfaceDescriptor | undefined,
  nameOrAttributes?: ObjectName | ObjectNameAttributes,
  options?: RegisterOptions,
): Promise<ObjectName> {
  if (!descriptor) {
    throw new ManagementError({
      code: "INVALID_ARGUMENT",
      message: `${SERVICE_NAME}:register - The interface descriptor is missing.`,
    });
  }

  const name = nameOrAttributes instanceof ObjectName ? nameOrAttributes : buildName(descriptor, nameOrAttributes);
  const registry = options?.registry ?? platformRegistry();
  const impls = options?.implementations ?? defaultImplementations;

  try {
    if (await registry.isRegistered(name)) return name;
    return registry.registerObject(impls.resolve(descriptor), name, [descriptor]);
  } catch (err) {
    if (isManagementError(err)) throw err;
    // Lost a race with a concurrent registration under the same name.
    if (isRegistryError(err, "INSTANCE_ALREADY_EXISTS")) return name;
    throw new ManagementError({
      code: "OPERATION_FAILED",
      message: `${SERVICE_NAME}:register - Unable to register ${typeNameOf(descriptor)} as ${name.canonicalName}.`,
      cause: err,
    });
  }
}

/**
 * Remove the registration under `name`; no-op when nothing is registered.
 *
 * @throws ManagementError OPERATION_FAILED if the registry rejects the removal
 */
export async function unregister(name: ObjectName, options?: LocalOptions): Promise<void> {
  const registry = options?.registry ?? platformRegistry();
  try {
    if (await registry.isRegistered(name)) {
      registry.unregisterObject(name);
    }
  } catch (err) {
    if (isRegistryError(err, "INSTANCE_NOT_FOUND")) return;
    throw new ManagementError({
      code: "OPERATION_FAILED",
      message: `${SERVICE_NAME}:unregister - Unable to unregister ${name.canonicalName}.`,
      cause: err,
    });
  }
}

/**
 * Typed proxy over an object in the local registry. The name defaults to the
 * one built from the descriptor.
 *
 * @throws ManagementError INVALID_ARGUMENT / OPERATION_FAILED per validation
 */
export async function getLocalBean<T extends object>(
  descriptor: ManagedInterface<T>,
  name?: ObjectName,
  options?: LocalOptions,
): Promise<ManagedProxy<T>> {
  const objectName = name ?? buildName(descriptor);
  const registry = options?.registry ?? platformRegistry();
  await validate(descriptor, objectName, registry);
  return createManagedProxy(descriptor, new ConnectionCaller(registry, objectName, descriptor));
}

/**
 * Typed proxy over an object in a remote registry. The name defaults to the one
 * built from the descriptor.
 */
export async function getRemoteBean<T extends object>(
  descriptor: ManagedInterface<T>,
  source: ConfigSource,
  options?: RemoteProxyOptions & { name?: ObjectName },
): Promise<ManagedProxy<T>> {
  return createRemoteProxy(descriptor, options?.name ?? buildName(descriptor), source, options);
}
