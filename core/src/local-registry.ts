/**
 * In-process management registry.
 *
 * Holds name → managed object bindings for this process. `platformRegistry()` is
 * the process-wide instance used when callers do not pass their own; the agent
 * serves one of these over NATS.
 */

import { hasOperation, typeNameOf, type ManagedInterfaceDescriptor } from "./descriptor.js";
import { RegistryError } from "./errors.js";
import type { ObjectName } from "./object-name.js";
import type { RegisteredBean, RegistryConnection } from "./registry.js";

const SERVICE_NAME = "mbeankit:local-registry";

interface Registration {
  name: ObjectName;
  object: object;
  interfaces: readonly ManagedInterfaceDescriptor[];
}

export class LocalRegistry implements RegistryConnection {
  private beans: Map<string, Registration> = new Map();

  /**
   * Bind `object` under `name` as an implementation of `interfaces`.
   *
   * @returns the name the object was registered under
   * @throws RegistryError INSTANCE_ALREADY_EXISTS if the name is taken
   */
  registerObject(object: object, name: ObjectName, interfaces: readonly ManagedInterfaceDescriptor[]): ObjectName {
    const key = name.canonicalName;
    if (this.beans.has(key)) {
      throw new RegistryError({
        code: "INSTANCE_ALREADY_EXISTS",
        message: `${SERVICE_NAME}:registerObject - ${key} is already registered`,
      });
    }
    this.beans.set(key, { name, object, interfaces: [...interfaces] });
    return name;
  }

  /** @throws RegistryError INSTANCE_NOT_FOUND if nothing is registered under `name` */
  unregisterObject(name: ObjectName): void {
    if (!this.beans.delete(name.canonicalName)) {
      throw notFound("unregisterObject", name);
    }
  }

  async isRegistered(name: ObjectName): Promise<boolean> {
    return this.beans.has(name.canonicalName);
  }

  async isInstanceOf(name: ObjectName, typeName: string): Promise<boolean> {
    const registration = this.lookup("isInstanceOf", name);
    return registration.interfaces.some((descriptor) => typeNameOf(descriptor) === typeName);
  }

  async queryAll(): Promise<RegisteredBean[]> {
    const result: RegisteredBean[] = [];
    for (const registration of this.beans.values()) {
      for (const descriptor of registration.interfaces) {
        result.push({ typeName: typeNameOf(descriptor), name: registration.name });
      }
    }
    return result;
  }

  async invoke(name: ObjectName, operation: string, args: readonly unknown[]): Promise<unknown> {
    const registration = this.lookup("invoke", name);
    const declared = registration.interfaces.some((descriptor) => hasOperation(descriptor, operation));
    const method: unknown = Reflect.get(registration.object, operation);
    if (!declared || typeof method !== "function") {
      throw new RegistryError({
        code: "OPERATION_NOT_FOUND",
        message: `${SERVICE_NAME}:invoke - ${name.canonicalName} has no operation "${operation}"`,
      });
    }
    return await Reflect.apply(method, registration.object, [...args]);
  }

  get size(): number {
    return this.beans.size;
  }

  private lookup(method: string, name: ObjectName): Registration {
    const registration = this.beans.get(name.canonicalName);
    if (!registration) throw notFound(method, name);
    return registration;
  }
}

function notFound(method: string, name: ObjectName): RegistryError {
  return new RegistryError({
    code: "INSTANCE_NOT_FOUND",
    message: `${SERVICE_NAME}:${method} - ${name.canonicalName} is not registered`,
  });
}

let platform: LocalRegistry | undefined;

/** The process-wide registry. */
export function platformRegistry(): LocalRegistry {
  platform ??= new LocalRegistry();
  return platform;
}
