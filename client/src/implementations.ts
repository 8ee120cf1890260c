/**
 * Registry of managed-object implementations. Maps an interface's type name to
 * the factories that can build an implementation of it; `register` needs
 * exactly one.
 */

import { ManagementError, typeNameOf, type ManagedInterface, type ManagedInterfaceDescriptor } from "@mbeankit/core";

const SERVICE_NAME = "mbeankit-client:implementations";

export type ImplementationFactory<T extends object = object> = () => T;

export class ImplementationRegistry {
  private factories: Map<string, ImplementationFactory[]> = new Map();

  /**
   * Add a factory for the interface. Providing two factories for the same
   * interface is allowed here; resolving it is not.
   */
  provide<T extends object>(descriptor: ManagedInterface<T>, factory: ImplementationFactory<T>): this {
    const typeName = typeNameOf(descriptor);
    const list = this.factories.get(typeName) ?? [];
    list.push(factory);
    this.factories.set(typeName, list);
    return this;
  }

  /**
   * Build the single implementation of the interface.
   *
   * @throws ManagementError INVALID_ARGUMENT when no factory or more than one is provided
   */
  resolve(descriptor: ManagedInterfaceDescriptor): object {
    const typeName = typeNameOf(descriptor);
    const list = this.factories.get(typeName) ?? [];
    if (list.length === 0) {
      throw new ManagementError({
        code: "INVALID_ARGUMENT",
        message: `${SERVICE_NAME}:resolve - No managed object implementation found for ${typeName}.`,
      });
    }
    if (list.length > 1) {
      throw new ManagementError({
        code: "INVALID_ARGUMENT",
        message: `${SERVICE_NAME}:resolve - More than one managed object implementation found for ${typeName}.`,
        details: { count: list.length },
      });
    }
    return list[0]();
  }

  count(descriptor: ManagedInterfaceDescriptor): number {
    return this.factories.get(typeNameOf(descriptor))?.length ?? 0;
  }

  /** Clear all factories (e.g. between tests). */
  clear(): void {
    this.factories.clear();
  }
}

/** Process-wide implementation registry, populated at startup. */
export const implementations = new ImplementationRegistry();
