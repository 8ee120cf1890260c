/**
 * Dispatch abstraction for managed objects.
 *
 * A ManagedCaller has one generic entry point, `call(operation, args)`. It is
 * implemented over an open registry connection (ConnectionCaller) and over a
 * fresh remote connection per call (RemoteManagedCaller).
 * `createManagedProxy` puts a statically typed face on any caller.
 */

import {
  ManagementError,
  hasOperation,
  typeNameOf,
  type ManagedInterface,
  type ManagedInterfaceDescriptor,
  type ObjectName,
  type OperationName,
  type RegistryConnection,
} from "@mbeankit/core";

const SERVICE_NAME = "mbeankit-client:caller";

export interface ManagedCaller {
  call(operation: string, args: readonly unknown[]): Promise<unknown>;
}

/** T's operations, each returning a Promise of its result. */
export type ManagedProxy<T> = {
  readonly [K in keyof T as K extends OperationName<T> ? K : never]: T[K] extends (...args: infer A) => infer R
    ? (...args: A) => Promise<Awaited<R>>
    : never;
};

/**
 * Typed wrapper that forwards each declared operation to `caller.call`.
 *
 * Usage:
 *   const counter = createManagedProxy(Counter, caller);
 *   await counter.increment(2);
 *   // → caller.call("increment", [2])
 */
export function createManagedProxy<T extends object>(
  descriptor: ManagedInterface<T>,
  caller: ManagedCaller,
): ManagedProxy<T> {
  return new Proxy({} as ManagedProxy<T>, {
    get(target, property, receiver) {
      if (typeof property === "string" && hasOperation(descriptor, property)) {
        return (...args: unknown[]) => caller.call(property, args);
      }
      return Reflect.get(target, property, receiver);
    },
    has(target, property) {
      return (typeof property === "string" && hasOperation(descriptor, property)) || Reflect.has(target, property);
    },
  });
}

/** @throws ManagementError INVALID_ARGUMENT if the descriptor does not declare `operation` */
export function assertOperation(descriptor: ManagedInterfaceDescriptor, operation: string): void {
  if (!hasOperation(descriptor, operation)) {
    throw new ManagementError({
      code: "INVALID_ARGUMENT",
      message: `${SERVICE_NAME}:call - The interface ${typeNameOf(descriptor)} has no operation "${operation}".`,
    });
  }
}

/**
 * Caller bound to a registry connection and a name. Does no validation of its
 * own beyond the operation check; used in-process and, per call, as the call
 * target over a fresh remote connection.
 */
export class ConnectionCaller implements ManagedCaller {
  private readonly connection: RegistryConnection;
  private readonly name: ObjectName;
  private readonly descriptor: ManagedInterfaceDescriptor;

  constructor(connection: RegistryConnection, name: ObjectName, descriptor: ManagedInterfaceDescriptor) {
    this.connection = connection;
    this.name = name;
    this.descriptor = descriptor;
  }

  async call(operation: string, args: readonly unknown[]): Promise<unknown> {
    assertOperation(this.descriptor, operation);
    return this.connection.invoke(this.name, operation, args);
  }
}
