/**
 * Registry connection contract.
 *
 * The client consumes exactly these operations, whether the registry lives in
 * this process (LocalRegistry) or behind a network connection.
 */

import type { ObjectName } from "./object-name.js";

export interface RegisteredBean {
  typeName: string;
  name: ObjectName;
}

export interface RegistryConnection {
  isRegistered(name: ObjectName): Promise<boolean>;
  /** @throws RegistryError INSTANCE_NOT_FOUND when nothing is registered under `name` */
  isInstanceOf(name: ObjectName, typeName: string): Promise<boolean>;
  queryAll(): Promise<RegisteredBean[]>;
  /** Errors raised by the managed object itself are rethrown unchanged. */
  invoke(name: ObjectName, operation: string, args: readonly unknown[]): Promise<unknown>;
}

/** A connection to a remote registry; owned by the operation that opened it. */
export interface RemoteRegistryConnection extends RegistryConnection {
  close(): Promise<void>;
}
