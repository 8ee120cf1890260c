/**
 * Managed-interface descriptors.
 *
 * A descriptor stands in for the interface a managed object exposes: where it
 * lives (namespace), what it is called, and which operations a proxy may forward.
 * The generic parameter ties `operations` to the TypeScript interface so that
 * typed proxies only expose real methods.
 */

import { z } from "zod";

/** Method names of T, as strings. */
export type OperationName<T> = {
  [K in keyof T]: T[K] extends (...args: never[]) => unknown ? K : never;
}[keyof T] & string;

/** Untyped view of a managed interface; what registries and validation work with. */
export interface ManagedInterfaceDescriptor {
  /** Dotted namespace the interface belongs to, e.g. "org.example" */
  readonly namespace: string;
  /** Simple interface name, e.g. "ThingMXBean" */
  readonly name: string;
  /** Operations a proxy forwards */
  readonly operations: readonly string[];
  /**
   * Explicit managed-interface flag. When omitted, names ending in "MXBean"
   * are managed interfaces; `false` opts such a name out.
   */
  readonly mxbean?: boolean;
}

export interface ManagedInterface<T extends object> extends ManagedInterfaceDescriptor {
  readonly operations: readonly OperationName<T>[];
  /** Never set; lets proxies infer T from the descriptor. */
  readonly __interface?: T;
}

const IDENTIFIER_RE = /^[A-Za-z_$][A-Za-z0-9_$]*$/;
const NAMESPACE_RE = /^([A-Za-z_$][A-Za-z0-9_$]*(\.[A-Za-z_$][A-Za-z0-9_$]*)*)?$/;
const MXBEAN_SUFFIX = "MXBean";

export const ManagedInterfaceSchema = z.object({
  namespace: z.string().regex(NAMESPACE_RE),
  name: z.string().regex(IDENTIFIER_RE),
  operations: z.array(z.string().regex(IDENTIFIER_RE)),
  mxbean: z.boolean().optional(),
});

/**
 * Declare a descriptor for interface T.
 *
 * Usage:
 *   const Counter = defineManagedInterface<CounterMXBean>({
 *     namespace: "org.example",
 *     name: "CounterMXBean",
 *     operations: ["increment", "getCount"],
 *   });
 */
export function defineManagedInterface<T extends object>(definition: ManagedInterface<T>): ManagedInterface<T> {
  return Object.freeze({ ...definition, operations: Object.freeze([...definition.operations]) });
}

/** Fully qualified type name, used for instance-of checks against a registry. */
export function typeNameOf(descriptor: ManagedInterfaceDescriptor): string {
  return descriptor.namespace ? `${descriptor.namespace}.${descriptor.name}` : descriptor.name;
}

/** Whether the descriptor satisfies the managed-interface convention. */
export function isManagedInterface(descriptor: ManagedInterfaceDescriptor): boolean {
  if (!ManagedInterfaceSchema.safeParse(descriptor).success) return false;
  if (descriptor.mxbean !== undefined) return descriptor.mxbean;
  return descriptor.name.endsWith(MXBEAN_SUFFIX);
}

export function hasOperation(descriptor: ManagedInterfaceDescriptor, operation: string): boolean {
  return descriptor.operations.some((op) => op === operation);
}
