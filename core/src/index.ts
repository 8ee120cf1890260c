// Errors
export * from "./errors.js";

// Object names & naming
export { ObjectName, ObjectNameError, isAttributeMap, type ObjectNameAttributes } from "./object-name.js";
export { buildName, TYPE_ATTRIBUTE } from "./naming.js";

// Managed-interface descriptors
export {
  defineManagedInterface,
  typeNameOf,
  isManagedInterface,
  hasOperation,
  ManagedInterfaceSchema,
  type ManagedInterface,
  type ManagedInterfaceDescriptor,
  type OperationName,
} from "./descriptor.js";

// Registry contract & in-process registry
export type { RegistryConnection, RemoteRegistryConnection, RegisteredBean } from "./registry.js";
export { LocalRegistry, platformRegistry } from "./local-registry.js";

// Wire protocol (NATS registry request/response)
export * from "./wire.js";

// Logging
export * from "./logger.js";
