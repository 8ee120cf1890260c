/**
 * @mbeankit/client
 *
 * Register, look up and invoke managed objects in the local registry or in a
 * remote registry reached over NATS.
 */

// Local registration & lookup
export {
  register,
  unregister,
  getLocalBean,
  getRemoteBean,
  type LocalOptions,
  type RegisterOptions,
} from "./beans.js";
export { ImplementationRegistry, implementations, type ImplementationFactory } from "./implementations.js";

// Remote proxies
export {
  createRemoteProxy,
  createRemoteCaller,
  listRemoteBeans,
  RemoteManagedCaller,
  type RemoteProxyOptions,
} from "./remote-proxy.js";

// Dispatch
export {
  createManagedProxy,
  ConnectionCaller,
  assertOperation,
  type ManagedCaller,
  type ManagedProxy,
} from "./caller.js";

// Validation
export { validate, assertManagedInterface } from "./validate.js";

// Connection lifecycle
export { connect, close, withConnection, type RegistryConnector } from "./connection.js";

// Endpoint & config
export {
  readEndpoint,
  describeEndpoint,
  formatServiceUrl,
  parseServiceUrl,
  type Endpoint,
  type ParsedServiceUrl,
} from "./endpoint.js";
export {
  defaultManagementClientConfig,
  resolveClientConfig,
  loadEndpointSource,
  ENDPOINT_KEYS,
  ENDPOINT_ENV_VARS,
  HOST_KEY,
  PORT_KEY,
  LOGIN_KEY,
  PASSWORD_KEY,
  type ManagementClientConfig,
  type ResolvedClientConfig,
  type ConfigSource,
} from "./config.js";

// Transport
export {
  NatsRegistryConnection,
  NatsRegistryConnector,
  type RequestClient,
  type NatsConnectFn,
} from "./transport/nats-registry.js";

// Re-export core types for convenience
export {
  ObjectName,
  ManagementError,
  RegistryError,
  buildName,
  defineManagedInterface,
  type ManagedInterface,
  type ManagedInterfaceDescriptor,
} from "@mbeankit/core";
