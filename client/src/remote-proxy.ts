/**
 * Remote managed-object proxies.
 *
 * Creating a proxy reads the endpoint, checks the descriptor, and runs one
 * connect → validate → close preflight so a bad interface/name/endpoint
 * combination fails at creation time. The proxy then keeps only the immutable
 * (descriptor, name, endpoint) triple: every call opens its own connection,
 * forwards one operation and closes the connection again. Calls are not
 * revalidated; a name unregistered after creation surfaces as the registry's
 * own invocation error.
 */

import {
  ManagementError,
  isManagementError,
  resolveLogger,
  typeNameOf,
  type Logger,
  type LoggerFactory,
  type ManagedInterface,
  type ManagedInterfaceDescriptor,
  type ObjectName,
  type RegisteredBean,
} from "@mbeankit/core";
import { assertOperation, ConnectionCaller, createManagedProxy, type ManagedCaller, type ManagedProxy } from "./caller.js";
import type { ConfigSource, ManagementClientConfig } from "./config.js";
import { withConnection, type RegistryConnector } from "./connection.js";
import { describeEndpoint, readEndpoint, type Endpoint } from "./endpoint.js";
import { NatsRegistryConnector } from "./transport/nats-registry.js";
import { assertManagedInterface, validate } from "./validate.js";

const SERVICE_NAME = "mbeankit-client:remote-proxy";

export interface RemoteProxyOptions {
  /** Connector to dial the endpoint with. Default: NatsRegistryConnector built from `config` */
  connector?: RegistryConnector;
  config?: ManagementClientConfig;
  loggerFactory?: LoggerFactory;
}

/**
 * Per-call dispatch over a fresh connection:
 * connect → call target bound to (connection, name, descriptor) → invoke → close.
 * Errors from the call target reach the caller unchanged.
 */
export class RemoteManagedCaller implements ManagedCaller {
  readonly descriptor: ManagedInterfaceDescriptor;
  readonly name: ObjectName;
  private readonly endpoint: Endpoint;
  private readonly connector: RegistryConnector;
  private readonly log: Logger;

  constructor(params: {
    descriptor: ManagedInterfaceDescriptor;
    name: ObjectName;
    endpoint: Endpoint;
    connector: RegistryConnector;
    log?: Logger;
  }) {
    this.descriptor = params.descriptor;
    this.name = params.name;
    this.endpoint = Object.freeze({ ...params.endpoint });
    this.connector = params.connector;
    this.log = params.log ?? console;
  }

  async call(operation: string, args: readonly unknown[]): Promise<unknown> {
    assertOperation(this.descriptor, operation);
    return withConnection(
      this.connector,
      this.endpoint,
      (connection) => new ConnectionCaller(connection, this.name, this.descriptor).call(operation, args),
      this.log,
    );
  }
}

/**
 * Read the endpoint, preflight, and return the untyped caller.
 *
 * @throws ManagementError INVALID_ARGUMENT for a missing endpoint key, a bad descriptor or a failed validation
 * @throws ManagementError OPERATION_FAILED if the preflight cannot connect or the registry lookup fails
 */
export async function createRemoteCaller(
  descriptor: ManagedInterfaceDescriptor,
  name: ObjectName,
  source: ConfigSource,
  options?: RemoteProxyOptions,
): Promise<RemoteManagedCaller> {
  const endpoint = readEndpoint(source);
  assertManagedInterface(descriptor);

  const log = resolveLogger(options?.loggerFactory, SERVICE_NAME);
  const connector = options?.connector ?? defaultConnector(options);

  try {
    await withConnection(connector, endpoint, (connection) => validate(descriptor, name, connection), log);
  } catch (err) {
    if (!isManagementError(err, "CONNECT_FAILED")) throw err;
    throw new ManagementError({
      code: "OPERATION_FAILED",
      message: `${SERVICE_NAME}:createRemoteCaller - Unable to create the proxy for interface ${typeNameOf(descriptor)} and object name ${name.canonicalName}.`,
      details: describeEndpoint(endpoint),
      cause: err,
    });
  }

  log.debug?.(
    { typeName: typeNameOf(descriptor), name: name.canonicalName, ...describeEndpoint(endpoint) },
    `${SERVICE_NAME}:createRemoteCaller - Preflight passed`,
  );
  return new RemoteManagedCaller({ descriptor, name, endpoint, connector, log });
}

/**
 * Typed remote proxy for `descriptor` registered under `name` at the endpoint in `source`.
 *
 * Usage:
 *   const counter = await createRemoteProxy(Counter, name, { host, port, login, password });
 *   await counter.increment(1);
 */
export async function createRemoteProxy<T extends object>(
  descriptor: ManagedInterface<T>,
  name: ObjectName,
  source: ConfigSource,
  options?: RemoteProxyOptions,
): Promise<ManagedProxy<T>> {
  const caller = await createRemoteCaller(descriptor, name, source, options);
  return createManagedProxy(descriptor, caller);
}

/** Every (typeName, name) pair the remote registry holds; one connect/close cycle. */
export async function listRemoteBeans(source: ConfigSource, options?: RemoteProxyOptions): Promise<RegisteredBean[]> {
  const endpoint = readEndpoint(source);
  const log = resolveLogger(options?.loggerFactory, SERVICE_NAME);
  const connector = options?.connector ?? defaultConnector(options);

  try {
    return await withConnection(connector, endpoint, (connection) => connection.queryAll(), log);
  } catch (err) {
    if (isManagementError(err)) throw err;
    throw new ManagementError({
      code: "OPERATION_FAILED",
      message: `${SERVICE_NAME}:listRemoteBeans - Unable to query the remote registry.`,
      details: describeEndpoint(endpoint),
      cause: err,
    });
  }
}

function defaultConnector(options?: RemoteProxyOptions): RegistryConnector {
  return new NatsRegistryConnector({ config: options?.config, loggerFactory: options?.loggerFactory });
}
