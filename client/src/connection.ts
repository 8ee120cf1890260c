/**
 * Remote registry connection lifecycle.
 *
 * Connections are short-lived and exclusively owned by the operation that opened
 * them: `withConnection` pairs every successful connect with exactly one close,
 * on success and on failure alike. Close failures are logged and dropped so they
 * never replace the outcome of the operation that triggered the cleanup.
 */

import {
  ManagementError,
  errorMessage,
  type Logger,
  type RemoteRegistryConnection,
} from "@mbeankit/core";
import { describeEndpoint, type Endpoint } from "./endpoint.js";

const SERVICE_NAME = "mbeankit-client:connection";

/** Opens authenticated connections to a remote registry. */
export interface RegistryConnector {
  /** Service URL the connector would dial for `endpoint`; used in messages. */
  serviceUrl(endpoint: Endpoint): string;
  connect(endpoint: Endpoint): Promise<RemoteRegistryConnection>;
}

/**
 * Open a connection.
 *
 * @throws ManagementError CONNECT_FAILED wrapping the transport error
 */
export async function connect(
  connector: RegistryConnector,
  endpoint: Endpoint,
  log: Logger = console,
): Promise<RemoteRegistryConnection> {
  const serviceUrl = connector.serviceUrl(endpoint);
  try {
    const connection = await connector.connect(endpoint);
    log.debug?.({ serviceUrl }, `${SERVICE_NAME}:connect - Connected`);
    return connection;
  } catch (err) {
    log.debug?.({ serviceUrl, error: errorMessage(err) }, `${SERVICE_NAME}:connect - Connect failed`);
    throw new ManagementError({
      code: "CONNECT_FAILED",
      message: `${SERVICE_NAME}:connect - Unable to connect to ${serviceUrl}: ${errorMessage(err)}`,
      retryable: true,
      details: describeEndpoint(endpoint),
      cause: err,
    });
  }
}

/** Best-effort close; never throws. */
export async function close(connection: RemoteRegistryConnection | undefined, log: Logger = console): Promise<void> {
  if (!connection) return;
  try {
    await connection.close();
    log.debug?.({}, `${SERVICE_NAME}:close - Closed`);
  } catch (err) {
    log.warn?.({ error: errorMessage(err) }, `${SERVICE_NAME}:close - Error closing connection`);
  }
}

/**
 * Connect, run `use`, and close the connection on every exit path.
 * Returns or throws whatever `use` returns or throws.
 */
export async function withConnection<T>(
  connector: RegistryConnector,
  endpoint: Endpoint,
  use: (connection: RemoteRegistryConnection) => Promise<T>,
  log: Logger = console,
): Promise<T> {
  const connection = await connect(connector, endpoint, log);
  try {
    return await use(connection);
  } finally {
    await close(connection, log);
  }
}
