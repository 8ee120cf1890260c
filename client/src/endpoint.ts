/**
 * Remote registry endpoint and its service URL.
 *
 * Service URL shape (two host:port segments, registry name last):
 *   service:<protocol>:<transport>://<host>:<port>/<registryPath>://<host>:<port>/<registryName>
 *
 * Example with the default config:
 *   service:jmx:nats://mgmt.example:4222/registry/nats://mgmt.example:4222/mbeanserver
 */

import { ManagementError } from "@mbeankit/core";
import { ENDPOINT_KEYS, type ConfigSource, type ResolvedClientConfig } from "./config.js";

const SERVICE_NAME = "mbeankit-client:endpoint";

export interface Endpoint {
  host: string;
  port: string;
  login: string;
  password: string;
}

/**
 * Read the four endpoint keys from a config source.
 *
 * @throws ManagementError INVALID_ARGUMENT naming the first missing key
 */
export function readEndpoint(source: ConfigSource | undefined): Endpoint {
  const values: Record<(typeof ENDPOINT_KEYS)[number], string> = { host: "", port: "", login: "", password: "" };
  for (const key of ENDPOINT_KEYS) {
    const value = source?.[key];
    if (value === undefined) {
      throw new ManagementError({
        code: "INVALID_ARGUMENT",
        message: `${SERVICE_NAME}:readEndpoint - The property ${key} does not exist.`,
        details: { missingKey: key },
      });
    }
    values[key] = value;
  }
  return values;
}

/** Endpoint without its password, for logs and error messages. */
export function describeEndpoint(endpoint: Endpoint): { host: string; port: string; login: string } {
  return { host: endpoint.host, port: endpoint.port, login: endpoint.login };
}

export function formatServiceUrl(
  endpoint: Endpoint,
  config: Pick<ResolvedClientConfig, "protocol" | "transport" | "registryPath" | "registryName">,
): string {
  const address = `${endpoint.host}:${endpoint.port}`;
  return `service:${config.protocol}:${config.transport}://${address}/${config.registryPath}://${address}/${config.registryName}`;
}

export interface ParsedServiceUrl {
  protocol: string;
  transport: string;
  host: string;
  port: number;
  registryPath: string;
  registryHost: string;
  registryPort: number;
  registryName: string;
}

const SERVICE_URL_RE = /^service:([^:/]+):([^:/]+):\/\/([^:/]+):(\d+)\/(.+):\/\/([^:/]+):(\d+)\/([^/]+)$/;

/** @throws ManagementError INVALID_ARGUMENT on anything but the two-segment shape */
export function parseServiceUrl(url: string): ParsedServiceUrl {
  const match = SERVICE_URL_RE.exec(url);
  if (!match) {
    throw new ManagementError({
      code: "INVALID_ARGUMENT",
      message: `${SERVICE_NAME}:parseServiceUrl - Malformed service URL "${url}".`,
    });
  }
  const [, protocol, transport, host, port, registryPath, registryHost, registryPort, registryName] = match;
  return {
    protocol,
    transport,
    host,
    port: Number(port),
    registryPath,
    registryHost,
    registryPort: Number(registryPort),
    registryName,
  };
}
