/**
 * Management client configuration.
 *
 * Endpoint credentials come from a config source (plain key/value record) so they
 * can be supplied per call; `loadEndpointSource` builds one from the environment
 * and an optional dotenv file.
 */

import { readFileSync } from "node:fs";
import { parse as parseDotenv } from "dotenv";

export interface ManagementClientConfig {
  // ── Transport ─────────────────────────────────────────────────────
  /** Connection name reported to the NATS server (for debugging) */
  connectionName?: string;
  /** Connect (and authenticate) timeout in milliseconds */
  connectTimeoutMs?: number;
  /** Per-request timeout in milliseconds; bounds every registry round trip */
  requestTimeoutMs?: number;

  // ── Service URL ───────────────────────────────────────────────────
  /** service:<protocol>:... */
  protocol?: string;
  /** service:<protocol>:<transport>://... */
  transport?: string;
  /** Path between the two host:port segments */
  registryPath?: string;
  /** Registry name; also the NATS subject the registry answers on */
  registryName?: string;
}

export const defaultManagementClientConfig = {
  connectionName: "mbeankit-client",
  connectTimeoutMs: 5_000,
  requestTimeoutMs: 10_000,
  protocol: "jmx",
  transport: "nats",
  registryPath: "registry/nats",
  registryName: "mbeanserver",
} as const satisfies Required<ManagementClientConfig>;

export type ResolvedClientConfig = Required<ManagementClientConfig>;

export function resolveClientConfig(config?: ManagementClientConfig): ResolvedClientConfig {
  const defaults = defaultManagementClientConfig;
  return {
    connectionName: config?.connectionName ?? defaults.connectionName,
    connectTimeoutMs: config?.connectTimeoutMs ?? defaults.connectTimeoutMs,
    requestTimeoutMs: config?.requestTimeoutMs ?? defaults.requestTimeoutMs,
    protocol: config?.protocol ?? defaults.protocol,
    transport: config?.transport ?? defaults.transport,
    registryPath: config?.registryPath ?? defaults.registryPath,
    registryName: config?.registryName ?? defaults.registryName,
  };
}

// ── Endpoint config source ──────────────────────────────────────────

/** Arbitrary key/value source the endpoint keys are read from. */
export type ConfigSource = Readonly<Record<string, string | undefined>>;

export const HOST_KEY = "host";
export const PORT_KEY = "port";
export const LOGIN_KEY = "login";
export const PASSWORD_KEY = "password";

export const ENDPOINT_KEYS = [HOST_KEY, PORT_KEY, LOGIN_KEY, PASSWORD_KEY] as const;

/** Environment variables mapped to endpoint keys by `loadEndpointSource`. */
export const ENDPOINT_ENV_VARS = {
  MBEAN_HOST: HOST_KEY,
  MBEAN_PORT: PORT_KEY,
  MBEAN_LOGIN: LOGIN_KEY,
  MBEAN_PASSWORD: PASSWORD_KEY,
} as const;

/**
 * Build an endpoint config source from environment variables.
 * Values in `envFile` (dotenv format) take precedence over `env`.
 */
export function loadEndpointSource(params?: {
  env?: Readonly<Record<string, string | undefined>>;
  envFile?: string;
}): ConfigSource {
  const env = params?.env ?? process.env;
  const fromFile = params?.envFile ? parseDotenv(readFileSync(params.envFile, "utf-8")) : {};

  const source: Record<string, string | undefined> = {};
  for (const [envVar, key] of Object.entries(ENDPOINT_ENV_VARS)) {
    source[key] = fromFile[envVar] ?? env[envVar];
  }
  return source;
}
