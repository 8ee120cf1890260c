/**
 * NATS-backed remote registry connection.
 *
 * Every registry operation is one request/reply round trip on the registry
 * subject. Replies are validated with zod and must echo the request id;
 * `ok: false` replies become RegistryError with the code the agent sent.
 * Transport errors (timeouts, no responders) are not wrapped here.
 */

import { randomUUID } from "node:crypto";
import { connect as natsConnect, type ConnectionOptions } from "nats";
import { z } from "zod";
import {
  ObjectName,
  QueryAllResultSchema,
  RegistryError,
  RegistryResponseSchema,
  decodeJson,
  encodeJson,
  errorMessage,
  isRegistryErrorCode,
  resolveLogger,
  type LoggerFactory,
  type Logger,
  type RegisteredBean,
  type RegistryRequest,
  type RemoteRegistryConnection,
} from "@mbeankit/core";
import { resolveClientConfig, type ManagementClientConfig, type ResolvedClientConfig } from "../config.js";
import { formatServiceUrl, parseServiceUrl, type Endpoint } from "../endpoint.js";
import type { RegistryConnector } from "../connection.js";

const SERVICE_NAME = "mbeankit-client:nats-registry";

/** The slice of a NatsConnection this module uses. */
export interface RequestClient {
  request(subject: string, data: Uint8Array, opts: { timeout: number }): Promise<{ data: Uint8Array }>;
  close(): Promise<void>;
}

export type NatsConnectFn = (opts: ConnectionOptions) => Promise<RequestClient>;

const BooleanResult = z.boolean();

// ── Connection ──────────────────────────────────────────────────────

export class NatsRegistryConnection implements RemoteRegistryConnection {
  private client: RequestClient;
  private subject: string;
  private requestTimeoutMs: number;

  constructor(params: { client: RequestClient; subject: string; requestTimeoutMs: number }) {
    this.client = params.client;
    this.subject = params.subject;
    this.requestTimeoutMs = params.requestTimeoutMs;
  }

  async isRegistered(name: ObjectName): Promise<boolean> {
    const result = await this.send({ id: randomUUID(), op: "isRegistered", name: name.canonicalName });
    return expectResult("isRegistered", BooleanResult, result);
  }

  async isInstanceOf(name: ObjectName, typeName: string): Promise<boolean> {
    const result = await this.send({ id: randomUUID(), op: "isInstanceOf", name: name.canonicalName, typeName });
    return expectResult("isInstanceOf", BooleanResult, result);
  }

  async queryAll(): Promise<RegisteredBean[]> {
    const result = await this.send({ id: randomUUID(), op: "queryAll" });
    return expectResult("queryAll", QueryAllResultSchema, result).map((bean) => ({
      typeName: bean.typeName,
      name: ObjectName.parse(bean.name),
    }));
  }

  async invoke(name: ObjectName, operation: string, args: readonly unknown[]): Promise<unknown> {
    return this.send({ id: randomUUID(), op: "invoke", name: name.canonicalName, operation, args: [...args] });
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  private async send(request: RegistryRequest): Promise<unknown> {
    const reply = await this.client.request(this.subject, encodeJson(request), {
      timeout: this.requestTimeoutMs,
    });

    let decoded: unknown;
    try {
      decoded = decodeJson(reply.data);
    } catch (err) {
      throw new RegistryError({
        code: "INVALID_RESPONSE",
        message: `${SERVICE_NAME}:${request.op} - Invalid registry response (not JSON)`,
        details: { error: errorMessage(err) },
      });
    }

    const parsed = RegistryResponseSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new RegistryError({
        code: "INVALID_RESPONSE",
        message: `${SERVICE_NAME}:${request.op} - Invalid registry response envelope`,
        details: parsed.error.flatten(),
      });
    }

    const response = parsed.data;
    if (response.id !== request.id) {
      throw new RegistryError({
        code: "INVALID_RESPONSE",
        message: `${SERVICE_NAME}:${request.op} - Registry response id does not match the request`,
        details: { requestId: request.id, responseId: response.id },
      });
    }
    if (!response.ok) {
      const code = response.error?.code ?? "INTERNAL_ERROR";
      throw new RegistryError({
        code: isRegistryErrorCode(code) ? code : "INTERNAL_ERROR",
        message: response.error?.message ?? "Remote registry call failed",
        details: response.error?.details,
      });
    }
    return response.result;
  }
}

function expectResult<T>(op: string, schema: z.ZodType<T>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new RegistryError({
      code: "INVALID_RESPONSE",
      message: `${SERVICE_NAME}:${op} - Unexpected result shape`,
      details: parsed.error.flatten(),
    });
  }
  return parsed.data;
}

// ── Connector ───────────────────────────────────────────────────────

/**
 * Default connector: dials the NATS server named by the service URL and
 * authenticates with the endpoint's login/password. One connector can be shared;
 * it holds no connections itself.
 */
export class NatsRegistryConnector implements RegistryConnector {
  private config: ResolvedClientConfig;
  private natsConnect: NatsConnectFn;
  private log: Logger;

  constructor(params?: {
    config?: ManagementClientConfig;
    /** Replaces nats.connect (tests, custom transports) */
    connect?: NatsConnectFn;
    loggerFactory?: LoggerFactory;
  }) {
    this.config = resolveClientConfig(params?.config);
    this.natsConnect = params?.connect ?? natsConnect;
    this.log = resolveLogger(params?.loggerFactory, SERVICE_NAME);
  }

  serviceUrl(endpoint: Endpoint): string {
    return formatServiceUrl(endpoint, this.config);
  }

  async connect(endpoint: Endpoint): Promise<NatsRegistryConnection> {
    const url = parseServiceUrl(this.serviceUrl(endpoint));
    const servers = `nats://${url.host}:${url.port}`;

    this.log.debug?.({ servers, subject: url.registryName }, `${SERVICE_NAME}:connect - Connecting`);
    const client = await this.natsConnect({
      servers,
      name: this.config.connectionName,
      user: endpoint.login,
      pass: endpoint.password,
      timeout: this.config.connectTimeoutMs,
      reconnect: false,
    });

    return new NatsRegistryConnection({
      client,
      subject: url.registryName,
      requestTimeoutMs: this.config.requestTimeoutMs,
    });
  }
}
