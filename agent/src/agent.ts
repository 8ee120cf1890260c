/**
 * Registry agent: connects to NATS, subscribes to the registry subject in a
 * queue group, and answers each request from an in-process registry.
 *
 * Requests are served concurrently: the subscription loop hands each message
 * off and keeps reading, so a slow operation only delays its own reply.
 */

import { connect as natsConnect, type ConnectionOptions } from "nats";
import {
  encodeJson,
  errorMessage,
  platformRegistry,
  resolveLogger,
  type Logger,
  type LoggerFactory,
  type RegistryConnection,
  type RegistryResponse,
} from "@mbeankit/core";
import type { AgentConfig } from "./config.js";
import { handleMessage } from "./handler.js";

const LOG_PREFIX = "mbeankit-agent:agent";

// The slices of the nats client the agent uses.
export interface AgentMessage {
  data: Uint8Array;
  reply?: string;
  respond(data: Uint8Array): boolean;
}

export interface AgentSubscription extends AsyncIterable<AgentMessage> {
  drain(): Promise<void>;
}

export interface AgentConnection {
  subscribe(subject: string, opts: { queue?: string }): AgentSubscription;
  close(): Promise<void>;
}

export interface RegistryAgentParams {
  config: AgentConfig;
  /** Registry to serve. Default: platformRegistry() */
  registry?: RegistryConnection;
  loggerFactory?: LoggerFactory;
  /** Replaces nats.connect */
  connect?: (opts: ConnectionOptions) => Promise<AgentConnection>;
}

export class RegistryAgent {
  private config: AgentConfig;
  private registry: RegistryConnection;
  private log: Logger;
  private natsConnect: (opts: ConnectionOptions) => Promise<AgentConnection>;
  private connection: AgentConnection | null = null;
  private subscription: AgentSubscription | null = null;
  private loop: Promise<void> | null = null;
  private inFlight: Set<Promise<void>> = new Set();

  constructor(params: RegistryAgentParams) {
    this.config = params.config;
    this.registry = params.registry ?? platformRegistry();
    this.log = resolveLogger(params.loggerFactory, LOG_PREFIX);
    this.natsConnect = params.connect ?? natsConnect;
  }

  /** Connect and start answering requests. */
  async start(): Promise<void> {
    if (this.connection) return;
    this.log.info?.(
      { natsUrl: this.config.natsUrl, subject: this.config.subject },
      `${LOG_PREFIX}:start - Connecting`,
    );
    this.connection = await this.natsConnect({
      servers: this.config.natsUrl,
      name: this.config.connectionName,
      user: this.config.user,
      pass: this.config.password,
    });
    this.subscription = this.connection.subscribe(this.config.subject, { queue: this.config.queueGroup });
    this.loop = this.run(this.subscription);
    this.log.info?.({}, `${LOG_PREFIX}:start - Serving`);
  }

  /** Drain the subscription, wait for in-flight requests, close the connection. */
  async stop(): Promise<void> {
    this.log.info?.({}, `${LOG_PREFIX}:stop - Stopping`);
    if (this.subscription) {
      await this.subscription.drain();
      this.subscription = null;
    }
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
    await Promise.all([...this.inFlight]);
    if (this.connection) {
      await this.connection.close();
      this.connection = null;
    }
    this.log.info?.({}, `${LOG_PREFIX}:stop - Stopped`);
  }

  get running(): boolean {
    return this.connection !== null;
  }

  private run(subscription: AgentSubscription): Promise<void> {
    return (async () => {
      for await (const msg of subscription) {
        this.serve(msg);
      }
    })().catch((err: unknown) => {
      this.log.error?.(
        { subject: this.config.subject, error: errorMessage(err) },
        `${LOG_PREFIX}:run - Subscription loop error`,
      );
    });
  }

  /** Answer one message in the background; tracked until it settles. */
  private serve(msg: AgentMessage): void {
    const task: Promise<void> = this.reply(msg)
      .catch((err: unknown) => {
        this.log.error?.(
          { subject: this.config.subject, error: errorMessage(err) },
          `${LOG_PREFIX}:serve - Handle failed`,
        );
      })
      .then(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private async reply(msg: AgentMessage): Promise<void> {
    const response = await handleMessage({ body: msg.data, registry: this.registry, log: this.log });
    if (!msg.reply) return;
    msg.respond(this.encode(response));
  }

  private encode(response: RegistryResponse): Uint8Array {
    try {
      return encodeJson(response);
    } catch (err) {
      this.log.error?.(
        { id: response.id, error: errorMessage(err) },
        `${LOG_PREFIX}:encode - Result is not serializable`,
      );
      return encodeJson({
        id: response.id,
        ok: false,
        error: { code: "INVOCATION_FAILED", message: `Unable to encode the result: ${errorMessage(err)}` },
      });
    }
  }
}
