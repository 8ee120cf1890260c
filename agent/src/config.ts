/**
 * Registry agent configuration.
 */

import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { errorMessage, type Logger } from "@mbeankit/core";

const LOG_PREFIX = "mbeankit-agent:config";

export interface AgentConfig {
  /** NATS server URL */
  natsUrl: string;
  /** Connection name (for debugging) */
  connectionName: string;
  /** Subject the registry answers on; matches the client's registry name */
  subject: string;
  /** Queue group shared by every agent serving the same registry */
  queueGroup: string;
  /** NATS user/password, when the server requires them */
  user?: string;
  password?: string;
}

export const defaultAgentConfig = {
  natsUrl: "nats://127.0.0.1:4222",
  connectionName: "mbeankit-agent",
  subject: "mbeanserver",
  queueGroup: "mbeankit-agents",
} as const;

const AgentConfigFileSchema = z.object({
  natsUrl: z.string().optional(),
  connectionName: z.string().optional(),
  subject: z.string().optional(),
  queueGroup: z.string().optional(),
  user: z.string().optional(),
  password: z.string().optional(),
});

type AgentConfigFile = z.infer<typeof AgentConfigFileSchema>;

/**
 * Load config from an optional JSON file at CONFIG_PATH, then the environment.
 * Env: MBEAN_AGENT_URL, MBEAN_AGENT_NAME, MBEAN_REGISTRY_SUBJECT, MBEAN_AGENT_QUEUE,
 * MBEAN_AGENT_USER, MBEAN_AGENT_PASSWORD, CONFIG_PATH. Environment values win.
 */
export function loadConfig(params: {
  log?: Logger;
  env?: Readonly<Record<string, string | undefined>>;
}): AgentConfig {
  const log = params.log ?? console;
  const env = params.env ?? process.env;
  const file = readConfigFile(env.CONFIG_PATH, log);

  return {
    natsUrl: env.MBEAN_AGENT_URL ?? file.natsUrl ?? defaultAgentConfig.natsUrl,
    connectionName: env.MBEAN_AGENT_NAME ?? file.connectionName ?? defaultAgentConfig.connectionName,
    subject: env.MBEAN_REGISTRY_SUBJECT ?? file.subject ?? defaultAgentConfig.subject,
    queueGroup: env.MBEAN_AGENT_QUEUE ?? file.queueGroup ?? defaultAgentConfig.queueGroup,
    user: env.MBEAN_AGENT_USER ?? file.user,
    password: env.MBEAN_AGENT_PASSWORD ?? file.password,
  };
}

function readConfigFile(configPath: string | undefined, log: Logger): AgentConfigFile {
  if (!configPath) return {};
  if (!existsSync(configPath)) {
    log.warn?.({ configPath }, `${LOG_PREFIX}:loadConfig - Config file not found`);
    return {};
  }

  try {
    const parsed = AgentConfigFileSchema.safeParse(JSON.parse(readFileSync(configPath, "utf-8")));
    if (!parsed.success) {
      log.error?.({ configPath, errors: parsed.error.flatten() }, `${LOG_PREFIX}:loadConfig - Invalid config file`);
      return {};
    }
    log.info?.({ configPath }, `${LOG_PREFIX}:loadConfig - Loaded config from file`);
    return parsed.data;
  } catch (err) {
    log.error?.({ configPath, error: errorMessage(err) }, `${LOG_PREFIX}:loadConfig - Failed to load config file`);
    return {};
  }
}
