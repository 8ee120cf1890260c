/**
 * Registry agent process: serves the process-wide registry over NATS until
 * SIGTERM/SIGINT.
 */

import "dotenv/config";
import { createNodeJSLogger, errorMessage, platformRegistry } from "@mbeankit/core";
import { loadConfig } from "./config.js";
import { RegistryAgent } from "./agent.js";
import { registerRuntimeBean } from "./runtime-bean.js";

const SERVICE_NAME = "mbeankit-agent";

async function main(): Promise<void> {
  const loggerFactory = createNodeJSLogger({ debug: process.env.MBEAN_DEBUG === "true" });
  const log = loggerFactory.get(`${SERVICE_NAME}:main`);

  const config = loadConfig({ log });
  const registry = platformRegistry();
  await registerRuntimeBean(registry);

  const agent = new RegistryAgent({ config, registry, loggerFactory });
  await agent.start();
  log.info?.(
    { subject: config.subject, queueGroup: config.queueGroup, beans: registry.size },
    `${SERVICE_NAME}:main - Started`,
  );

  const shutdown = async (signal: string): Promise<void> => {
    log.info?.({ signal }, `${SERVICE_NAME}:main - Shutting down`);
    await agent.stop();
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((err: unknown) => {
      log.error?.({ signal, error: errorMessage(err) }, `${SERVICE_NAME}:main - Shutdown failed`);
      process.exit(1);
    });
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  console.error(`${SERVICE_NAME}:main - Fatal:`, err);
  process.exit(1);
});
