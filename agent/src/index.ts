/**
 * @mbeankit/agent
 *
 * Serves an in-process registry over NATS for remote managed-object proxies.
 */

export { loadConfig, defaultAgentConfig, type AgentConfig } from "./config.js";
export { handleMessage, type HandleMessageParams } from "./handler.js";
export {
  RegistryAgent,
  type RegistryAgentParams,
  type AgentConnection,
  type AgentSubscription,
  type AgentMessage,
} from "./agent.js";
export {
  Runtime,
  createRuntimeBean,
  registerRuntimeBean,
  type RuntimeMXBean,
  type MemoryUsage,
} from "./runtime-bean.js";
