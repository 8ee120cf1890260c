/**
 * Built-in runtime managed object, registered by the agent at startup so a
 * freshly started agent always has something to answer for.
 */

import { hostname } from "node:os";
import {
  buildName,
  defineManagedInterface,
  type LocalRegistry,
  type ObjectName,
} from "@mbeankit/core";

export interface MemoryUsage {
  rss: number;
  heapTotal: number;
  heapUsed: number;
}

export interface RuntimeMXBean {
  /** "<pid>@<hostname>" */
  getName(): string;
  getVersion(): string;
  /** Epoch millis the bean was created at */
  getStartTime(): number;
  /** Millis since getStartTime() */
  getUptime(): number;
  getMemoryUsage(): MemoryUsage;
}

export const Runtime = defineManagedInterface<RuntimeMXBean>({
  namespace: "mbeankit.lang",
  name: "RuntimeMXBean",
  operations: ["getName", "getVersion", "getStartTime", "getUptime", "getMemoryUsage"],
});

export function createRuntimeBean(now: () => number = Date.now): RuntimeMXBean {
  const startTime = now();
  return {
    getName: () => `${process.pid}@${hostname()}`,
    getVersion: () => process.version,
    getStartTime: () => startTime,
    getUptime: () => now() - startTime,
    getMemoryUsage: () => {
      const { rss, heapTotal, heapUsed } = process.memoryUsage();
      return { rss, heapTotal, heapUsed };
    },
  };
}

/** Register the runtime bean under "mbeankit.lang:type=RuntimeMXBean" unless something already is. */
export async function registerRuntimeBean(registry: LocalRegistry, now?: () => number): Promise<ObjectName> {
  const name = buildName(Runtime);
  if (!(await registry.isRegistered(name))) {
    registry.registerObject(createRuntimeBean(now), name, [Runtime]);
  }
  return name;
}
