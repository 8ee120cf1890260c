/**
 * Logger interface for client and agent components.
 * Allows optional structured logging with context and message.
 */

export type LogMethod = (ctx: object, msg: string) => void;

export interface Logger {
  debug?: LogMethod;
  info?: LogMethod;
  warn?: LogMethod;
  error?: LogMethod;
}

/** Type for logger factory: either a Logger or an object with get(name) returning Logger. */
export type LoggerFactory = Logger | { get(name: string): Logger };

function isNamedFactory(factory: LoggerFactory): factory is { get(name: string): Logger } {
  return "get" in factory && typeof factory.get === "function";
}

/** Resolve logger from factory (supports loggerFactory or loggerFactory.get(SERVICE_NAME)). */
export function resolveLogger(factory: LoggerFactory | undefined, serviceName: string): Logger {
  if (!factory) return console;
  return isNamedFactory(factory) ? factory.get(serviceName) : factory;
}

/** Logger that drops everything; handy for tests and embedding. */
export const silentLogger: Logger = {};

type Level = "debug" | "info" | "warn" | "error";

function write(level: Level, ctx: object, msg: string): void {
  const line = JSON.stringify({ level, ...ctx, msg });
  if (level === "error" || level === "warn") {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Create a node-style logger factory that writes JSON lines to the console.
 * `get(prefix)` returns a logger tagging each line with the prefix.
 */
export function createNodeJSLogger(options?: { debug?: boolean }): { get(prefix: string): Logger } {
  return {
    get(prefix: string): Logger {
      return {
        debug: options?.debug ? (ctx, msg) => write("debug", { ...ctx, prefix }, msg) : undefined,
        info: (ctx, msg) => write("info", { ...ctx, prefix }, msg),
        warn: (ctx, msg) => write("warn", { ...ctx, prefix }, msg),
        error: (ctx, msg) => write("error", { ...ctx, prefix }, msg),
      };
    },
  };
}
