/**
 * Structured JSON-line logger shared by every package.
 *
 * Loggers take a structured context plus a message; messages follow
 * `<package>:<module>:<method> - Text`. Errors go to stderr, everything else
 * to stdout.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMethod = (ctx: Record<string, unknown>, msg: string) => void;

export interface Logger {
  debug?: LogMethod;
  info?: LogMethod;
  warn?: LogMethod;
  error?: LogMethod;
  /** Factories hand out prefixed child loggers */
  get?: (name: string) => Logger;
}

/** A logger factory, as returned by createNodeJSLogger. */
export type LoggerFactory = Logger & { get: (name: string) => Logger };

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export interface NodeLoggerOptions {
  /** Minimum level; defaults to LOG_LEVEL or "info" */
  level?: LogLevel;
  /** Sink for one formatted line (defaults to console) */
  write?: (level: LogLevel, line: string) => void;
}

function defaultWrite(level: LogLevel, line: string): void {
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Create a node-style logger factory. Returns an object with get(prefix)
 * that returns a logger instance with debug, info, warn, error methods; the
 * factory itself logs under the service name.
 */
export function createNodeJSLogger(
  serviceName: string,
  options: NodeLoggerOptions = {}
): LoggerFactory {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  const level: LogLevel = options.level ?? (envLevel && isLogLevel(envLevel) ? envLevel : "info");
  const write = options.write ?? defaultWrite;

  const emit = (lvl: LogLevel, prefix: string, ctx: Record<string, unknown>, msg: string): void => {
    if (LEVEL_ORDER[lvl] < LEVEL_ORDER[level]) return;
    write(lvl, JSON.stringify({ level: lvl, service: serviceName, prefix, ...ctx, msg }));
  };

  const get = (prefix: string): Logger => ({
    debug: (ctx, msg) => emit("debug", prefix, ctx, msg),
    info: (ctx, msg) => emit("info", prefix, ctx, msg),
    warn: (ctx, msg) => emit("warn", prefix, ctx, msg),
    error: (ctx, msg) => emit("error", prefix, ctx, msg),
  });

  return { ...get(serviceName), get };
}

/** Resolve a logger from a factory or logger; falls back to the silent logger. */
export function resolveLogger(factory: Logger | undefined, name: string): Logger {
  return factory?.get?.(name) ?? factory ?? silentLogger;
}

const noop: LogMethod = () => {};

export const silentLogger: LoggerFactory = {
  get: () => silentLogger,
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
