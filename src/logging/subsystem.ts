import { Logger, type ILogObj } from "tslog";

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug" | "trace";

export type SubsystemLogger = {
  subsystem: string;
  trace: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

// tslog numeric levels: 1 trace, 2 debug, 3 info, 4 warn, 5 error.
const MIN_LEVEL_BY_NAME: Record<Exclude<LogLevel, "silent">, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
};

const LOG_LEVELS: LogLevel[] = ["silent", "error", "warn", "info", "debug", "trace"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.GOVERNOR_LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

let rootLogger: Logger<ILogObj> | null = null;
let rootLevel: LogLevel | null = null;
let pinnedLevel: LogLevel | null = null;

function createRootLogger(level: LogLevel) {
  const json = process.env.GOVERNOR_LOG_JSON === "1";
  return new Logger<ILogObj>({
    name: "governor",
    type: level === "silent" ? "hidden" : json ? "json" : "pretty",
    minLevel: level === "silent" ? MIN_LEVEL_BY_NAME.error : MIN_LEVEL_BY_NAME[level],
    hideLogPositionForProduction: true,
  });
}

export function getEffectiveLogLevel(): LogLevel {
  return pinnedLevel ?? resolveLogLevel();
}

function getRootLogger() {
  const level = getEffectiveLogLevel();
  if (!rootLogger || rootLevel !== level) {
    rootLogger = createRootLogger(level);
    rootLevel = level;
  }
  return rootLogger;
}

/**
 * Pins the level for every subsystem logger until `resetLogLevel`; existing loggers
 * switch on their next call. `GOVERNOR_LOG_LEVEL` applies while nothing is pinned.
 */
export function setLogLevel(level: LogLevel) {
  pinnedLevel = level;
}

export function resetLogLevel() {
  pinnedLevel = null;
}

function wrap(subsystem: string): SubsystemLogger {
  let bound: { root: Logger<ILogObj>; logger: Logger<ILogObj> } | null = null;
  const resolve = () => {
    const root = getRootLogger();
    if (!bound || bound.root !== root) {
      bound = { root, logger: root.getSubLogger({ name: subsystem }) };
    }
    return bound.logger;
  };
  const emit =
    (method: "trace" | "debug" | "info" | "warn" | "error") =>
    (message: string, meta?: Record<string, unknown>) => {
      const logger = resolve();
      if (meta && Object.keys(meta).length > 0) {
        logger[method](message, meta);
      } else {
        logger[method](message);
      }
    };
  return {
    subsystem,
    trace: emit("trace"),
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  return wrap(subsystem);
}
