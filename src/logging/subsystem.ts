import { Logger, type ILogObj } from "tslog";

export type LogLevelName = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

type LogFormat = "pretty" | "json" | "hidden";

type LogMeta = Record<string, unknown>;

/**
 * Logger handed to each subsystem. Messages are plain strings; structured
 * context goes in the optional meta object.
 */
export type SubsystemLogger = {
  readonly subsystem: string;
  trace: (message: string, meta?: LogMeta) => void;
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
};

const LEVEL_IDS: Record<LogLevelName, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

function isLogLevelName(value: string): value is LogLevelName {
  return Object.hasOwn(LEVEL_IDS, value);
}

function resolveMinLevel(): number {
  const raw = process.env.LOGSIFT_LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevelName(raw)) {
    return LEVEL_IDS[raw];
  }
  return LEVEL_IDS.info;
}

function resolveFormat(): LogFormat {
  // Keep test output clean
  if (process.env.VITEST) {
    return "hidden";
  }
  return process.env.LOGSIFT_LOG_FORMAT === "json" ? "json" : "pretty";
}

const rootLogger = new Logger<ILogObj>({
  name: "logsift",
  type: resolveFormat(),
  minLevel: resolveMinLevel(),
});

// Sub-loggers copy their settings when created, so level changes fan out here.
const subLoggers = new Map<string, Logger<ILogObj>>();

/**
 * Changes the minimum level of the root logger and every subsystem logger.
 */
export function setLogLevel(level: LogLevelName): void {
  const id = LEVEL_IDS[level];
  rootLogger.settings.minLevel = id;
  for (const logger of subLoggers.values()) {
    logger.settings.minLevel = id;
  }
}

/**
 * Creates (or reuses) a named logger for a subsystem, e.g. "ingest/pipeline".
 */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  let logger = subLoggers.get(subsystem);
  if (!logger) {
    logger = rootLogger.getSubLogger({ name: subsystem });
    subLoggers.set(subsystem, logger);
  }
  const target = logger;

  return {
    subsystem,
    trace: (message, meta) => void (meta ? target.trace(message, meta) : target.trace(message)),
    debug: (message, meta) => void (meta ? target.debug(message, meta) : target.debug(message)),
    info: (message, meta) => void (meta ? target.info(message, meta) : target.info(message)),
    warn: (message, meta) => void (meta ? target.warn(message, meta) : target.warn(message)),
    error: (message, meta) => void (meta ? target.error(message, meta) : target.error(message)),
  };
}
