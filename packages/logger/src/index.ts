export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = {
  readonly runId?: string;
} & Record<string, unknown>;

export interface Logger {
  readonly module: string;
  log(level: LogLevel, msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  /** Returns a logger that merges `meta` into every entry it writes. */
  child(meta: LogMeta): Logger;
}

export interface LoggerOptions {
  /** Minimum level written; defaults to `LOG_LEVEL` or "info". */
  readonly level?: LogLevel;
  readonly now?: () => Date;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (value: unknown): value is LogLevel => {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
};

const resolveThreshold = (explicit?: LogLevel): LogLevel => {
  if (explicit) {
    return explicit;
  }
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "info";
};

const writeLine = (level: LogLevel, line: string): void => {
  const output = level === "error" ? process.stderr : process.stdout;
  output.write(`${line}\n`);
};

const buildEntry = (
  moduleName: string,
  level: LogLevel,
  msg: string,
  timestamp: Date,
  meta?: LogMeta,
) => {
  const { runId, ...rest } = meta ?? {};

  return {
    ts: timestamp.toISOString(),
    level,
    module: moduleName,
    msg,
    ...(typeof runId === "string" ? { runId } : {}),
    ...rest,
  };
};

const buildLogger = (moduleName: string, options: LoggerOptions, bound: LogMeta): Logger => {
  const now = options.now ?? (() => new Date());

  const log = (level: LogLevel, msg: string, meta?: LogMeta): void => {
    // threshold is read per call so LOG_LEVEL set after import still applies
    if (LEVEL_ORDER[level] < LEVEL_ORDER[resolveThreshold(options.level)]) {
      return;
    }
    const entry = buildEntry(moduleName, level, msg, now(), { ...bound, ...meta });
    writeLine(level, JSON.stringify(entry));
  };

  return {
    module: moduleName,
    log,
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
    child: (meta) => buildLogger(moduleName, options, { ...bound, ...meta }),
  };
};

export const createLogger = (moduleName: string, options: LoggerOptions = {}): Logger => {
  return buildLogger(moduleName, options, {});
};

/** Logger that drops every entry. */
export const createSilentLogger = (moduleName = "silent"): Logger => {
  const noop = (): void => {};
  const logger: Logger = {
    module: moduleName,
    log: noop,
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
};
