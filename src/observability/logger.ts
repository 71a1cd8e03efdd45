export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  requestId?: string | null;
}

export interface LogFields {
  [key: string]: unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50
};

// Same names pino takes, so one LOG_LEVEL drives both loggers.
const LOG_THRESHOLDS: Record<string, number> = {
  trace: 10,
  ...LOG_LEVEL_PRIORITY,
  fatal: 60,
  silent: Number.POSITIVE_INFINITY
};

export const resolveLogThreshold = (value: string | undefined): number => {
  const normalized = value?.trim().toLowerCase() ?? "";
  return Object.hasOwn(LOG_THRESHOLDS, normalized) ? LOG_THRESHOLDS[normalized] : LOG_LEVEL_PRIORITY.info;
};

let configuredThreshold = resolveLogThreshold(process.env.LOG_LEVEL);

/** Re-reads the threshold once dotenv files have been merged into the environment. */
export const configureLogLevel = (level: string | undefined): void => {
  configuredThreshold = resolveLogThreshold(level);
};

export const isLogLevelEnabled = (level: LogLevel): boolean => LOG_LEVEL_PRIORITY[level] >= configuredThreshold;

const toLogEntry = (
  level: LogLevel,
  event: string,
  context: LogContext,
  fields: LogFields
): Record<string, unknown> => ({
  ts: new Date().toISOString(),
  level,
  event,
  request_id: context.requestId ?? null,
  ...fields
});

const emit = (level: LogLevel, event: string, context: LogContext, fields: LogFields): void => {
  if (!isLogLevelEnabled(level)) {
    return;
  }
  const serialized = JSON.stringify(toLogEntry(level, event, context, fields));
  if (level === "error") {
    console.error(serialized);
    return;
  }
  if (level === "warn") {
    console.warn(serialized);
    return;
  }
  console.info(serialized);
};

export const logDebug = (event: string, context: LogContext, fields: LogFields = {}): void => {
  emit("debug", event, context, fields);
};

export const logInfo = (event: string, context: LogContext, fields: LogFields = {}): void => {
  emit("info", event, context, fields);
};

export const logWarn = (event: string, context: LogContext, fields: LogFields = {}): void => {
  emit("warn", event, context, fields);
};

export const logError = (event: string, context: LogContext, fields: LogFields = {}): void => {
  emit("error", event, context, fields);
};
