export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export interface CorrelationContext {
  requestId?: string | null;
  sessionId?: string | null;
  evaluationItemId?: string | number | null;
}

export interface LogFields {
  [key: string]: unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50
};

const isLogLevel = (value: string): value is LogLevel => value in LOG_LEVEL_PRIORITY;

const resolveConfiguredLogLevel = (): LogLevel => {
  const explicit = (process.env.BACKEND_LOG_LEVEL ?? process.env.LOG_LEVEL)?.trim().toLowerCase();
  if (explicit && isLogLevel(explicit)) {
    return explicit;
  }

  const requestTraceMode = process.env.BACKEND_REQUEST_TRACE_MODE?.trim().toLowerCase();
  if (requestTraceMode === "trace" || requestTraceMode === "debug") {
    return requestTraceMode;
  }

  return "info";
};

const configuredLogLevel = resolveConfiguredLogLevel();

export const isLogLevelEnabled = (level: LogLevel): boolean =>
  LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[configuredLogLevel];

const toLogEntry = (
  level: LogLevel,
  event: string,
  context: CorrelationContext,
  fields: LogFields
): Record<string, unknown> => ({
  ts: new Date().toISOString(),
  level,
  event,
  request_id: context.requestId ?? null,
  session_id: context.sessionId ?? null,
  ...(context.evaluationItemId !== undefined && context.evaluationItemId !== null
    ? { evaluation_item_id: context.evaluationItemId }
    : {}),
  ...fields
});

const emit = (level: LogLevel, event: string, context: CorrelationContext, fields: LogFields): void => {
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

export const logInfo = (event: string, context: CorrelationContext, fields: LogFields = {}): void => {
  emit("info", event, context, fields);
};

export const logDebug = (event: string, context: CorrelationContext, fields: LogFields = {}): void => {
  emit("debug", event, context, fields);
};

export const logTrace = (event: string, context: CorrelationContext, fields: LogFields = {}): void => {
  emit("trace", event, context, fields);
};

export const logWarn = (event: string, context: CorrelationContext, fields: LogFields = {}): void => {
  emit("warn", event, context, fields);
};

export const logError = (event: string, context: CorrelationContext, fields: LogFields = {}): void => {
  emit("error", event, context, fields);
};

export const serializeError = (error: unknown): Record<string, unknown> => {
  if (!(error instanceof Error)) {
    return { error_raw: String(error) };
  }

  const details: Record<string, unknown> = {
    error_name: error.name,
    error_message: error.message
  };

  if (error.stack) {
    details.error_stack = error.stack;
  }

  const cause: unknown = error.cause;
  if (cause instanceof Error) {
    details.error_cause = {
      name: cause.name,
      message: cause.message,
      stack: cause.stack
    };
  } else if (cause !== undefined) {
    details.error_cause = cause;
  }

  return details;
};
