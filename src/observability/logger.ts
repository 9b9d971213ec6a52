export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CorrelationContext {
  requestId?: string | null;
  sessionId?: string | null;
}

export type LogFields = Record<string, unknown>;

export type LogWriter = (level: LogLevel, line: string) => void;

export type LogFunction = (event: string, context: CorrelationContext, fields?: LogFields) => void;

export interface StructuredLogger {
  readonly level: LogLevel;
  enabled(level: LogLevel): boolean;
  trace: LogFunction;
  debug: LogFunction;
  info: LogFunction;
  warn: LogFunction;
  error: LogFunction;
}

const MAX_CAUSE_DEPTH = 3;

export const parseLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? "info";
};

const consoleWriter: LogWriter = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.info(line);
  }
};

export function createLogger(options: {
  level: LogLevel;
  write?: LogWriter;
  clock?: () => Date;
}): StructuredLogger {
  const threshold = LOG_LEVELS.indexOf(options.level);
  const write = options.write ?? consoleWriter;
  const clock = options.clock ?? (() => new Date());
  const enabled = (level: LogLevel): boolean => LOG_LEVELS.indexOf(level) >= threshold;

  const at =
    (level: LogLevel): LogFunction =>
    (event, context, fields = {}) => {
      if (!enabled(level)) {
        return;
      }
      write(
        level,
        JSON.stringify({
          ts: clock().toISOString(),
          level,
          event,
          request_id: context.requestId ?? null,
          session_id: context.sessionId ?? null,
          ...fields
        })
      );
    };

  return {
    level: options.level,
    enabled,
    trace: at("trace"),
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error")
  };
}

const rootLogger = createLogger({ level: parseLogLevel(process.env.LOG_LEVEL) });

export const logTrace: LogFunction = rootLogger.trace;
export const logDebug: LogFunction = rootLogger.debug;
export const logInfo: LogFunction = rootLogger.info;
export const logWarn: LogFunction = rootLogger.warn;
export const logError: LogFunction = rootLogger.error;

const describeCause = (cause: unknown): unknown =>
  cause instanceof Error ? { name: cause.name, message: cause.message } : cause;

export const serializeError = (error: unknown): LogFields => {
  if (!(error instanceof Error)) {
    return { error_raw: String(error) };
  }

  const fields: LogFields = {
    error_name: error.name,
    error_message: error.message,
    ...(error.stack ? { error_stack: error.stack } : {})
  };

  const causes: unknown[] = [];
  let cause: unknown = error.cause;
  while (cause !== undefined && causes.length < MAX_CAUSE_DEPTH) {
    causes.push(describeCause(cause));
    cause = cause instanceof Error ? cause.cause : undefined;
  }
  if (causes.length > 0) {
    fields.error_cause = causes[0];
  }
  if (causes.length > 1) {
    fields.error_cause_chain = causes;
  }
  return fields;
};
