export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface CreateLoggerOptions {
  minLevel?: LogLevel;
  /** The terminal chat writes its transcript to stdout, so it logs to stderr. */
  destination?: "stdout" | "stderr";
}

export interface LoggerContext {
  phase?: string;
  field?: string;
  question_index?: number;
  route?: string;
  prompt_name?: string;
  model_name?: string;
  latency_ms?: number;
  source?: string;
  ok?: boolean;
  error_code?: string;
}

function log(
  level: LogLevel,
  message: string,
  meta: Record<string, unknown> | undefined,
  destination: NodeJS.WritableStream,
): void {
  const payload: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };
  if (meta) {
    payload.meta = redactMeta(meta);
  }
  destination.write(`${safeJson(payload)}\n`);
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const minLevel = options?.minLevel ?? "info";
  const destination = options?.destination === "stderr" ? process.stderr : process.stdout;
  const emit = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (!isEnabled(level, minLevel)) {
      return;
    }
    log(level, message, meta, destination);
  };
  return {
    debug(message, meta) {
      emit("debug", message, meta);
    },
    info(message, meta) {
      emit("info", message, meta);
    },
    warn(message, meta) {
      emit("warn", message, meta);
    },
    error(message, meta) {
      emit("error", message, meta);
    },
  };
}

export function logContext(
  logger: Logger,
  level: LogLevel,
  message: string,
  context: LoggerContext,
  fields?: Record<string, unknown>,
): void {
  const meta: Record<string, unknown> = {
    ...context,
    ...(fields ?? {}),
  };

  if (level === "debug") {
    logger.debug(message, meta);
    return;
  }
  if (level === "warn") {
    logger.warn(message, meta);
    return;
  }
  if (level === "error") {
    logger.error(message, meta);
    return;
  }
  logger.info(message, meta);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

function isEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
}

function redactMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const output: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    const lowerKey = key.toLowerCase();
    if (
      lowerKey.includes("token") ||
      lowerKey.includes("secret") ||
      lowerKey.includes("apikey") ||
      lowerKey.includes("api_key") ||
      lowerKey.includes("authorization")
    ) {
      output[key] = "[REDACTED]";
      continue;
    }
    if (typeof value === "string" && value.length > 500) {
      output[key] = `${value.slice(0, 500)}...`;
      continue;
    }
    output[key] = value;
  }
  return output;
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return "\"[unserializable]\"";
  }
}
