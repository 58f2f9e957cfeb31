export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Structured logging sink used throughout the bridge.
 *
 * `context` names the component that logs (see {@link LOG_CONTEXT}); `data`
 * carries whatever structured detail the call site has, usually ids and the
 * failure being reported.
 */
export interface LoggerAdapter {
  debug(context: string, message: string, data?: unknown): void;
  info(context: string, message: string, data?: unknown): void;
  warn(context: string, message: string, data?: unknown): void;
  error(context: string, message: string, data?: unknown): void;
}

export interface LoggerOptions {
  /**
   * Replaces console output. Receives every entry at or above `minLevel`.
   */
  log?: (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ) => void;

  /**
   * Minimum level to output (default: "info").
   */
  minLevel?: LogLevel;
}

const levels: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function consoleLog(
  level: LogLevel,
  context: string,
  message: string,
  data?: unknown,
): void {
  const line = `[${context}] ${message}`;
  if (data === undefined) {
    console[level](line);
  } else {
    console[level](line, data);
  }
}

export function createLogger(options: LoggerOptions = {}): LoggerAdapter {
  const minLevel = levels[options.minLevel ?? "info"];
  const sink = options.log ?? consoleLog;

  function emit(
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ): void {
    if (levels[level] >= minLevel) {
      sink(level, context, message, data);
    }
  }

  return {
    debug: (context, message, data) => emit("debug", context, message, data),
    info: (context, message, data) => emit("info", context, message, data),
    warn: (context, message, data) => emit("warn", context, message, data),
    error: (context, message, data) => emit("error", context, message, data),
  };
}

export const LOG_CONTEXT = {
  DISPATCH: "dispatch",
  OUTBOUND: "outbound",
  HANDLES: "handles",
  PROTOCOL: "protocol",
  TRANSPORT: "transport",
} as const;
