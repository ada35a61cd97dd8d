export type LogLevel = "debug" | "info" | "warn" | "error";

/** Anything that accepts structured log lines; `Logger` itself satisfies it. */
export interface LogSink {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function threshold(): number {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") return ORDER[raw];
  return process.env.NODE_ENV === "production" ? ORDER.info : ORDER.debug;
}

/** Flattens an error (and its `cause` chain) into something JSON.stringify keeps. */
export function serializeError(err: unknown): unknown {
  if (!(err instanceof Error)) return err;
  return {
    name: err.name,
    message: err.message,
    stack: err.stack,
    ...(err.cause !== undefined ? { cause: serializeError(err.cause) } : {})
  };
}

export class Logger {
  private static format(level: LogLevel, message: string, meta?: unknown, scope?: string): string {
    return JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      ...(scope ? { scope } : {}),
      message,
      ...(meta !== undefined ? { meta: meta instanceof Error ? serializeError(meta) : meta } : {})
    });
  }

  private static write(level: LogLevel, message: string, meta?: unknown, scope?: string): void {
    if (ORDER[level] < threshold()) return;
    const line = Logger.format(level, message, meta, scope);
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else if (level === "debug") console.debug(line);
    else console.log(line);
  }

  static debug(message: string, meta?: unknown): void {
    Logger.write("debug", message, meta);
  }

  static info(message: string, meta?: unknown): void {
    Logger.write("info", message, meta);
  }

  static warn(message: string, meta?: unknown): void {
    Logger.write("warn", message, meta);
  }

  static error(message: string, meta?: unknown): void {
    Logger.write("error", message, meta);
  }

  /** Returns a sink that tags every line with `scope`. */
  static scoped(scope: string): LogSink {
    return {
      debug: (message, meta) => Logger.write("debug", message, meta, scope),
      info: (message, meta) => Logger.write("info", message, meta, scope),
      warn: (message, meta) => Logger.write("warn", message, meta, scope),
      error: (message, meta) => Logger.write("error", message, meta, scope)
    };
  }
}
