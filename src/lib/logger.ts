// Console-backed logger. Everything goes to stderr so stdout carries only user output.

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  timed<T>(label: string, fn: () => Promise<T> | T): Promise<T>;
}

export interface LoggerOptions {
  debug?: boolean;
  sink?: (line: string) => void;
}

function now() {
  return (typeof performance !== "undefined" ? performance.now() : Date.now());
}

export function createLogger(scope: string, opts: LoggerOptions = {}): Logger {
  const prefix = `[shift-cipher:${scope}]`;
  const sink = opts.sink ?? ((line: string) => console.error(line));
  const debugEnabled = opts.debug ?? false;

  const emit = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (level === "debug" && !debugEnabled) return;
    const tail = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    sink(`${prefix} ${level}: ${message}${tail}`);
  };

  return {
    debug: (m, meta) => emit("debug", m, meta),
    info: (m, meta) => emit("info", m, meta),
    warn: (m, meta) => emit("warn", m, meta),
    error: (m, meta) => emit("error", m, meta),
    async timed<T>(label: string, fn: () => Promise<T> | T): Promise<T> {
      const t0 = now();
      try {
        return await fn();
      } finally {
        emit("debug", label, { ms: Number((now() - t0).toFixed(2)) });
      }
    },
  };
}
