/**
 * Diagnostic logger. Every line goes to one sink (stderr unless injected),
 * so stdout only ever carries command results.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  level: LogLevel;
  /** One JSON object per line instead of the human format */
  json: boolean;
  write?: (line: string) => void;
  now?: () => Date;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(defaultMeta: LogMeta): Logger;
}

// Ordered from most to least verbose
const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

function humanLine(timestamp: string, level: LogLevel, message: string, meta: LogMeta): string {
  const suffix = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `[${timestamp}] ${level.toUpperCase().padEnd(5)} ${message}${suffix}`;
}

function jsonLine(timestamp: string, level: LogLevel, message: string, meta: LogMeta): string {
  return JSON.stringify({ timestamp, level, message, ...meta });
}

export function createLogger(options: LoggerOptions): Logger {
  const threshold = LEVELS.indexOf(options.level);
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const now = options.now ?? (() => new Date());
  const format = options.json ? jsonLine : humanLine;

  const bind = (bound: LogMeta): Logger => {
    const at =
      (level: LogLevel) =>
      (message: string, meta: LogMeta = {}): void => {
        if (LEVELS.indexOf(level) < threshold) return;
        write(format(now().toISOString(), level, message, { ...bound, ...meta }));
      };

    return {
      debug: at("debug"),
      info: at("info"),
      warn: at("warn"),
      error: at("error"),
      child: (extra) => bind({ ...bound, ...extra }),
    };
  };

  return bind({});
}

/**
 * Logger that discards everything; the default where none is injected.
 */
export function createNoopLogger(): Logger {
  const discard = (): void => {};
  const logger: Logger = {
    debug: discard,
    info: discard,
    warn: discard,
    error: discard,
    child: () => logger,
  };
  return logger;
}
