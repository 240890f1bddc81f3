/**
 * Minimal leveled logger.
 *
 * Each component takes a `Logger` and derives named children from it
 * (`testbench`, `spi.driver`, ...). Lines go to a sink, `console` by default,
 * and are prefixed with the simulated time when a clock is attached.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LogRecord {
  readonly level: Exclude<LogLevel, "silent">;
  readonly logger: string;
  readonly message: string;
  /** Simulated time, when the logger has a clock. */
  readonly time?: number;
}

export type LogSink = (record: LogRecord) => void;

export interface Logger {
  readonly name: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  isEnabled(level: Exclude<LogLevel, "silent">): boolean;
  child(name: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  /** Source of simulated time for the line prefix. */
  clock?: () => number;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/** Render a record as a single line. */
export function formatLogRecord(record: LogRecord): string {
  const time = record.time === undefined ? "" : `${record.time.toString().padStart(10)}ns `;
  return `${time}${record.level.toUpperCase().padEnd(5)} ${record.logger.padEnd(16)} ${record.message}`;
}

export const consoleSink: LogSink = (record) => {
  const line = formatLogRecord(record);
  switch (record.level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
};

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const threshold = SEVERITY[options.level ?? "info"];
  const sink = options.sink ?? consoleSink;
  const clock = options.clock;

  const emit = (level: Exclude<LogLevel, "silent">, message: string): void => {
    if (SEVERITY[level] < threshold) return;
    sink({ level, logger: name, message, time: clock?.() });
  };

  return {
    name,
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
    isEnabled: (level) => SEVERITY[level] >= threshold,
    child: (childName) => createLogger(`${name}.${childName}`, options),
  };
}

/** A logger that drops everything. */
export const silentLogger: Logger = createLogger("silent", { level: "silent" });
