export const LogLevels = Object.freeze({
  DEBUG: "debug",
  INFO: "info",
  WARN: "warn",
  ERROR: "error"
});

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels];

export const VALID_LOG_LEVELS: ReadonlySet<LogLevel> = new Set(
  Object.values(LogLevels) as LogLevel[]
);

const LOG_LEVEL_RANK: Readonly<Record<LogLevel, number>> = Object.freeze({
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
});

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export type LogWriter = (line: string, level: LogLevel) => void;

export interface ConsoleLoggerOptions {
  name: string;
  level?: LogLevel;
  now?: () => Date;
  write?: LogWriter;
}

export function createNoopLogger(): Logger {
  return {
    debug() {},
    info() {},
    warn() {},
    error() {}
  };
}

function writeToConsole(line: string, level: LogLevel): void {
  if (level === "warn" || level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
}

/**
 * JSON-lines logger. Entries below `level` are dropped; context keys are
 * merged into the entry after the fixed fields and never replace them.
 */
export function createConsoleLogger({
  name,
  level = "info",
  now = () => new Date(),
  write = writeToConsole
}: ConsoleLoggerOptions): Logger {
  const minimumRank = LOG_LEVEL_RANK[level];

  const emit = (entryLevel: LogLevel, message: string, context?: LogContext): void => {
    if (LOG_LEVEL_RANK[entryLevel] < minimumRank) {
      return;
    }
    const fields = {
      timestamp: now().toISOString(),
      level: entryLevel,
      logger: name,
      message
    };
    const entry = { ...fields, ...(context ?? {}), ...fields };
    write(JSON.stringify(entry), entryLevel);
  };

  return {
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, context) => emit("error", message, context)
  };
}
