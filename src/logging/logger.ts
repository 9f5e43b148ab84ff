export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export type LogSink = (line: string) => void;

function formatLogEntry(level: LogLevel, scope: string | null, message: string, context?: Record<string, unknown>): string {
  const timestamp = new Date().toISOString();
  const levelStr = level.toUpperCase().padEnd(5);
  let entry = `[${timestamp}] [${levelStr}]${scope ? ` [${scope}]` : ""} ${message}`;
  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }
  return entry;
}

// stdout is left to the tools; everything the pipeline says goes to stderr.
const stderrSink: LogSink = (line) => {
  console.error(line);
};

export function createLogger(options: { level?: LogLevel; sink?: LogSink; scope?: string } = {}): Logger {
  const minLevel = options.level ?? "info";
  const sink = options.sink ?? stderrSink;
  const scope = options.scope ?? null;

  const log = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) return;
    sink(formatLogEntry(level, scope, message, context));
  };

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (childScope) =>
      createLogger({ level: minLevel, sink, scope: scope ? `${scope}:${childScope}` : childScope })
  };
}

export const silentLogger: Logger = createLogger({ sink: () => undefined });
