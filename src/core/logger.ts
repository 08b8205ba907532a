/**
 * Structured Logging
 * One JSON line per entry; module name plus bound context on every line.
 */

// ── Log Levels ──

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

// ── Logger Interface ──

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Derive a logger that adds `bindings` to every entry's context. */
  child(bindings: Record<string, unknown>): Logger;
}

// ── Structured Log Entry ──

export interface LogEntry {
  timestamp: string;
  level: string;
  module: string;
  message: string;
  context?: Record<string, unknown>;
}

// ── Output ──

let logOutput: (entry: LogEntry) => void = defaultOutput;

function defaultOutput(entry: LogEntry): void {
  const line = JSON.stringify(entry);
  if (entry.level === 'ERROR' || entry.level === 'WARN') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
}

/** Override the log output function (for testing). */
export function setLogOutput(fn: (entry: LogEntry) => void): void {
  logOutput = fn;
}

/** Reset to default output. */
export function resetLogOutput(): void {
  logOutput = defaultOutput;
}

/** Parse a level name such as `warn` or `DEBUG`; unknown names yield undefined. */
export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.trim().toUpperCase()) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'INFO': return LogLevel.INFO;
    case 'WARN': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    case 'SILENT': return LogLevel.SILENT;
    default: return undefined;
  }
}

// ── Console Logger ──

class ConsoleLogger implements Logger {
  constructor(
    private module: string,
    private level: LogLevel = LogLevel.INFO,
    private bindings: Record<string, unknown> = {},
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, message, context);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ConsoleLogger(this.module, this.level, { ...this.bindings, ...bindings });
  }

  private emit(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      module: this.module,
      message,
    };
    const merged = { ...this.bindings, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }
    logOutput(entry);
  }
}

/** Create a logger for a given module; INFO unless `level` says otherwise. */
export function createLogger(module: string, level?: LogLevel): Logger {
  return new ConsoleLogger(module, level);
}
