/**
 * Splitter Logger Service
 * Levelled, component-tagged logging with an in-memory ring of recent entries
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  data?: unknown;
  error?: string;
}

export type LogSink = (entry: LogEntry) => void;

function defaultLevel(): LogLevel {
  const env = typeof process !== 'undefined' ? process.env.NODE_ENV : undefined;
  return env === 'development' ? LogLevel.DEBUG : LogLevel.WARN;
}

const consoleSink: LogSink = (entry) => {
  const line = `[${entry.component}] ${entry.message}`;
  const data = entry.data ?? '';
  switch (entry.level) {
    case LogLevel.ERROR:
      console.error(line, data, entry.error ?? '');
      break;
    case LogLevel.WARN:
      console.warn(line, data);
      break;
    default:
      console.log(line, data);
  }
};

class SplitterLogger {
  private logQueue: LogEntry[] = [];
  private maxQueueSize: number = 100;
  private minLevel: LogLevel = defaultLevel();
  private sink: LogSink = consoleSink;

  private createLogEntry(level: LogLevel, component: string, message: string, data?: unknown, error?: Error): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
      data,
      error: error ? `${error.name}: ${error.message}` : undefined,
    };
  }

  private write(entry: LogEntry): void {
    this.logQueue.push(entry);
    if (this.logQueue.length > this.maxQueueSize) {
      this.logQueue = this.logQueue.slice(-this.maxQueueSize);
    }
    if (entry.level >= this.minLevel) {
      this.sink(entry);
    }
  }

  debug(component: string, message: string, data?: unknown): void {
    this.write(this.createLogEntry(LogLevel.DEBUG, component, message, data));
  }

  info(component: string, message: string, data?: unknown): void {
    this.write(this.createLogEntry(LogLevel.INFO, component, message, data));
  }

  warn(component: string, message: string, data?: unknown): void {
    this.write(this.createLogEntry(LogLevel.WARN, component, message, data));
  }

  error(component: string, message: string, data?: unknown, error?: Error): void {
    this.write(this.createLogEntry(LogLevel.ERROR, component, message, data, error));
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  /** Replace the output sink; pass nothing to restore console output. */
  setSink(sink?: LogSink): void {
    this.sink = sink ?? consoleSink;
  }

  // Method to get current logs for debugging
  getCurrentLogs(): LogEntry[] {
    return [...this.logQueue];
  }

  clearLogs(): void {
    this.logQueue = [];
  }
}

export const splitterLogger = new SplitterLogger();

export const log = {
  debug: (component: string, message: string, data?: unknown) => splitterLogger.debug(component, message, data),
  info: (component: string, message: string, data?: unknown) => splitterLogger.info(component, message, data),
  warn: (component: string, message: string, data?: unknown) => splitterLogger.warn(component, message, data),
  error: (component: string, message: string, data?: unknown, error?: Error) => splitterLogger.error(component, message, data, error)
};
