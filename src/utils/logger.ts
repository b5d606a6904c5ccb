import { ConfigService } from '../config/config-service.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogMetadata {
  [key: string]: unknown;
}

/** Receives one serialized log line. Defaults to stderr. */
export type LogSink = (line: string) => void;

// Always write to stderr: the CLI prints trees on stdout.
const stderrSink: LogSink = line => {
  console.error(line);
};

export class Logger {
  constructor(
    private readonly component: string,
    private readonly minLevel: LogLevel = LogLevel.INFO,
    private readonly sink: LogSink = stderrSink
  ) {}

  isEnabled(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  debug(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, error?: Error, meta?: LogMetadata): void {
    const errorMeta = error
      ? {
          error: error.message,
          stack: error.stack,
          ...meta,
        }
      : meta;
    this.log(LogLevel.ERROR, message, errorMeta);
  }

  /** A logger for a sub-component sharing this logger's level and sink. */
  child(component: string): Logger {
    return new Logger(`${this.component}.${component}`, this.minLevel, this.sink);
  }

  private log(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (!this.isEnabled(level)) return;

    const entry = {
      level: LogLevel[level],
      timestamp: new Date().toISOString(),
      component: this.component,
      message,
      ...meta,
    };

    this.sink(JSON.stringify(entry));
  }
}

export function createLogger(component: string, sink?: LogSink): Logger {
  return new Logger(component, ConfigService.getInstance().logLevel, sink);
}
