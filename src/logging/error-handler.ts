/**
 * Error Logging and Handling System
 * Centralized, leveled logging for SysTrack. Lines go to stderr so the
 * report text printed on stdout stays machine-readable.
 */

import { describeError } from '../types/errors';
import type { LogLevel } from '../types/schemas';

export enum ErrorLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL'
}

const LEVEL_ORDER: Record<ErrorLevel, number> = {
  [ErrorLevel.DEBUG]: 0,
  [ErrorLevel.INFO]: 1,
  [ErrorLevel.WARN]: 2,
  [ErrorLevel.ERROR]: 3,
  [ErrorLevel.FATAL]: 4
};

export interface ErrorLog {
  level: ErrorLevel;
  message: string;
  timestamp: Date;
  stack?: string;
  context?: Record<string, unknown>;
}

export type LogSink = (line: string) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
}

export function toErrorLevel(level: LogLevel): ErrorLevel {
  switch (level) {
    case 'debug':
      return ErrorLevel.DEBUG;
    case 'info':
      return ErrorLevel.INFO;
    case 'warn':
      return ErrorLevel.WARN;
    case 'error':
      return ErrorLevel.ERROR;
  }
}

export class ErrorHandler implements Logger {
  private logs: ErrorLog[] = [];
  private readonly maxEntries = 500;

  constructor(
    private minLevel: ErrorLevel = ErrorLevel.WARN,
    private readonly sink: LogSink = line => console.error(line)
  ) {}

  setLevel(level: ErrorLevel): void {
    this.minLevel = level;
  }

  log(level: ErrorLevel, message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }
    const errorLog: ErrorLog = {
      level,
      message: error === undefined ? message : `${message}: ${describeError(error)}`,
      timestamp: new Date(),
      stack: error instanceof Error ? error.stack : undefined,
      context
    };
    this.logs.push(errorLog);
    if (this.logs.length > this.maxEntries) {
      this.logs.shift();
    }
    this.outputLog(errorLog);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(ErrorLevel.DEBUG, message, undefined, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(ErrorLevel.INFO, message, undefined, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(ErrorLevel.WARN, message, undefined, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log(ErrorLevel.ERROR, message, error, context);
  }

  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log(ErrorLevel.FATAL, message, error, context);
  }

  private outputLog(log: ErrorLog): void {
    let logMessage = `[${log.timestamp.toISOString()}] ${log.level}: ${log.message}`;
    if (log.context && Object.keys(log.context).length > 0) {
      logMessage += ` ${JSON.stringify(log.context)}`;
    }
    this.sink(logMessage);
    if (log.stack && LEVEL_ORDER[this.minLevel] === LEVEL_ORDER[ErrorLevel.DEBUG]) {
      this.sink(log.stack);
    }
  }

  getLogs(level?: ErrorLevel): ErrorLog[] {
    if (level) {
      return this.logs.filter(log => log.level === level);
    }
    return this.logs;
  }

  clearLogs(): void {
    this.logs = [];
  }
}
