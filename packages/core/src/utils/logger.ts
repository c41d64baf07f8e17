/**
 * Leveled logger for the core package
 * One line per record: [timestamp] [LEVEL] [component] message {context}
 */

import { getErrorMessage } from '@loopcast/shared';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export type LogRecordLevel = Exclude<LogLevel, 'silent'>;

/** Receives every formatted line instead of the console */
export type LogSink = (level: LogRecordLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

class CoreLogger {
  private level: LogLevel;
  private isDev: boolean;
  private sink: LogSink;

  constructor() {
    this.isDev = process.env.NODE_ENV !== 'production';
    const envLevel = process.env.LOG_LEVEL;
    this.level = isLogLevel(envLevel) ? envLevel : (this.isDev ? 'debug' : 'info');
    this.sink = consoleSink;
  }

  setSink(sink: LogSink | null): void {
    this.sink = sink ?? consoleSink;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogRecordLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private format(level: LogLevel, component: string, message: string, context?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    const contextStr = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] [${component}] ${message}${contextStr}`;
  }

  debug(component: string, message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      this.sink('debug', this.format('debug', component, message, context));
    }
  }

  info(component: string, message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      this.sink('info', this.format('info', component, message, context));
    }
  }

  warn(component: string, message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      this.sink('warn', this.format('warn', component, message, context));
    }
  }

  error(component: string, message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      const errorInfo = error instanceof Error
        ? { errorName: error.name, errorMessage: error.message, stack: this.isDev ? error.stack : undefined }
        : error !== undefined ? { errorMessage: getErrorMessage(error) } : undefined;
      this.sink('error', this.format('error', component, message, { ...context, ...errorInfo }));
    }
  }
}

export const logger = new CoreLogger();
