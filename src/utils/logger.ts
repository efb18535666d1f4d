/**
 * Structured Logger
 * JSON logging with context
 */

import { config, LogLevelSetting } from '../config';

type LogLevel = Exclude<LogLevelSetting, 'silent'>;

type LogContext = Record<string, unknown>;

const LEVEL_WEIGHT: Record<LogLevelSetting, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

class Logger {
  constructor(private readonly threshold: LogLevelSetting) {}

  private enabled(level: LogLevel): boolean {
    return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.threshold];
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...context,
    };
    
    return JSON.stringify(logEntry);
  }
  
  debug(message: string, context?: LogContext): void {
    if (!this.enabled('debug')) return;
    console.debug(this.formatMessage('debug', message, context));
  }
  
  info(message: string, context?: LogContext): void {
    if (!this.enabled('info')) return;
    console.log(this.formatMessage('info', message, context));
  }
  
  warn(message: string, context?: LogContext): void {
    if (!this.enabled('warn')) return;
    console.warn(this.formatMessage('warn', message, context));
  }
  
  error(message: string, error?: unknown, context?: LogContext): void {
    if (!this.enabled('error')) return;
    const errorContext = error instanceof Error
      ? { error: error.message, stack: error.stack, ...context }
      : { error: String(error), ...context };
    
    console.error(this.formatMessage('error', message, errorContext));
  }
}

export const logger = new Logger(config.logLevel);
