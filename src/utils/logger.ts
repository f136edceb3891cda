/**
 * Logger utility for the application
 * Provides consistent logging interface across the application
 */

import { LOG_LEVELS, type LogLevel } from '../config/environment';

interface LogMessage {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: unknown;
  error?: unknown;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

class Logger {
  private logLevel: LogLevel;

  constructor() {
    // Default to 'info' if LOG_LEVEL env var is not set
    const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
    this.logLevel = isLogLevel(fromEnv) ? fromEnv : 'info';
  }

  setLevel(level: LogLevel) {
    this.logLevel = level;
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.logLevel);
  }

  private formatLog(level: LogLevel, message: string, data?: unknown): LogMessage {
    return {
      level,
      message,
      timestamp: new Date().toISOString(),
      data
    };
  }

  private output(logMessage: LogMessage) {
    const { level, message, timestamp, data, error } = logMessage;
    const prefix = `[${timestamp}] [${level.toUpperCase()}]`;

    switch (level) {
      case 'debug':
        console.debug(prefix, message, data ?? '');
        break;
      case 'info':
        console.info(prefix, message, data ?? '');
        break;
      case 'warn':
        console.warn(prefix, message, data ?? '');
        break;
      case 'error':
        console.error(prefix, message, data ?? '', error ?? '');
        break;
    }
  }

  debug(message: string, data?: unknown) {
    if (this.shouldLog('debug')) {
      this.output(this.formatLog('debug', message, data));
    }
  }

  info(message: string, data?: unknown) {
    if (this.shouldLog('info')) {
      this.output(this.formatLog('info', message, data));
    }
  }

  warn(message: string, data?: unknown) {
    if (this.shouldLog('warn')) {
      this.output(this.formatLog('warn', message, data));
    }
  }

  error(message: string, error?: unknown, data?: unknown) {
    if (this.shouldLog('error')) {
      const logMessage = this.formatLog('error', message, data);
      logMessage.error = error;
      this.output(logMessage);
    }
  }
}

// Export singleton instance
export const logger = new Logger();
