/**
 * Logger utility for the application
 * Provides consistent logging interface across the crawler, cache and scheduler
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface LogMessage {
  level: LogLevel;
  message: string;
  timestamp: string;
  scope?: string;
  data?: unknown;
  error?: unknown;
}

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some(level => level === value);
}

function levelFromEnv(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL ?? 'info';
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

class Logger {
  // Shared with child loggers so setLevel reaches every scope
  private readonly settings: { level: LogLevel };

  constructor(private readonly scope?: string, settings?: { level: LogLevel }) {
    this.settings = settings ?? { level: levelFromEnv() };
  }

  get level(): LogLevel {
    return this.settings.level;
  }

  setLevel(level: LogLevel) {
    this.settings.level = level;
  }

  /** Logger whose lines are tagged with `[scope]` */
  child(scope: string): Logger {
    return new Logger(this.scope ? `${this.scope}:${scope}` : scope, this.settings);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.settings.level);
  }

  private formatLog(level: LogLevel, message: string, data?: unknown): LogMessage {
    return {
      level,
      message,
      timestamp: new Date().toISOString(),
      scope: this.scope,
      data
    };
  }

  private output(logMessage: LogMessage) {
    const { level, message, timestamp, scope, data, error } = logMessage;
    const prefix = `[${timestamp}] [${level.toUpperCase()}]${scope ? ` [${scope}]` : ''}`;

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

export type { Logger };

// Export singleton instance
export const logger = new Logger();
