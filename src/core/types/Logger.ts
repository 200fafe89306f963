export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

/**
 * Logger interface for flexible logging integration
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

/**
 * Silent logger implementation (no-op)
 */
export class SilentLogger implements Logger {
  debug(_message: string, _context?: LogContext): void {}
  info(_message: string, _context?: LogContext): void {}
  warn(_message: string, _context?: LogContext): void {}
  error(_message: string, _error?: Error, _context?: LogContext): void {}
}

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Console logger implementation
 *
 * Lines look like `[WARN] rpcwire: message {"key":"value"}`; the scope is omitted when empty.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly scope: string;

  constructor(minLevel: LogLevel = 'info', scope = 'rpcwire') {
    this.minLevel = minLevel;
    this.scope = scope;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.minLevel];
  }

  private format(level: LogLevel, message: string, context?: LogContext): string {
    const scope = this.scope ? `${this.scope}: ` : '';
    const ctx = context ? ` ${JSON.stringify(context)}` : '';
    return `[${level.toUpperCase()}] ${scope}${message}${ctx}`;
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog('debug')) {
      console.debug(this.format('debug', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog('info')) {
      console.info(this.format('info', message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog('warn')) {
      console.warn(this.format('warn', message, context));
    }
  }

  error(message: string, error?: Error, context?: LogContext): void {
    if (this.shouldLog('error')) {
      const errorInfo = error ? ` - ${error.message}` : '';
      console.error(this.format('error', `${message}${errorInfo}`, context));
      if (error?.stack) {
        console.error(error.stack);
      }
    }
  }
}
