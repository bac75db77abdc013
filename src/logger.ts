/**
 * Loggers used by the client and table handles.
 *
 * ConsoleLogger writes level-filtered, component-prefixed lines; NoopLogger
 * discards everything.
 */

export enum LogLevel {
  Debug = 0,
  Info = 1,
  Warn = 2,
  Error = 3,
}

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  setLevel(level: LogLevel): void;
}

export class NoopLogger implements Logger {
  debug(_message: string, _context?: LogContext): void {
    // No-op
  }

  info(_message: string, _context?: LogContext): void {
    // No-op
  }

  warn(_message: string, _context?: LogContext): void {
    // No-op
  }

  error(_message: string, _context?: LogContext): void {
    // No-op
  }

  setLevel(_level: LogLevel): void {
    // No-op
  }
}

export interface ConsoleLoggerOptions {
  /** Component name printed in front of every line */
  name?: string;
  level?: LogLevel;
  /** One JSON object per line instead of formatted text */
  json?: boolean;
}

export class ConsoleLogger implements Logger {
  private level: LogLevel = LogLevel.Info;
  private readonly name: string;
  private readonly json: boolean;

  constructor(options?: ConsoleLoggerOptions) {
    this.name = options?.name ?? 'dynamo';
    this.json = options?.json ?? false;
    if (options?.level !== undefined) {
      this.level = options.level;
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log(LogLevel.Error, message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (level < this.level) return;

    const logFn = this.getLogFunction(level);
    const levelStr = LogLevel[level].toUpperCase();

    if (this.json) {
      logFn(
        JSON.stringify({
          level: levelStr,
          component: this.name,
          message,
          timestamp: new Date().toISOString(),
          context,
        })
      );
      return;
    }

    const line = `${new Date().toISOString()} ${levelStr} [${this.name}] ${message}`;
    if (context && Object.keys(context).length > 0) {
      logFn(line, context);
    } else {
      logFn(line);
    }
  }

  private getLogFunction(level: LogLevel): (...args: unknown[]) => void {
    switch (level) {
      case LogLevel.Error:
        return console.error;
      case LogLevel.Warn:
        return console.warn;
      case LogLevel.Debug:
        return console.debug;
      default:
        return console.log;
    }
  }
}

export function parseLogLevel(value: string): LogLevel {
  switch (value.toLowerCase()) {
    case 'debug':
      return LogLevel.Debug;
    case 'warn':
      return LogLevel.Warn;
    case 'error':
      return LogLevel.Error;
    default:
      return LogLevel.Info;
  }
}
