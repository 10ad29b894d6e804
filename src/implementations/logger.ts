/**
 * Logger implementations
 * All output goes to stderr: stdout is reserved for path results and the MCP protocol
 */

import pc from 'picocolors';
import { Logger } from '../core/interfaces.js';
import type { Configuration } from '../core/configuration.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export const toLogLevel = (level: Configuration['logLevel']): LogLevel => {
  switch (level) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
  }
};

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Structured JSON logger
 */
export class StructuredLogger implements Logger {
  private readonly context: Record<string, unknown>;

  constructor(
    context: Record<string, unknown> = {},
    private readonly level: LogLevel = LogLevel.INFO,
    private readonly output: (entry: LogEntry) => void = (entry) =>
      process.stderr.write(`${JSON.stringify(entry)}\n`)
  ) {
    this.context = { ...context };
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.log('debug', message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.log('info', message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.log('warn', message, context);
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level: 'error',
        message,
        context: { ...this.context, ...context },
      };

      if (error) {
        entry.error = {
          name: error.name,
          message: error.message,
          stack: error.stack,
        };
      }

      this.output(entry);
    }
  }

  child(context: Record<string, unknown>): Logger {
    return new StructuredLogger(
      { ...this.context, ...context },
      this.level,
      this.output
    );
  }

  private log(level: string, message: string, context?: Record<string, unknown>): void {
    this.output({
      timestamp: new Date().toISOString(),
      level,
      message,
      context: { ...this.context, ...context },
    });
  }
}

/**
 * Human-readable logger for terminal use
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly prefix = '[pathwise]',
    private readonly level: LogLevel = LogLevel.INFO,
    private readonly write: (line: string) => void = (line) => process.stderr.write(`${line}\n`)
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.write(this.format(pc.cyan('DEBUG'), message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.write(this.format(pc.green('INFO'), message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.write(this.format(pc.yellow('WARN'), message, context));
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      this.write(this.format(pc.red('ERROR'), message, context));
      if (error?.stack) {
        this.write(pc.dim(error.stack));
      }
    }
  }

  child(context: Record<string, unknown>): Logger {
    const childPrefix = typeof context.module === 'string'
      ? `${this.prefix}[${context.module}]`
      : this.prefix;
    return new ConsoleLogger(childPrefix, this.level, this.write);
  }

  private format(label: string, message: string, context?: Record<string, unknown>): string {
    const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    return `${this.prefix} ${label}: ${message}${suffix}`;
  }
}

/**
 * Test logger that captures logs
 */
export class TestLogger implements Logger {
  public readonly logs: Array<{
    level: string;
    message: string;
    context?: Record<string, unknown>;
    error?: Error;
  }> = [];

  debug(message: string, context?: Record<string, unknown>): void {
    this.logs.push({ level: 'debug', message, context });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.logs.push({ level: 'info', message, context });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.logs.push({ level: 'warn', message, context });
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.logs.push({ level: 'error', message, context, error });
  }

  child(_context: Record<string, unknown>): Logger {
    return this; // For testing, just return same instance
  }

  clear(): void {
    this.logs.length = 0;
  }

  hasLog(level: string, message: string): boolean {
    return this.logs.some(log => log.level === level && log.message === message);
  }
}

/**
 * Logger matching the resolved configuration
 */
export const createLogger = (config: Pick<Configuration, 'logLevel' | 'logFormat'>): Logger => {
  const level = toLogLevel(config.logLevel);
  return config.logFormat === 'json'
    ? new StructuredLogger({ service: 'pathwise' }, level)
    : new ConsoleLogger('[pathwise]', level);
};
