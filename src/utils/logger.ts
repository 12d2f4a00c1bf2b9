/**
 * @fileOverview: Structured logger writing to stderr with an optional JSONL file sink
 * @module: Logger
 * @keyFunctions:
 *   - info(): Log informational messages with context
 *   - warn(): Log warning messages with context
 *   - error(): Log error messages with context
 *   - debug(): Log debug messages with environment-based filtering
 * @dependencies:
 *   - fs: Appending to and rotating the optional log file
 * @context: Keeps stdout free for the audit report; diagnostics go to stderr and, when
 *   ROUTE_AUDIT_LOG_FILE is set, to a rotating log file
 */
import * as fs from 'fs';

export interface LogContext {
  [key: string]: unknown;
}

export class Logger {
  private prefix: string;
  private logFilePath: string | null;
  private readonly maxSizeBytes = 5 * 1024 * 1024; // 5 MB
  private readonly maxArchives = 3;

  constructor(prefix: string = 'RouteAudit', logFilePath?: string) {
    this.prefix = prefix;
    this.logFilePath = logFilePath ?? process.env.ROUTE_AUDIT_LOG_FILE ?? null;
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog('info')) {
      this.log('INFO', message, context);
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog('warn')) {
      this.log('WARN', message, context);
    }
  }

  error(message: string, context?: LogContext): void {
    this.log('ERROR', message, context);
  }

  debug(message: string, context?: LogContext): void {
    if (process.env.DEBUG || this.shouldLog('debug')) {
      this.log('DEBUG', message, context);
    }
  }

  private shouldLog(level: string): boolean {
    const logLevel = process.env.LOG_LEVEL?.toLowerCase() || 'info';

    const levels = ['debug', 'info', 'warn', 'error'];
    const currentLevelIndex = levels.indexOf(logLevel);
    const messageLevelIndex = levels.indexOf(level.toLowerCase());

    return messageLevelIndex >= currentLevelIndex;
  }

  private log(level: string, message: string, context?: LogContext): void {
    const timestamp = new Date().toISOString();
    const logEntry = {
      timestamp,
      level,
      prefix: this.prefix,
      message,
      ...(context && { context }),
    };

    const formattedMessage = `[${timestamp}] ${level} [${this.prefix}] ${message}`;
    const contextStr = context ? JSON.stringify(context) : '';

    // stdout carries the report, so every level goes to stderr outside of tests
    switch (level) {
      case 'ERROR':
        console.error(formattedMessage, contextStr);
        break;
      case 'WARN':
        console.warn(formattedMessage, contextStr);
        break;
      case 'DEBUG':
        if (process.env.NODE_ENV === 'test') {
          console.debug(formattedMessage, contextStr);
        } else {
          console.error(formattedMessage, contextStr);
        }
        break;
      default:
        if (process.env.NODE_ENV === 'test') {
          console.info(formattedMessage, contextStr);
        } else {
          console.error(formattedMessage, contextStr);
        }
    }

    if (this.logFilePath) {
      try {
        this.rotateLogsIfNeeded(this.logFilePath);
        fs.appendFileSync(this.logFilePath, JSON.stringify(logEntry) + '\n', { encoding: 'utf8' });
      } catch (error) {
        // the sink is unusable, stop writing to it for the rest of the process
        this.logFilePath = null;
        console.error(
          `[${timestamp}] WARN [${this.prefix}] Disabled file logging`,
          error instanceof Error ? error.message : String(error)
        );
      }
    }
  }

  private rotateLogsIfNeeded(base: string): void {
    const stats = fs.existsSync(base) ? fs.statSync(base) : null;
    if (!stats || stats.size < this.maxSizeBytes) return;

    const oldest = `${base}.${this.maxArchives}`;
    if (fs.existsSync(oldest)) {
      fs.unlinkSync(oldest);
    }

    for (let i = this.maxArchives - 1; i >= 1; i--) {
      const src = `${base}.${i}`;
      if (fs.existsSync(src)) {
        fs.renameSync(src, `${base}.${i + 1}`);
      }
    }

    fs.renameSync(base, `${base}.1`);
  }
}

// Default logger instance
export const logger = new Logger('RouteAudit');
