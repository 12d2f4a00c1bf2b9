/**
 * @fileOverview: Centralized error handling for the route audit
 * @module: ErrorHandler
 * @keyFunctions:
 *   - createError(): Standardized error creation with context
 *   - handleError(): Unified error handling with logging and optional rethrow
 *   - getUserFriendlyMessage(): Short hint shown by the CLI next to the error
 * @dependencies:
 *   - logger: Logging utilities for error tracking
 * @context: Configuration, application-model and parser failures are fatal for a run; this
 *   module gives them stable codes so the CLI can report them consistently
 */

import { logger } from './logger';

export enum ErrorCode {
  // Configuration errors
  MISSING_CONFIG = 'MISSING_CONFIG',
  INVALID_CONFIG = 'INVALID_CONFIG',

  // Application model errors
  APP_MODEL_ERROR = 'APP_MODEL_ERROR',

  // Parser errors
  PARSER_UNAVAILABLE = 'PARSER_UNAVAILABLE',
  PARSE_ERROR = 'PARSE_ERROR',

  // File system errors
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  PERMISSION_ERROR = 'PERMISSION_ERROR',

  // Generic errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export interface AuditError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  originalError?: Error;
  timestamp?: string;
  context?: Record<string, unknown>;
}

export interface ErrorHandlingOptions {
  logLevel?: 'error' | 'warn' | 'info';
  includeStack?: boolean;
  includeContext?: boolean;
  rethrow?: boolean;
}

export class RouteAuditError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RouteAuditError';
    this.code = code;
    this.details = details;
    this.context = context;
  }
}

export class ConfigError extends RouteAuditError {
  public readonly configPath?: string;

  constructor(code: ErrorCode, message: string, configPath?: string, details?: Record<string, unknown>) {
    super(code, message, { configPath, ...details });
    this.name = 'ConfigError';
    this.configPath = configPath;
  }
}

export class AppModelError extends RouteAuditError {
  public readonly source?: string;

  constructor(message: string, source?: string, details?: Record<string, unknown>) {
    super(ErrorCode.APP_MODEL_ERROR, message, { source, ...details });
    this.name = 'AppModelError';
    this.source = source;
  }
}

export class ParserUnavailableError extends RouteAuditError {
  public readonly dialect: string;

  constructor(dialect: string, cause?: string) {
    super(ErrorCode.PARSER_UNAVAILABLE, `The ${dialect} parser could not be loaded`, {
      dialect,
      ...(cause ? { cause } : {}),
    });
    this.name = 'ParserUnavailableError';
    this.dialect = dialect;
  }
}

export class ParseError extends RouteAuditError {
  public readonly filename: string;

  constructor(filename: string, dialect: string, cause: string) {
    super(ErrorCode.PARSE_ERROR, `Failed to scan ${filename}: ${cause}`, { filename, dialect, cause });
    this.name = 'ParseError';
    this.filename = filename;
  }
}

export class ErrorHandler {
  /**
   * Create a standardized error from any thrown value
   */
  static createError(error: unknown, context?: Record<string, unknown>): AuditError {
    const timestamp = new Date().toISOString();

    if (error instanceof RouteAuditError) {
      return {
        code: error.code,
        message: error.message,
        details: error.details,
        originalError: error,
        timestamp,
        context: { ...error.context, ...context },
      };
    }

    if (error instanceof Error) {
      if (error.message.includes('EACCES') || error.message.includes('EPERM')) {
        return {
          code: ErrorCode.PERMISSION_ERROR,
          message: 'Permission denied',
          details: { originalError: error.message },
          originalError: error,
          timestamp,
          context,
        };
      }

      if (error.message.includes('ENOENT')) {
        return {
          code: ErrorCode.FILE_NOT_FOUND,
          message: 'File or directory not found',
          details: { originalError: error.message },
          originalError: error,
          timestamp,
          context,
        };
      }

      return {
        code: ErrorCode.INTERNAL_ERROR,
        message: 'An internal error occurred',
        details: { originalError: error.message },
        originalError: error,
        timestamp,
        context,
      };
    }

    return {
      code: ErrorCode.UNKNOWN_ERROR,
      message: 'An unknown error occurred',
      details: { error: String(error) },
      timestamp,
      context,
    };
  }

  /**
   * Log an error and, unless told otherwise, rethrow it
   */
  static handleError(
    error: unknown,
    context?: Record<string, unknown>,
    options: ErrorHandlingOptions = {}
  ): AuditError {
    const { logLevel = 'error', includeStack = true, includeContext = true, rethrow = true } = options;

    const auditError = ErrorHandler.createError(error, context);

    const logContext = {
      code: auditError.code,
      ...(includeContext && auditError.context),
      ...(includeStack && auditError.originalError?.stack ? { stack: auditError.originalError.stack } : {}),
    };

    switch (logLevel) {
      case 'warn':
        logger.warn(auditError.message, logContext);
        break;
      case 'info':
        logger.info(auditError.message, logContext);
        break;
      default:
        logger.error(auditError.message, logContext);
    }

    if (rethrow) {
      if (error instanceof Error) {
        throw error;
      }
      throw new RouteAuditError(
        auditError.code,
        auditError.message,
        auditError.details,
        auditError.context
      );
    }

    return auditError;
  }

  static getUserFriendlyMessage(error: AuditError): string {
    switch (error.code) {
      case ErrorCode.MISSING_CONFIG:
        return 'The configuration file could not be found. Check the --config path.';
      case ErrorCode.INVALID_CONFIG:
        return 'The configuration file is invalid. Check its keys and value types.';
      case ErrorCode.APP_MODEL_ERROR:
        return 'The routes table or manifest could not be read. Re-export it with `bin/rails routes > tmp/routes.txt`.';
      case ErrorCode.PARSER_UNAVAILABLE:
        return 'A required source parser could not be loaded.';
      case ErrorCode.PARSE_ERROR:
        return 'A view or controller could not be scanned. Check the file named above.';
      case ErrorCode.FILE_NOT_FOUND:
        return 'The requested file or directory could not be found.';
      case ErrorCode.PERMISSION_ERROR:
        return 'Permission denied. Please check file permissions.';
      default:
        return 'An unexpected error occurred.';
    }
  }
}

export const createError = ErrorHandler.createError;
export const handleError = ErrorHandler.handleError;
export const getUserFriendlyMessage = ErrorHandler.getUserFriendlyMessage;
