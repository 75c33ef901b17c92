/**
 * Error handling utilities and error types
 */

import Database from 'better-sqlite3';

export enum ErrorType {
  STORE_ERROR = 'STORE_ERROR',
  XML_ERROR = 'XML_ERROR',
  IO_ERROR = 'IO_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export interface ErrorDetails {
  type: ErrorType;
  message: string;
  originalError?: unknown;
  context?: Record<string, unknown>;
}

export class AppError extends Error {
  public readonly type: ErrorType;
  public readonly context?: Record<string, unknown>;
  public readonly originalError?: unknown;

  constructor(details: ErrorDetails) {
    super(details.message);
    this.name = 'AppError';
    this.type = details.type;
    this.context = details.context;
    this.originalError = details.originalError;

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }

  toJSON() {
    return {
      type: this.type,
      message: this.message,
      context: this.context,
    };
  }
}

const IO_ERROR_CODES = new Set(['ENOENT', 'EACCES', 'EPERM', 'EISDIR', 'ENOTDIR', 'ENOSPC', 'EROFS', 'EEXIST']);

function errorCode(error: unknown): string | number | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' || typeof code === 'number' ? code : undefined;
  }
  return undefined;
}

/**
 * Classify an error and create an AppError
 */
export function classifyError(error: unknown, context?: Record<string, unknown>): AppError {
  // If it's already an AppError, return it
  if (error instanceof AppError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof Database.SqliteError) {
    return new AppError({
      type: ErrorType.STORE_ERROR,
      message: `Database error (${error.code}): ${message}`,
      context,
      originalError: error,
    });
  }

  const code = errorCode(error);

  // xmldom's DOMException carries the numeric W3C exception code
  if (typeof code === 'number') {
    return new AppError({
      type: ErrorType.XML_ERROR,
      message: `XML error (${code}): ${message}`,
      context,
      originalError: error,
    });
  }

  if (code !== undefined && IO_ERROR_CODES.has(code)) {
    return new AppError({
      type: ErrorType.IO_ERROR,
      message: `File system error (${code}): ${message}`,
      context,
      originalError: error,
    });
  }

  return new AppError({
    type: ErrorType.UNKNOWN_ERROR,
    message: message || 'Unknown error occurred',
    context,
    originalError: error,
  });
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  if (error instanceof AppError) {
    const parts = [
      `[${error.type}] ${error.message}`,
      error.context ? `Context: ${JSON.stringify(error.context)}` : '',
    ].filter(Boolean);
    return parts.join(' | ');
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
