// api/_lib/errors.ts
import { ZodError } from 'zod';
import type { Logger } from './logger';

// Custom Error Classes
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code: string = 'ERR_UNKNOWN', isOperational: boolean = true, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

export interface ValidationDetail {
  field: string;
  message: string;
  code: string;
}

export class AppValidationError extends AppError {
  public readonly details: ValidationDetail[];

  constructor(message: string = 'Validation failed', details: ValidationDetail[] = []) {
    super(message, 'ERR_VALIDATION');
    this.details = details;
  }

  static fromZod(error: ZodError, message?: string): AppValidationError {
    const formatted = formatZodError(error);
    return new AppValidationError(message ?? formatted.message, formatted.details);
  }
}

/** Upstream classifier raised, timed out or returned something unusable. */
export class ClassifierError extends AppError {
  constructor(message: string = 'Classifier failed', cause?: unknown) {
    super(message, 'ERR_CLASSIFIER', true, { cause });
  }
}

export class DataFileError extends AppError {
  public readonly file: string;

  constructor(file: string, message: string, cause?: unknown) {
    super(`${file}: ${message}`, 'ERR_DATA_FILE', true, { cause });
    this.file = file;
  }
}

export function formatZodError(error: ZodError): { message: string; details: ValidationDetail[] } {
  const details = error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message,
    code: err.code,
  }));
  return { message: 'Validation failed', details };
}

export interface SerializedError {
  name: string;
  message: string;
  code?: string;
  stack?: string[];
}

export function serializeError(e: unknown): SerializedError {
  if (!e) return { name: 'UnknownError', message: 'Unknown' };
  if (e instanceof AppError) {
    return {
      name: e.name,
      message: e.message,
      code: e.code,
      stack: e.stack ? e.stack.split('\n').slice(0, 5) : undefined,
    };
  }
  if (e instanceof Error) {
    return {
      name: e.name || 'Error',
      message: e.message,
      stack: e.stack ? e.stack.split('\n').slice(0, 5) : undefined,
    };
  }
  return { name: 'NonError', message: typeof e === 'string' ? e : 'Non-Error thrown' };
}

/**
 * Runs a synchronous operation and substitutes `fallback` when it throws.
 * The failure is logged at warn; it never propagates.
 */
export function recoverWith<T>(
  log: Logger,
  operationName: string,
  operation: () => T,
  fallback: () => T
): T {
  try {
    return operation();
  } catch (error) {
    log.warn(`${operationName} failed, using fallback`, { error: serializeError(error) });
    return fallback();
  }
}
