/**
 * Application Errors
 * Error classes surfaced to callers of the resolution operations
 */

import type { ZodError } from 'zod';

export interface AppError extends Error {
  code: string;
  details?: Record<string, unknown>;
}

export class InvalidInputError extends Error implements AppError {
  code = 'INVALID_INPUT';

  constructor(
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'InvalidInputError';
  }

  static fromZodError(context: string, error: ZodError): InvalidInputError {
    const issues = error.errors.map((e) => ({
      field: e.path.join('.'),
      message: e.message,
      code: e.code,
    }));
    const summary = issues.map((i) => (i.field ? `${i.field}: ${i.message}` : i.message));

    return new InvalidInputError(`Invalid ${context}: ${summary.join('; ')}`, { issues });
  }
}

export class ConfigurationError extends Error implements AppError {
  code = 'CONFIGURATION_ERROR';

  constructor(
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class VocabularyNotFoundError extends Error implements AppError {
  code = 'VOCABULARY_NOT_FOUND';

  constructor(codelist: string, version?: string) {
    const message = version
      ? `Codelist '${codelist}' not found in controlled terminology version '${version}'`
      : `Codelist '${codelist}' not found in controlled terminology`;
    super(message);
    this.name = 'VocabularyNotFoundError';
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
