/**
 * Centralized error handling utilities
 */

export class AppError extends Error {
  code: string;
  statusCode?: number;
  isOperational: boolean;

  constructor(
    message: string,
    code: string,
    statusCode?: number,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
  }
}

/**
 * Malformed league settings. Raised before any valuation runs; the message
 * is meant to be shown to the user as-is.
 */
export class ConfigurationError extends AppError {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid league settings: ${issues.join('; ')}`, 'CONFIGURATION_ERROR', 400);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * The pool handed to a recalculation does not match the latest committed
 * draft transaction. Callers should reload state and retry.
 */
export class TransactionConflictError extends AppError {
  expectedSequence?: number;
  actualSequence: number;

  constructor(message: string, actualSequence: number, expectedSequence?: number) {
    super(message, 'TRANSACTION_CONFLICT', 409);
    this.name = 'TransactionConflictError';
    this.expectedSequence = expectedSequence;
    this.actualSequence = actualSequence;
  }
}

export class DraftError extends AppError {
  constructor(message: string) {
    super(message, 'DRAFT_ERROR', 422);
    this.name = 'DraftError';
  }
}

export const handleError = (error: unknown, context: string): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(`[${context}] ${error.message}`, 'INTERNAL_ERROR', 500, true);
  }

  return new AppError(
    `[${context}] An unexpected error occurred`,
    'UNKNOWN_ERROR',
    500,
    false
  );
};

export const logError = (error: AppError, additionalInfo?: Record<string, unknown>): void => {
  const errorLog = {
    timestamp: new Date().toISOString(),
    message: error.message,
    code: error.code,
    statusCode: error.statusCode,
    isOperational: error.isOperational,
    ...(process.env.NODE_ENV === 'development' ? { stack: error.stack } : {}),
    ...additionalInfo
  };

  console.error('[ERROR LOG]', errorLog);
};
