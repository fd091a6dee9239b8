export type AppErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'INVARIANT_VIOLATION'
  | 'PARSE_ERROR'
  | 'EXTERNAL_MATCHER_ERROR';

/**
 * Custom application error class for scoring errors
 */
export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly isOperational: boolean;

  constructor(message: string, code: AppErrorCode, isOperational = true) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.isOperational = isOperational;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Set the prototype explicitly
    Object.setPrototypeOf(this, AppError.prototype);
  }

  static configuration(message: string): AppError {
    return new AppError(message, 'CONFIGURATION_ERROR');
  }

  static invariant(message: string): AppError {
    return new AppError(message, 'INVARIANT_VIOLATION', false);
  }

  static parse(message: string): AppError {
    return new AppError(message, 'PARSE_ERROR');
  }

  static externalMatcher(message: string): AppError {
    return new AppError(message, 'EXTERNAL_MATCHER_ERROR');
  }

  static isParseError(error: unknown): error is AppError {
    return error instanceof AppError && error.code === 'PARSE_ERROR';
  }
}

export default AppError;
