/**
 * Custom application error class for operational errors
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);

    // Keep instanceof working for subclasses compiled to ES5-style prototypes
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static badRequest(message: string): AppError {
    return new AppError(message, 400);
  }

  static notFound(message = 'Resource not found'): AppError {
    return new AppError(message, 404);
  }

  /** Dependency (database, document store) could not be reached */
  static serviceUnavailable(message = 'Service unavailable'): AppError {
    return new AppError(message, 503);
  }
}

/**
 * Raised when an uploaded workbook cannot be read.
 * Rendered as a 400 by the global error handler.
 */
export class SpreadsheetParseError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export default AppError;
