import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { AppError, logger } from '../utils';
import { env } from '../config';

/**
 * Client errors raised by body parsers carry their HTTP status
 * (e.g. 413 for an oversized upload).
 */
const clientErrorStatus = (err: Error): number | null => {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return null;
};

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  let statusCode = 500;
  let message = 'Internal Server Error';
  let isOperational = false;

  if (err instanceof AppError) {
    statusCode = err.statusCode;
    message = err.message;
    isOperational = err.isOperational;
  } else if (err instanceof multer.MulterError) {
    statusCode = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
    message = `Upload rejected: ${err.message}`;
    isOperational = true;
  } else {
    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
      statusCode = clientStatus;
      message = err.message;
      isOperational = true;
    }
  }

  if (!isOperational) {
    logger.error('Unhandled Error:', err);
  } else {
    logger.warn(`Operational Error: ${message}`);
  }

  res.status(statusCode).json({
    success: false,
    error: message,
    ...(env.NODE_ENV === 'development' && {
      stack: err.stack,
    }),
    timestamp: new Date().toISOString(),
  });
};

export default errorHandler;
