import { Request, Response, NextFunction } from 'express';
import { AppError, logger } from '../utils';
import { env } from '../config';

/**
 * body-parser rejects malformed JSON with an error carrying `type`
 */
const isMalformedBody = (err: Error): boolean =>
  err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error | AppError,
  req: Request,
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
  } else if (isMalformedBody(err)) {
    statusCode = 400;
    message = 'Malformed JSON body';
    isOperational = true;
  }

  if (!isOperational) {
    logger.error(`Unhandled error on ${req.method} ${req.originalUrl}:`, err);
  } else {
    logger.warn(`Operational error (${statusCode}) on ${req.method} ${req.originalUrl}: ${message}`);
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
