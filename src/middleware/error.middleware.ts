import { Request, Response, NextFunction, RequestHandler } from 'express';
import { MulterError } from 'multer';
import { logger } from '../utils/logger';
import { renderErrorPage } from '../views/page.view';

/**
 * Custom error class with status code
 */
export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(message: string, statusCode: number = 500) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = true; // Operational errors vs programming errors

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Missing or malformed request field. Not a system fault.
 */
export class InputError extends AppError {
  constructor(message: string = 'Bad Request') {
    super(message, 400);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Not Found') {
    super(message, 404);
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(message: string = 'Payload Too Large') {
    super(message, 413);
  }
}

/**
 * Directory or file write failure in the upload store
 */
export class StorageError extends AppError {
  constructor(message: string = 'Storage failure') {
    super(message, 500);
  }
}

/**
 * Map framework errors onto the AppError hierarchy
 */
export function toAppError(err: Error): AppError {
  if (err instanceof AppError) {
    return err;
  }

  if (err instanceof MulterError) {
    if (err.code === 'LIMIT_FILE_SIZE') {
      return new PayloadTooLargeError('Uploaded file exceeds the size limit');
    }
    return new InputError(`Invalid upload: ${err.message}`);
  }

  const wrapped = new AppError('Internal Server Error', 500);
  wrapped.isOperational = false;
  wrapped.stack = err.stack;
  return wrapped;
}

/**
 * Global error handling middleware
 * Must be registered after all routes
 */
export function createErrorHandler(includeStack: boolean) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const appError = toAppError(err);

    if (appError.statusCode >= 500) {
      logger.error('Error handling request:', {
        method: req.method,
        url: req.url,
        statusCode: appError.statusCode,
        message: err.message,
        stack: err.stack,
      });
    } else {
      // Input problems abort the request but are not system faults
      logger.warn('Request rejected', {
        method: req.method,
        url: req.url,
        statusCode: appError.statusCode,
        message: appError.message,
      });
    }

    res
      .status(appError.statusCode)
      .type('html')
      .send(
        renderErrorPage(
          appError.statusCode,
          appError.message,
          includeStack ? err.stack : undefined
        )
      );
  };
}

/**
 * Async error wrapper
 * Wraps async route handlers to catch errors
 *
 * Usage:
 *   router.get('/path', asyncHandler(async (req, res) => {
 *     // async code
 *   }));
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * 404 Not Found handler
 * Catches all unmatched routes
 */
export function notFoundHandler(req: Request, res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route not found: ${req.method} ${req.path}`));
}
