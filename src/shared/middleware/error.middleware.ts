/**
 * =============================================================================
 * ERROR HANDLING MIDDLEWARE
 * =============================================================================
 *
 * Centralized error handling for all routes.
 *
 * SECURITY:
 * - Stack traces never reach clients
 * - Internal error messages are hidden in production
 * - All errors are logged server-side
 * =============================================================================
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../services/logger.service';
import { AppError, ErrorResponse } from '../../core/errors/AppError';
import { ErrorCode, HTTP_STATUS } from '../../core/constants';

export interface ErrorHandlerOptions {
  /** Hide messages of unexpected errors */
  exposeInternalErrors: boolean;
}

/**
 * Global error handler middleware
 * Must be the last middleware in the chain
 */
export function createErrorHandler(options: ErrorHandlerOptions) {
  return (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const requestId = req.get('x-request-id');

    if (error instanceof AppError) {
      const logData = {
        code: error.code,
        error: error.message,
        path: req.path,
        method: req.method,
        requestId
      };
      // Expected failures are warnings; upstream outages are errors
      if (error.statusCode >= HTTP_STATUS.INTERNAL_ERROR) {
        logger.error('Request error', logData);
      } else {
        logger.warn('Request error', logData);
      }

      res.status(error.statusCode).json(error.toJSON());
      return;
    }

    // Rejected by express.json() before any route ran
    const bodyError = isBodyParserError(error) ? fromBodyParserError(error) : null;
    if (bodyError) {
      logger.warn('Request body rejected', {
        code: bodyError.code,
        path: req.path,
        method: req.method,
        requestId
      });
      res.status(bodyError.statusCode).json(bodyError.toJSON());
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    logger.error('Unhandled request error', {
      error: message,
      stack: error instanceof Error ? error.stack : undefined,
      path: req.path,
      method: req.method,
      requestId
    });

    const body: ErrorResponse = {
      success: false,
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: options.exposeInternalErrors
          ? message
          : 'An unexpected error occurred. Please try again later.',
        timestamp: new Date().toISOString()
      }
    };
    res.status(HTTP_STATUS.INTERNAL_ERROR).json(body);
  };
}

interface BodyParserError extends Error {
  type: string;
  status: number;
}

function isBodyParserError(error: unknown): error is BodyParserError {
  return error instanceof Error
    && 'type' in error && typeof error.type === 'string'
    && 'status' in error && typeof error.status === 'number';
}

/**
 * 4xx errors of the body parser keep their status; anything else is ours to 500
 */
function fromBodyParserError(error: BodyParserError): AppError | null {
  switch (error.status) {
    case HTTP_STATUS.BAD_REQUEST:
      return new AppError(
        ErrorCode.VALIDATION_ERROR,
        error.type === 'entity.parse.failed' ? 'Malformed JSON body' : 'Malformed request body'
      );
    case HTTP_STATUS.PAYLOAD_TOO_LARGE:
      return new AppError(ErrorCode.PAYLOAD_TOO_LARGE, 'Request body is too large');
    case HTTP_STATUS.UNSUPPORTED_MEDIA_TYPE:
      return new AppError(ErrorCode.UNSUPPORTED_MEDIA_TYPE, 'Unsupported request body encoding');
    default:
      return null;
  }
}

/**
 * Async route wrapper to catch async errors
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Not found error handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  const body: ErrorResponse = {
    success: false,
    error: {
      code: ErrorCode.NOT_FOUND,
      message: `Cannot ${req.method} ${req.path}`,
      timestamp: new Date().toISOString()
    }
  };
  res.status(HTTP_STATUS.NOT_FOUND).json(body);
}
