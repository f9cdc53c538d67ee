/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Every failure a client can see is an AppError. The error code decides the
 * HTTP status (see ERROR_STATUS), so a class only picks its code and message.
 *
 * USAGE:
 * ```typescript
 * // In a geocoder
 * throw new AddressNotFoundError('ul. Ivaylo 5, Sofia');
 *
 * // In route handler
 * throw ValidationError.fromZodError(parsed.error);
 * ```
 *
 * The quoting core raises the domain errors below and never retries; the
 * error middleware renders `toJSON()` with `statusCode`.
 * =============================================================================
 */

import { ErrorCode, HTTP_STATUS } from '../constants';

/**
 * HTTP status per error code
 */
export const ERROR_STATUS: Record<ErrorCode, number> = {
  [ErrorCode.VALIDATION_ERROR]: HTTP_STATUS.BAD_REQUEST,
  [ErrorCode.INVALID_INPUT]: HTTP_STATUS.BAD_REQUEST,
  [ErrorCode.PAYLOAD_TOO_LARGE]: HTTP_STATUS.PAYLOAD_TOO_LARGE,
  [ErrorCode.UNSUPPORTED_MEDIA_TYPE]: HTTP_STATUS.UNSUPPORTED_MEDIA_TYPE,
  [ErrorCode.ADDRESS_NOT_FOUND]: HTTP_STATUS.NOT_FOUND,
  [ErrorCode.GEOCODE_SERVICE_ERROR]: HTTP_STATUS.BAD_GATEWAY,
  [ErrorCode.NO_ROUTE_FOUND]: HTTP_STATUS.UNPROCESSABLE,
  [ErrorCode.ROUTE_SERVICE_ERROR]: HTTP_STATUS.BAD_GATEWAY,
  [ErrorCode.NOT_FOUND]: HTTP_STATUS.NOT_FOUND,
  [ErrorCode.RATE_LIMIT_EXCEEDED]: HTTP_STATUS.TOO_MANY_REQUESTS,
  [ErrorCode.INTERNAL_ERROR]: HTTP_STATUS.INTERNAL_ERROR
};

/**
 * Body of every error response
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
    timestamp: string;
  };
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly timestamp = new Date().toISOString();

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = ERROR_STATUS[code];

    // Set prototype explicitly (extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): ErrorResponse {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details && { details: this.details }),
        timestamp: this.timestamp
      }
    };
  }
}

// =============================================================================
// REQUEST ERRORS
// =============================================================================

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

/**
 * 400 - request body or query failed its schema
 */
export class ValidationError extends AppError {
  constructor(
    message: string = 'Validation failed',
    public readonly errors: ValidationErrorDetail[] = []
  ) {
    super(ErrorCode.VALIDATION_ERROR, message, { errors });
  }

  static fromZodError(zodError: { errors: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const errors = zodError.errors.map(err => ({
      field: err.path.join('.'),
      message: err.message
    }));
    return new ValidationError(errors[0]?.message ?? 'Validation failed', errors);
  }
}

/**
 * 429 - per-client throttle hit
 */
export class RateLimitError extends AppError {
  constructor(message: string = 'Too many requests', public readonly retryAfter: number = 1) {
    super(ErrorCode.RATE_LIMIT_EXCEEDED, message, { retryAfter });
  }
}

// =============================================================================
// QUOTING DOMAIN ERRORS
// =============================================================================

/**
 * Bad size class, negative or non-finite distance
 */
export class InvalidInputError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.INVALID_INPUT, message, details);
  }
}

/**
 * The geocoder answered but had no match for the address
 */
export class AddressNotFoundError extends AppError {
  constructor(public readonly address: string) {
    super(ErrorCode.ADDRESS_NOT_FOUND, `Address not found: ${address}`, { address });
  }
}

/**
 * Network, timeout or malformed response while geocoding
 */
export class GeocodeServiceError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.GEOCODE_SERVICE_ERROR, message, details);
  }
}

/**
 * The routing service answered but found no road route between the points
 */
export class NoRouteFoundError extends AppError {
  constructor(message: string = 'No route found between the given points', details?: Record<string, unknown>) {
    super(ErrorCode.NO_ROUTE_FOUND, message, details);
  }
}

/**
 * Network, timeout or malformed response while routing
 */
export class RouteServiceError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.ROUTE_SERVICE_ERROR, message, details);
  }
}

/**
 * Message of any thrown value, for logs
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
