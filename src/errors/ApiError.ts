/**
 * Error Class Hierarchy
 *
 * Every error raised by the MVC layer maps to an HTTP status code and a
 * machine-readable code. Two families matter to callers:
 *
 * - ConfigurationError: the application is wired incorrectly (unsupported
 *   controller return type, missing default view, no locale resolver).
 *   Raised at registration/startup and aborts it.
 * - RequestError: one request could not be completed (null view without a
 *   default, no engine for a view). Converted to a 500 response by the
 *   error handler; never affects other requests.
 *
 * ```typescript
 * if (error instanceof ApiError) {
 *   res.status(error.statusCode).json(error.toResponse(requestId));
 * }
 * ```
 */

/**
 * Standard error response structure
 */
export interface ApiErrorResponse {
  error: string;
  code: string;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
  requestId?: string;
}

/**
 * Error codes for machine-readable error identification
 */
export const ErrorCodes = {
  // Not found errors (404)
  NOT_FOUND: 'NOT_FOUND',

  // Configuration errors (500, fatal)
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  UNSUPPORTED_RETURN_TYPE: 'UNSUPPORTED_RETURN_TYPE',
  MISSING_DEFAULT_VIEW: 'MISSING_DEFAULT_VIEW',
  NO_LOCALE_RESOLVED: 'NO_LOCALE_RESOLVED',

  // Request errors (500, recovered per request)
  REQUEST_ERROR: 'REQUEST_ERROR',
  NO_VIEW: 'NO_VIEW',
  NO_VIEW_ENGINE: 'NO_VIEW_ENGINE',
  UNEXPECTED_RESULT: 'UNEXPECTED_RESULT',
  UNKNOWN_ROUTE: 'UNKNOWN_ROUTE',

  // Internal errors (500)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class
 *
 * All errors raised by this package extend this class so the error handler
 * can render them uniformly.
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;
  readonly timestamp: Date;
  readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number,
    code: ErrorCode,
    details?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    this.isOperational = isOperational;

    // Maintain proper stack trace for V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to response format
   */
  toResponse(requestId?: string): ApiErrorResponse {
    return {
      error: this.name.replace('Error', ''),
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp.toISOString(),
      requestId,
    };
  }
}

// =============================================================================
// Not Found Errors (404)
// =============================================================================

export class NotFoundError extends ApiError {
  constructor(
    message: string = 'Resource not found',
    details?: Record<string, unknown>
  ) {
    super(message, 404, ErrorCodes.NOT_FOUND, details);
  }
}

// =============================================================================
// Configuration Errors (fatal)
// =============================================================================

export class ConfigurationError extends ApiError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.CONFIGURATION_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, 500, code, details, false);
  }
}

export class UnsupportedReturnTypeError extends ConfigurationError {
  constructor(controller: string, returnKind: unknown) {
    super(
      `Controller ${controller} declares an unsupported return type`,
      ErrorCodes.UNSUPPORTED_RETURN_TYPE,
      { controller, returnKind: String(returnKind) }
    );
  }
}

export class MissingDefaultViewError extends ConfigurationError {
  constructor(controller: string) {
    super(
      `Controller ${controller} returns nothing and has no default view`,
      ErrorCodes.MISSING_DEFAULT_VIEW,
      { controller }
    );
  }
}

export class NoLocaleResolvedError extends ConfigurationError {
  constructor(resolvers: string[]) {
    super(
      'No locale resolver produced a locale',
      ErrorCodes.NO_LOCALE_RESOLVED,
      { resolvers }
    );
  }
}

// =============================================================================
// Request Errors (500, per request)
// =============================================================================

export class RequestError extends ApiError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.REQUEST_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, 500, code, details, true);
  }
}

export class NoViewError extends RequestError {
  constructor(controller: string) {
    super(
      `Controller ${controller} returned no view and has no default view`,
      ErrorCodes.NO_VIEW,
      { controller }
    );
  }
}

export class NoViewEngineError extends RequestError {
  constructor(view: string) {
    super(`No view engine supports view ${view}`, ErrorCodes.NO_VIEW_ENGINE, { view });
  }
}

// =============================================================================
// Internal Errors (500)
// =============================================================================

export class InternalError extends ApiError {
  constructor(
    message: string = 'An unexpected error occurred',
    details?: Record<string, unknown>
  ) {
    super(message, 500, ErrorCodes.INTERNAL_ERROR, details, false);
  }
}
