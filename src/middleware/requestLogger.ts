/**
 * Request Logger Middleware
 *
 * Provides request correlation IDs and request lifecycle logging.
 * - Assigns unique request ID to each incoming request
 * - Logs request start and completion with duration
 * - Makes request context available throughout the request lifecycle
 * - Sets X-Request-ID response header for client correlation
 */

import { Request, Response, NextFunction } from 'express';
import { requestContext, type RequestContextData } from '../utils/requestContext';
import { createLogger } from '../utils/logger';
import { headerValue } from '../i18n/types';

const log = createLogger('HTTP');

/**
 * Paths to exclude from detailed logging
 */
const EXCLUDED_PATHS = ['/favicon.ico'];

/** Incoming correlation IDs longer than this are replaced */
const MAX_REQUEST_ID_LENGTH = 64;

function incomingRequestId(req: Request): string | undefined {
  const id = headerValue(req, 'x-request-id') || headerValue(req, 'x-correlation-id');
  return id && id.length <= MAX_REQUEST_ID_LENGTH ? id : undefined;
}

/**
 * Request logger middleware
 *
 * Wraps each request in a context with a unique request ID.
 * Logs request start and completion with timing information.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  // Generate or use existing request ID (from load balancer/proxy)
  const requestId = incomingRequestId(req) ?? requestContext.generateRequestId();

  const context: RequestContextData = {
    requestId,
    startTime: Date.now(),
    path: req.path,
    method: req.method,
  };

  // Set response header for client correlation
  res.setHeader('X-Request-ID', requestId);

  const isExcluded = EXCLUDED_PATHS.includes(req.path);

  // Run the rest of the request in the context
  requestContext.run(context, () => {
    if (!isExcluded) {
      log.debug(`${req.method} ${req.path}`, {
        userAgent: req.headers['user-agent']?.substring(0, 50),
      });
    }

    res.on('finish', () => {
      if (isExcluded) return;

      const statusCode = res.statusCode;
      const logData = {
        status: statusCode,
        duration: `${Date.now() - context.startTime}ms`,
        ...(context.locale ? { locale: context.locale } : {}),
      };

      // Determine log level based on status code
      if (statusCode >= 500) {
        log.error(`${req.method} ${req.path} completed`, logData);
      } else if (statusCode >= 400) {
        log.warn(`${req.method} ${req.path} completed`, logData);
      } else {
        log.info(`${req.method} ${req.path} completed`, logData);
      }
    });

    next();
  });
}

export default requestLogger;
