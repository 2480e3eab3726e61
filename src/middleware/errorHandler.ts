/**
 * Express error handling for the relay API
 */
import type { Request, Response, NextFunction } from 'express';
import { RelayError, RelayErrorCode } from '../utils/errors.js';
import { contextLogger } from '../utils/logger.js';

const log = contextLogger('ErrorHandler');

/**
 * Map relay error codes to HTTP statuses
 */
export function getStatusCodeForRelayError(code: RelayErrorCode): number {
  switch (code) {
    case 'SESSION_UNKNOWN':
      return 404;

    case 'PAYLOAD_TOO_LARGE':
      return 413;

    case 'INVALID_FRAME':
    case 'INVALID_REQUEST':
      return 400;

    case 'TRANSPORT_UNAVAILABLE':
    case 'CAPTURE_UNAVAILABLE':
      return 503;

    default:
      return 500;
  }
}

/**
 * body-parser rejects oversized bodies before they reach a route
 */
function isEntityTooLarge(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.too.large';
}

export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    return next(error);
  }

  if (error instanceof RelayError) {
    log('debug', `${req.method} ${req.path} rejected: ${error.code} ${error.message}`);
    res.status(getStatusCodeForRelayError(error.code)).json({
      success: false,
      error: error.message,
      code: error.code,
    });
    return;
  }

  if (isEntityTooLarge(error)) {
    res.status(413).json({
      success: false,
      error: 'Frame payload exceeds the configured limit',
      code: 'PAYLOAD_TOO_LARGE',
    });
    return;
  }

  log('error', `Unhandled error on ${req.method} ${req.path}:`, error);

  const isDevelopment = process.env.NODE_ENV === 'development';
  res.status(500).json({
    success: false,
    error: isDevelopment && error instanceof Error ? error.message : 'Internal server error',
    code: 'INTERNAL_ERROR',
  });
}

/**
 * Wrap an async route handler so rejections reach the error middleware
 */
export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
