/**
 * Error handling
 *
 * API error type, the mapping of service errors to HTTP statuses and the
 * error response body.
 */

import { PictureError, type PictureErrorCode } from '@picstore/services';

export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }

  static badRequest(message: string, details?: unknown): ApiError {
    return new ApiError(400, message, details);
  }

  static notFound(message: string = 'Not found'): ApiError {
    return new ApiError(404, message);
  }

  static payloadTooLarge(message: string, details?: unknown): ApiError {
    return new ApiError(413, message, details);
  }

  static internalError(message: string = 'Internal server error', details?: unknown): ApiError {
    return new ApiError(500, message, details);
  }
}

export interface ErrorResponse {
  error: string;
  details?: unknown;
  timestamp: string;
}

const PICTURE_ERROR_STATUS: Record<PictureErrorCode, number> = {
  invalid_format: 400,
  dimensions_exceeded: 400,
  too_large: 413,
  not_found: 404,
  io: 500,
  database: 500
};

function hasStatusCode(error: unknown): error is Error & { statusCode: number } {
  return (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
  );
}

/** HTTP status for any thrown value */
export function statusCodeFor(error: unknown): number {
  if (error instanceof ApiError) {
    return error.statusCode;
  }
  if (error instanceof PictureError) {
    return PICTURE_ERROR_STATUS[error.code];
  }
  if (hasStatusCode(error) && error.statusCode >= 400 && error.statusCode < 600) {
    return error.statusCode;
  }
  return 500;
}

export function formatErrorResponse(error: unknown): ErrorResponse {
  const timestamp = new Date().toISOString();

  if (error instanceof ApiError) {
    return {
      error: error.message,
      details: error.details,
      timestamp
    };
  }

  if (error instanceof PictureError) {
    return {
      error: error.message,
      details: { code: error.code },
      timestamp
    };
  }

  if (error instanceof Error) {
    return {
      error: statusCodeFor(error) >= 500 ? 'Internal server error' : error.message,
      timestamp
    };
  }

  return {
    error: String(error),
    timestamp
  };
}
