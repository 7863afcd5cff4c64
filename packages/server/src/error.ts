/**
 * Error handling
 *
 * API error types and error response formatting.
 */

import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { DatabaseError } from '@photodrop/db';
import { StorageError } from '@photodrop/services';

export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
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

  static serviceUnavailable(message: string = 'Service unavailable', cause?: unknown): ApiError {
    return new ApiError(503, message, undefined, { cause });
  }

  static internalError(message: string = 'Internal server error', cause?: unknown): ApiError {
    return new ApiError(500, message, undefined, { cause });
  }
}

export interface ErrorResponse {
  error: string;
  details?: unknown;
  timestamp: string;
}

/**
 * Map any thrown value to an ApiError. Internal failures get a fixed
 * message; the original error rides along as `cause` for logging.
 */
export function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }

  if (error instanceof StorageError) {
    return ApiError.internalError('Failed to save image file', error);
  }

  if (error instanceof DatabaseError) {
    return ApiError.internalError('Database error', error);
  }

  if (isFastifyError(error)) {
    if (error.validation) {
      return ApiError.badRequest(error.message, error.validation);
    }
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return new ApiError(error.statusCode, error.message, undefined, { cause: error });
    }
  }

  return ApiError.internalError('Internal server error', error);
}

function isFastifyError(error: unknown): error is FastifyError {
  return error instanceof Error && ('statusCode' in error || 'validation' in error);
}

export function formatErrorResponse(error: ApiError): ErrorResponse {
  return {
    error: error.message,
    details: error.details,
    timestamp: new Date().toISOString()
  };
}

export function errorHandler(error: unknown, request: FastifyRequest, reply: FastifyReply): FastifyReply {
  const apiError = toApiError(error);

  if (apiError.statusCode >= 500) {
    request.log.error({ err: apiError.cause ?? apiError }, apiError.message);
  }

  return reply.status(apiError.statusCode).send(formatErrorResponse(apiError));
}
