import type { FastifyReply, FastifyRequest } from 'fastify';
import { SchemaViolation } from '../../extraction/errors';

export class ApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code?: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export function createError(
  message: string,
  statusCode: number = 500,
  code?: string,
  details?: Record<string, unknown>
): ApiError {
  return new ApiError(message, statusCode, code, details);
}

function toApiError(error: Error): ApiError {
  if (error instanceof ApiError) {
    return error;
  }
  if (error instanceof SchemaViolation) {
    return createError(error.message, 400, 'SCHEMA_VIOLATION', {
      path: error.path,
      expected: error.expected,
      received: error.received,
    });
  }
  const statusCode =
    'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : 500;
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return createError(error.message || 'Internal Server Error', statusCode, code);
}

export async function errorHandler(
  error: Error,
  request: FastifyRequest,
  reply: FastifyReply
) {
  const apiError = toApiError(error);

  if (apiError.statusCode >= 500) {
    request.log.error(error, 'Request error');
  } else {
    request.log.warn({ code: apiError.code, message: apiError.message }, 'Request rejected');
  }

  reply.status(apiError.statusCode).send({
    error: {
      message: apiError.message,
      code: apiError.code || 'INTERNAL_ERROR',
      statusCode: apiError.statusCode,
      ...(apiError.details ? { details: apiError.details } : {}),
    },
  });
}
