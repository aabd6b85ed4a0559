import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { AppError } from '@shared/errors/app-error.js';
import { formatZodError } from '@shared/errors/zod-error-formatter.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import { logger } from '@shared/utils/logger.js';

type SchemaValidationIssues = NonNullable<FastifyError['validation']>;

function hasSchemaValidation(
  error: FastifyError | Error
): error is FastifyError & { validation: SchemaValidationIssues } {
  return 'validation' in error && Array.isArray(error.validation);
}

export function errorHandler(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply
) {
  const requestId = request.id;

  // Zod validation error thrown from a handler
  if (error instanceof ZodError) {
    const appError = formatZodError(error);
    return reply.status(400).send({
      error: appError.message,
      code: appError.code,
      details: appError.details,
      requestId,
    });
  }

  // Known operational error
  if (error instanceof AppError) {
    logger.warn({ err: error, requestId }, error.message);
    return reply.status(error.statusCode).send({
      error: error.message,
      code: error.code,
      details: error.details,
      requestId,
    });
  }

  // Request schema validation
  if (hasSchemaValidation(error)) {
    const issues = error.validation.map((issue) => ({
      field: issue.instancePath.replace(/^\//, '').replace(/\//g, '.'),
      message: issue.message ?? 'Invalid value',
    }));
    return reply.status(400).send({
      error: 'Validation failed',
      code: ErrorCodes.VALIDATION_ERROR,
      details: { issues },
      requestId,
    });
  }

  // Other client errors raised by Fastify (malformed JSON, unsupported media type, oversized payload)
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    return reply.status(error.statusCode).send({
      error: error.message,
      code: ErrorCodes.BAD_REQUEST,
      requestId,
    });
  }

  // Unknown error
  logger.error({ err: error, requestId }, 'Unhandled error');
  return reply.status(500).send({
    error: 'Internal server error',
    code: ErrorCodes.INTERNAL_ERROR,
    requestId,
  });
}
