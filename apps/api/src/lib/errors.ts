import { STATUS_CODES } from 'node:http';
import type { FastifyError, FastifyReply } from 'fastify';

/**
 * An error that maps to a specific HTTP status when it reaches the error handler.
 */
export class AppError extends Error {
  constructor(
    readonly statusCode: number,
    message: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** Raised on writes when the service runs without a datastore. */
export class DatastoreUnavailableError extends AppError {
  constructor(message = 'Database not configured') {
    super(503, message);
    this.name = 'DatastoreUnavailableError';
  }
}

/** Errors Fastify raises itself carry a numeric HTTP status. */
export function isFastifyError(error: unknown): error is FastifyError {
  return (
    error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number'
  );
}

/**
 * Send a standardised error response: { statusCode, error, message }.
 */
export function sendError(reply: FastifyReply, statusCode: number, message: string): FastifyReply {
  return reply.status(statusCode).send({
    statusCode,
    error: STATUS_CODES[statusCode] ?? 'Unknown Error',
    message,
  });
}

/**
 * Send a 422 validation error with Zod issue details.
 */
export function sendValidationError(reply: FastifyReply, issues: readonly unknown[]): FastifyReply {
  return reply.status(422).send({
    statusCode: 422,
    error: 'Unprocessable Entity',
    message: 'Validation failed',
    details: issues,
  });
}
