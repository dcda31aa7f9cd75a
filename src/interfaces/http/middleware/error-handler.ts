import { STATUS_CODES } from 'node:http';
import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { isAppError } from '../../../application/index.js';

export interface ApiError {
  statusCode: number;
  error: string;
  message: string;
  code?: string;
  details?: unknown;
}

const GENERIC_SERVER_ERROR = 'Internal Server Error';

function resolveStatusCode(error: FastifyError): number {
  if (isAppError(error)) {
    return error.statusCode;
  }
  // Fastify's own errors (body too large, bad content length, ...)
  if (typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 600) {
    return error.statusCode;
  }
  return 500;
}

/**
 * Last line of the pipeline: every fault a handler throws or rejects
 * with ends up here and becomes a response. Client errors keep their
 * status and message; unknown faults become a generic 500 and are logged.
 */
export function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply,
): FastifyReply {
  const statusCode = resolveStatusCode(error);
  const known = isAppError(error);

  const body: ApiError = {
    statusCode,
    error: STATUS_CODES[statusCode] ?? 'Error',
    message: statusCode >= 500 && !known ? GENERIC_SERVER_ERROR : error.message,
  };

  if (error.code !== undefined && (known || statusCode < 500)) {
    body.code = error.code;
  }
  if (isAppError(error) && error.details !== undefined) {
    body.details = error.details;
  }

  if (statusCode >= 500) {
    request.log.error({ err: error }, 'Request failed');
  }

  return reply.status(statusCode).send(body);
}
