import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import {
  ConfigurationError,
  ExtractionRuntimeError,
  JobStateError,
  ModelLoadError,
  RemoteServiceError,
} from '../../extraction/errors';

export interface ApiError extends Error {
  statusCode?: number;
  code?: string;
}

export function createError(
  message: string,
  statusCode: number = 500,
  code?: string
): ApiError {
  const error: ApiError = new Error(message);
  error.statusCode = statusCode;
  error.code = code;
  return error;
}

function domainStatus(error: Error): number | undefined {
  if (error instanceof ConfigurationError) return 400;
  if (error instanceof JobStateError) return 409;
  if (error instanceof RemoteServiceError) return 502;
  if (error instanceof ModelLoadError) return 503;
  if (error instanceof ExtractionRuntimeError) return 500;
  return undefined;
}

export async function errorHandler(
  error: FastifyError | ApiError,
  request: FastifyRequest,
  reply: FastifyReply
) {
  const statusCode = domainStatus(error) ?? error.statusCode ?? 500;
  const message = error.message || 'Internal Server Error';

  if (statusCode >= 500) {
    request.log.error(error, 'Request error');
  } else {
    request.log.warn({ err: error }, 'Request rejected');
  }

  reply.status(statusCode).send({
    error: {
      message,
      code: error.code || 'INTERNAL_ERROR',
      statusCode,
    },
  });
}
