import type { FastifyError, FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';

import { getLogger } from './logger';
import type { ErrorOrigin, ErrorResponse, RequestContext } from './types';

export interface ServiceErrorOptions {
  statusCode?: number;
  code?: string;
  origin?: ErrorOrigin;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ServiceError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly origin: ErrorOrigin;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    { statusCode = 500, code = 'internal', origin = 'service', details, cause }: ServiceErrorOptions = {}
  ) {
    super(message);
    this.name = 'ServiceError';
    this.statusCode = statusCode;
    this.code = code;
    this.origin = origin;
    this.details = details;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

type ErrorFactory = (message: string, details?: Record<string, unknown>) => ServiceError;

function errorFactory(statusCode: number, code: string): ErrorFactory {
  return (message: string, details?: Record<string, unknown>) => new ServiceError(message, { statusCode, code, details });
}

export const badRequestError = errorFactory(400, 'bad_request');
export const notFoundError = errorFactory(404, 'not_found');

interface SanitizedError {
  statusCode: number;
  payload: ErrorResponse;
}

function isFastifyValidationError(err: unknown): err is FastifyError {
  return err instanceof Error && 'validation' in err && err.validation !== undefined;
}

export function sanitizeError(err: unknown): SanitizedError {
  if (err instanceof ServiceError) {
    return {
      statusCode: err.statusCode,
      payload: {
        code: err.code,
        message: err.message,
        origin: err.origin,
        details: err.details
      }
    };
  }

  if (isFastifyValidationError(err)) {
    return {
      statusCode: 400,
      payload: {
        code: 'bad_request',
        message: err.message,
        origin: 'service'
      }
    };
  }

  if (err instanceof Error) {
    return {
      statusCode: 500,
      payload: {
        code: 'internal',
        message: 'An unexpected error occurred.',
        origin: 'service'
      }
    };
  }

  return {
    statusCode: 500,
    payload: {
      code: 'internal',
      message: 'Unknown error.',
      origin: 'service'
    }
  };
}

function shouldLogError(statusCode: number): boolean {
  return statusCode >= 500;
}

export const errorHandlerPlugin: FastifyPluginAsync = fp(async (fastify) => {
  const logger = getLogger({ module: 'error-handler' });

  fastify.setErrorHandler(async (err: unknown, request: FastifyRequest, reply: FastifyReply) => {
    const sanitized = sanitizeError(err);
    const requestContext = request.requestContext as RequestContext | undefined;
    const bindings = { err, requestId: requestContext?.requestId, origin: sanitized.payload.origin };

    if (shouldLogError(sanitized.statusCode)) {
      logger.error(bindings, 'Request failed with server error.');
    } else {
      logger.warn(bindings, 'Request failed with client error.');
    }

    if (!reply.sent) {
      reply.status(sanitized.statusCode).send(sanitized.payload);
    }
  });
});
