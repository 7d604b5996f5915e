import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import type { ApiError } from './domain';
import { toApiError } from './mapper';

type ErrorBody = {
  statusCode: number;
  error: string;
  message: string;
  details?: unknown;
};

function toErrorBody(apiError: ApiError): ErrorBody {
  const body: ErrorBody = {
    statusCode: apiError.statusCode,
    error: apiError.code,
    message: apiError.message
  };
  if (apiError.details !== undefined) {
    body.details = apiError.details;
  }
  return body;
}

/**
 * Maps every thrown value to the JSON error body. Server faults are logged
 * with the original error; rejected requests only at debug level.
 */
export function createHttpErrorHandler() {
  return function httpErrorHandler(error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) {
    const apiError = toApiError(error);
    const context = { code: apiError.code, url: request.url };

    if (apiError.statusCode >= 500) {
      request.log.error({ ...context, err: error }, 'request failed');
    } else {
      request.log.debug({ ...context, message: apiError.message }, 'request rejected');
    }

    if (reply.sent) {
      return;
    }
    void reply.status(apiError.statusCode).header('cache-control', 'no-store').send(toErrorBody(apiError));
  };
}
