import { ZodError } from 'zod';
import {
  ApiError,
  EmptyResolutionError,
  FeatureSchemaChangedError,
  FeatureTableMissingError,
  RequestValidationError,
  UnprocessableQueryError
} from './domain';

/**
 * Errors Fastify raises itself (bad JSON, unsupported media type, ...) carry
 * their own 4xx status and an `FST_ERR_*` code.
 */
function fromFrameworkError(err: unknown): ApiError | null {
  if (typeof err !== 'object' || err === null || !('statusCode' in err) || typeof err.statusCode !== 'number') {
    return null;
  }
  const code = 'code' in err && typeof err.code === 'string' ? err.code : 'request_error';
  const message = 'message' in err && typeof err.message === 'string' ? err.message : 'Request failed';
  return new ApiError(err.statusCode, code, message);
}

export function toApiError(err: unknown): ApiError {
  if (err instanceof ApiError) {
    return err;
  }

  if (err instanceof RequestValidationError) {
    return new ApiError(400, 'validation_error', 'Request validation failed', err.errors);
  }

  if (err instanceof EmptyResolutionError) {
    return new ApiError(400, 'empty_resolution', err.message, {
      level: err.level,
      target: err.target,
      requested: err.requested,
      upstream: err.upstream
    });
  }

  if (err instanceof UnprocessableQueryError) {
    return new ApiError(422, 'unprocessable_query', err.message);
  }

  if (err instanceof FeatureTableMissingError) {
    return new ApiError(500, 'feature_table_missing', err.message, { feature: err.feature });
  }

  if (err instanceof FeatureSchemaChangedError) {
    return new ApiError(500, 'feature_schema_changed', err.message, { feature: err.feature });
  }

  if (err instanceof ZodError) {
    return new ApiError(
      400,
      'validation_error',
      'Request validation failed',
      err.issues.map((issue) => ({ field: issue.path.join('.') || 'request', message: issue.message }))
    );
  }

  const framework = fromFrameworkError(err);
  if (framework) {
    return framework;
  }

  const message = err instanceof Error ? err.message : 'Unknown error';
  return new ApiError(500, 'internal_error', message);
}
