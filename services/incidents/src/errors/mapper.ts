import {
  DatabaseUnavailableError,
  RecordNotFoundError,
  UnknownSourceKindError,
  ValidationError
} from './domain';
import { HttpError, toHttpError } from './httpError';

export function mapToHttpError(err: unknown): HttpError {
  if (err instanceof HttpError) {
    return err;
  }

  if (err instanceof ValidationError) {
    return new HttpError(400, 'validation_error', err.message, { details: err.issues });
  }

  if (err instanceof UnknownSourceKindError) {
    return new HttpError(400, 'unknown_source_kind', err.message, {
      details: { identifier: err.identifier, prefix: err.prefix }
    });
  }

  if (err instanceof RecordNotFoundError) {
    return new HttpError(404, 'not_found', err.message);
  }

  if (err instanceof DatabaseUnavailableError) {
    return new HttpError(503, 'database_unavailable', err.message, { retryable: true });
  }

  const httpLike = toHttpError(err);
  if (httpLike) {
    return httpLike;
  }

  return new HttpError(500, 'internal_error', 'Internal server error');
}
