export type HttpErrorOptions = {
  details?: unknown;
  retryable?: boolean;
};

export class HttpError extends Error {
  public readonly details?: unknown;
  public readonly retryable: boolean;

  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    options: HttpErrorOptions = {}
  ) {
    super(message);
    this.name = 'HttpError';
    this.details = options.details;
    this.retryable = options.retryable ?? false;
  }
}

function readProperty(value: object, key: string): unknown {
  return Reflect.get(value, key);
}

/** Adopts errors thrown by Fastify itself (body parsing, payload limits, schema validation). */
export function toHttpError(err: unknown): HttpError | null {
  if (err instanceof HttpError) {
    return err;
  }
  if (!err || typeof err !== 'object' || !('statusCode' in err)) {
    return null;
  }
  const statusCode = readProperty(err, 'statusCode');
  if (typeof statusCode !== 'number' || statusCode < 400 || statusCode >= 500) {
    return null;
  }
  const code = readProperty(err, 'code');
  const message = readProperty(err, 'message');
  return new HttpError(
    statusCode,
    typeof code === 'string' ? code : 'bad_request',
    typeof message === 'string' ? message : 'Bad request'
  );
}
