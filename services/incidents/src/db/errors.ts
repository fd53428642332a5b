import { DatabaseUnavailableError } from '../errors/domain';

const UNAVAILABLE_SQLSTATES = new Set(['57P01', '57P02', '57P03', '57014', '53300']);
const UNAVAILABLE_SYSTEM_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EHOSTUNREACH', 'ENOTFOUND', 'EPIPE']);
const UNAVAILABLE_MESSAGES = [
  'timeout exceeded when trying to connect',
  'Connection terminated',
  'Client has encountered a connection error'
];

function readCode(err: Error): string | null {
  const code: unknown = Reflect.get(err, 'code');
  return typeof code === 'string' ? code : null;
}

/**
 * True for failures that say nothing about the query itself: the pool could
 * not hand out a connection, the server went away, or the statement timed out.
 */
export function isDatabaseUnavailable(err: unknown): err is Error {
  if (!(err instanceof Error)) {
    return false;
  }
  const code = readCode(err);
  if (code) {
    if (code.startsWith('08') || UNAVAILABLE_SQLSTATES.has(code) || UNAVAILABLE_SYSTEM_CODES.has(code)) {
      return true;
    }
  }
  return UNAVAILABLE_MESSAGES.some((fragment) => err.message.includes(fragment));
}

export function toDatabaseError(err: unknown): unknown {
  if (err instanceof DatabaseUnavailableError || !isDatabaseUnavailable(err)) {
    return err;
  }
  return new DatabaseUnavailableError(`Database unavailable: ${err.message}`, { cause: err });
}
