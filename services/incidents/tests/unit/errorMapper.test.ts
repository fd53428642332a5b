import assert from 'node:assert/strict';
import { test } from 'node:test';
import { toDatabaseError } from '../../src/db/errors';
import {
  DatabaseUnavailableError,
  RecordNotFoundError,
  UnknownSourceKindError,
  ValidationError
} from '../../src/errors/domain';
import { HttpError } from '../../src/errors/httpError';
import { mapToHttpError } from '../../src/errors/mapper';

test('returns existing HttpError instance without modification', () => {
  const original = new HttpError(404, 'not_found', 'Missing');
  assert.equal(mapToHttpError(original), original);
});

test('maps ValidationError to 400 with the offending fields', () => {
  const mapped = mapToHttpError(ValidationError.forField('n', 'n must be at least 1'));
  assert.equal(mapped.statusCode, 400);
  assert.equal(mapped.code, 'validation_error');
  assert.equal(mapped.message, 'Invalid n: n must be at least 1');
  assert.deepEqual(mapped.details, [{ field: 'n', message: 'n must be at least 1' }]);
});

test('maps UnknownSourceKindError to 400 with the prefix', () => {
  const mapped = mapToHttpError(new UnknownSourceKindError('faa_1', 'faa'));
  assert.equal(mapped.statusCode, 400);
  assert.equal(mapped.code, 'unknown_source_kind');
  assert.deepEqual(mapped.details, { identifier: 'faa_1', prefix: 'faa' });
});

test('maps RecordNotFoundError to 404', () => {
  const mapped = mapToHttpError(new RecordNotFoundError('Record asrs_1 not found'));
  assert.equal(mapped.statusCode, 404);
  assert.equal(mapped.code, 'not_found');
  assert.equal(mapped.message, 'Record asrs_1 not found');
});

test('maps DatabaseUnavailableError to a retryable 503', () => {
  const mapped = mapToHttpError(new DatabaseUnavailableError('Database unavailable: down'));
  assert.equal(mapped.statusCode, 503);
  assert.equal(mapped.code, 'database_unavailable');
  assert.equal(mapped.retryable, true);
});

test('preserves 4xx statusCode and code from framework errors', () => {
  const mapped = mapToHttpError({ statusCode: 415, code: 'FST_ERR_CTP_INVALID_MEDIA_TYPE', message: 'Unsupported' });
  assert.equal(mapped.statusCode, 415);
  assert.equal(mapped.code, 'FST_ERR_CTP_INVALID_MEDIA_TYPE');
  assert.equal(mapped.message, 'Unsupported');
});

test('hides details of unexpected failures', () => {
  const mapped = mapToHttpError(new Error('relation "asrs_records" does not exist'));
  assert.equal(mapped.statusCode, 500);
  assert.equal(mapped.code, 'internal_error');
  assert.equal(mapped.message, 'Internal server error');
});

test('does not adopt 5xx status codes from plain objects', () => {
  assert.equal(mapToHttpError({ statusCode: 502, message: 'bad gateway' }).statusCode, 500);
});

test('classifies connection failures as database unavailability', () => {
  const refused = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), { code: 'ECONNREFUSED' });
  const translated = toDatabaseError(refused);
  assert(translated instanceof DatabaseUnavailableError);
  assert.equal(translated.message, 'Database unavailable: connect ECONNREFUSED 127.0.0.1:5432');
  assert.equal(translated.cause, refused);

  const canceled = Object.assign(new Error('canceling statement due to statement timeout'), { code: '57014' });
  assert(toDatabaseError(canceled) instanceof DatabaseUnavailableError);

  const pooled = new Error('timeout exceeded when trying to connect');
  assert(toDatabaseError(pooled) instanceof DatabaseUnavailableError);
});

test('leaves query errors untouched', () => {
  const syntax = Object.assign(new Error('syntax error at or near "FROM"'), { code: '42601' });
  assert.equal(toDatabaseError(syntax), syntax);
});
