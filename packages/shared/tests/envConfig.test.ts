import assert from 'node:assert/strict';
import { test } from 'node:test';
import { z } from 'zod';
import { EnvConfigError, envParsers, loadEnvConfig } from '../src/envConfig';

const schema = z.object({
  ENABLED: envParsers.boolean({ defaultValue: false }),
  WORKERS: envParsers.integer({ min: 1, max: 8 }),
  NAME: envParsers.string({ required: true, lowercase: true }),
  LIST: envParsers.json({ schema: z.array(z.string()), defaultValue: [] })
});

test('applies defaults and normalizes values', () => {
  const values = loadEnvConfig(schema, { env: { NAME: ' Incidents ', ENABLED: 'on' } });
  assert.deepEqual(values, { ENABLED: true, NAME: 'incidents', LIST: [] });
});

test('parses json variables against their schema', () => {
  const values = loadEnvConfig(schema, { env: { NAME: 'x', LIST: '["a","b"]', WORKERS: '4' } });
  assert.deepEqual(values.LIST, ['a', 'b']);
  assert.equal(values.WORKERS, 4);
});

test('collects every issue under the given context', () => {
  assert.throws(
    () => loadEnvConfig(schema, { env: { ENABLED: 'maybe', WORKERS: '9', LIST: '[1]' }, context: 'test' }),
    (error: unknown) => {
      assert(error instanceof EnvConfigError);
      assert.deepEqual(error.issues, [
        'ENABLED: Invalid ENABLED. Accepted boolean values: 1, true, yes, on, 0, false, no, off',
        'WORKERS: WORKERS must be <= 8',
        'NAME: Missing required NAME',
        'LIST: LIST Expected string, received number'
      ]);
      assert.match(error.message, /^\[test\] Invalid environment configuration\n {2}- ENABLED: /);
      return true;
    }
  );
});
