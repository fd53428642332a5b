import assert from 'node:assert/strict';
import { test } from 'node:test';
import { ValidationError } from '../../src/errors/domain';
import {
  parseClassificationListParams,
  parseHeatmapParams,
  parseListingLimit,
  parseSeasonalParams,
  parseTopNParams
} from '../../src/filters/aggregationParams';

test('top-n defaults n to 10 and coerces query strings', () => {
  assert.deepEqual(parseTopNParams({ category: 'operator' }), { category: 'operator', n: 10 });
  assert.deepEqual(parseTopNParams({ category: 'phase', n: '3' }), { category: 'phase', n: 3 });
});

test('top-n rejects unknown categories and out of range n', () => {
  assert.throws(() => parseTopNParams({ category: 'narrative' }), ValidationError);
  assert.throws(() => parseTopNParams({ category: 'operator', n: '0' }), (error: unknown) => {
    assert(error instanceof ValidationError);
    assert.deepEqual(error.issues, [{ field: 'n', message: 'n must be at least 1' }]);
    return true;
  });
  assert.throws(() => parseTopNParams({ category: 'operator', n: '101' }), ValidationError);
});

test('heatmap requires both dimensions', () => {
  assert.deepEqual(parseHeatmapParams({ dimension1: 'operator', dimension2: 'phase' }), {
    dimension1: 'operator',
    dimension2: 'phase'
  });
  assert.throws(() => parseHeatmapParams({ dimension1: 'operator' }), (error: unknown) => {
    assert(error instanceof ValidationError);
    assert.equal(error.issues[0]?.field, 'dimension2');
    return true;
  });
});

test('listing limit applies defaults and caps', () => {
  const limits = { defaultLimit: 50, maxLimit: 200 };
  assert.equal(parseListingLimit({}, limits), 50);
  assert.equal(parseListingLimit({ limit: '200' }, limits), 200);
  assert.throws(() => parseListingLimit({ limit: '201' }, limits), (error: unknown) => {
    assert(error instanceof ValidationError);
    assert.deepEqual(error.issues, [{ field: 'limit', message: 'limit must be at most 200' }]);
    return true;
  });
});

test('seasonal params are optional and ordered', () => {
  assert.deepEqual(parseSeasonalParams({}), { startYear: null, endYear: null });
  assert.deepEqual(parseSeasonalParams({ start_year: '2018', end_year: '2020' }), { startYear: 2018, endYear: 2020 });
  assert.throws(() => parseSeasonalParams({ start_year: '2021', end_year: '2020' }), ValidationError);
});

test('classification listing defaults to the first hundred results', () => {
  assert.deepEqual(parseClassificationListParams({}), { skip: 0, limit: 100, evaluatorId: null });
  assert.deepEqual(parseClassificationListParams({ skip: '20', limit: '5', evaluator_id: ' eva ' }), {
    skip: 20,
    limit: 5,
    evaluatorId: 'eva'
  });
  assert.throws(() => parseClassificationListParams({ skip: '-1' }), ValidationError);
});
