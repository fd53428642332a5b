import assert from 'node:assert/strict';
import { test } from 'node:test';
import { parseFilterSpecification, UNRESTRICTED_FILTER } from '../../src/filters/filterSpecification';
import { buildQueryPlan } from '../../src/query/planBuilder';
import { buildSourceProjection, compileQueryPlan } from '../../src/query/sqlCompiler';
import { getSource } from '../../src/sources/registry';

test('projects a source onto the unified incident columns', () => {
  assert.equal(
    buildSourceProjection(getSource('asrs')),
    'SELECT "uid" AS uid, "sanitized_date" AS incident_date, "phase" AS phase, "aircraft_type" AS aircraft_type, ' +
      '"place" AS location, "operator" AS operator FROM "asrs_records"'
  );
});

test('projects a missing column as typed NULL', () => {
  assert.match(buildSourceProjection(getSource('pci')), /NULL::text AS phase/);
});

test('unions every source inside the incidents CTE', () => {
  const query = compileQueryPlan(buildQueryPlan(UNRESTRICTED_FILTER, { kind: 'statistics' }));
  const lines = query.text.split('\n');
  assert.equal(lines[0], 'WITH incidents AS (');
  assert.equal(lines[2], '  UNION ALL');
  assert.equal(lines[4], '  UNION ALL');
  assert.equal(lines[6], ')');
  assert.deepEqual(lines.slice(7), [
    'SELECT COUNT(*) AS total_incidents',
    'FROM incidents',
    'WHERE uid IS NOT NULL AND incident_date IS NOT NULL'
  ]);
  assert.deepEqual(query.values, []);
});

test('binds filter values as parameters in predicate order', () => {
  const filter = parseFilterSpecification({
    operators: 'Delta',
    start_period: '2019-01',
    end_period: '2019-12'
  });
  const query = compileQueryPlan(buildQueryPlan(filter, { kind: 'top-n', category: 'operator', n: 5 }));
  const lines = query.text.split('\n').slice(7);
  assert.deepEqual(lines, [
    'SELECT operator AS category, COUNT(*) AS incident_count',
    'FROM incidents',
    'WHERE uid IS NOT NULL AND incident_date IS NOT NULL AND operator = ANY($1::text[]) ' +
      'AND incident_date >= $2::date AND incident_date < $3::date AND operator IS NOT NULL',
    'GROUP BY operator',
    'ORDER BY incident_count DESC, operator COLLATE "C" ASC',
    'LIMIT $4'
  ]);
  assert.deepEqual(query.values, [['Delta'], '2019-01-01', '2020-01-01', 5]);
});

test('buckets periods with to_char for yearly granularity', () => {
  const filter = parseFilterSpecification({ period_granularity: 'year' });
  const query = compileQueryPlan(buildQueryPlan(filter, { kind: 'over-time' }));
  assert.match(
    query.text,
    /SELECT to_char\(date_trunc\('year', incident_date\), 'YYYY'\) AS period, COUNT\(\*\) AS incident_count/
  );
  assert.match(query.text, /\nORDER BY period ASC$/);
});

test('compares heatmap labels by code point', () => {
  const query = compileQueryPlan(
    buildQueryPlan(UNRESTRICTED_FILTER, { kind: 'heatmap', dimension1: 'operator', dimension2: 'location' })
  );
  assert.match(query.text, /\nGROUP BY operator, location\n/);
  assert.match(
    query.text,
    /\nORDER BY incident_count DESC, operator COLLATE "C" ASC, location COLLATE "C" ASC$/
  );
});

test('rejects plans without columns', () => {
  const plan = buildQueryPlan(UNRESTRICTED_FILTER, { kind: 'statistics' });
  assert.throws(() => compileQueryPlan({ ...plan, select: [] }), /must select at least one column/);
});

test('rejects ordering on a column that is not selected', () => {
  const plan = buildQueryPlan(UNRESTRICTED_FILTER, { kind: 'statistics' });
  assert.throws(
    () => compileQueryPlan({ ...plan, orderBy: [{ alias: 'operator', direction: 'asc', binaryCollation: true }] }),
    /Order term references unknown column: operator/
  );
});
