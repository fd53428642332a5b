import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { QueryResultRow } from 'pg';
import { buildPartitionQuery, retrieveBulk } from '../../src/retrieval/bulkRetriever';
import { getSource } from '../../src/sources/registry';
import { RecordingClient } from '../utils/recordingClient';

function mergedRow(uid: string, overrides: QueryResultRow = {}): QueryResultRow {
  return {
    id: 1,
    source_uid: uid,
    model_version: 'v2',
    predicted_category: 'LOC-I',
    predicted_confidence: '0.8',
    final_category: null,
    is_complete: false,
    evaluator_id: null,
    processed_at: new Date('2024-02-01T10:00:00.000Z'),
    origin_uid: uid,
    origin_date: '2019-04-01',
    origin_phase: 'Approach',
    origin_aircraft_type: 'A320',
    origin_location: 'KSFO',
    origin_operator: 'Delta',
    origin_narrative: 'Unstable approach',
    ...overrides
  };
}

test('joins the newest classification result to its source row', () => {
  const lines = buildPartitionQuery(getSource('asrs')).split('\n');
  assert.equal(lines.length, 5);
  assert.match(lines[0] ?? '', /^SELECT DISTINCT ON \(cr\.source_uid\) cr\.id, cr\.source_uid, /);
  assert.match(lines[0] ?? '', /src\."time"::text AS origin_date/);
  assert.match(lines[0] ?? '', /src\."synopsis"::text AS origin_narrative$/);
  assert.deepEqual(lines.slice(1), [
    'FROM classification_results cr',
    'JOIN "asrs_records" src ON src."uid" = cr.source_uid',
    'WHERE cr.source_uid = ANY($1::text[])',
    'ORDER BY cr.source_uid, cr.processed_at DESC NULLS LAST, cr.id DESC'
  ]);
});

test('projects a missing origin column as NULL', () => {
  assert.match(buildPartitionQuery(getSource('pci')), /NULL::text AS origin_phase/);
});

test('queries one partition per source and reports misses', async () => {
  const client = new RecordingClient([], (query) => {
    if (query.text.includes('"asrs_records"')) {
      return [mergedRow('asrs_1'), mergedRow('asrs_2', { id: 2, origin_operator: 'United', origin_phase: null })];
    }
    return [];
  });

  const result = await retrieveBulk(client, ['asrs_1', 'pci_9', 'asrs_2', 'asrs_3', 'faa_1']);

  assert.equal(client.queries.length, 2);
  assert.deepEqual(client.queries[0]?.values, [['asrs_1', 'asrs_2', 'asrs_3']]);
  assert.deepEqual(client.queries[1]?.values, [['pci_9']]);
  assert.deepEqual(Array.from(result.results.keys()), ['asrs_1', 'asrs_2']);
  assert.deepEqual(result.notFound, ['asrs_3', 'pci_9']);
  assert.deepEqual(result.unresolved, ['faa_1']);

  const first = result.results.get('asrs_1');
  assert.equal(first?.predictedConfidence, 0.8);
  assert.equal(first?.processedAt, '2024-02-01T10:00:00.000Z');
  assert.equal(first?.origin.sourceKind, 'asrs');
  assert.equal(first?.origin.narrative, 'Unstable approach');

  assert.equal(result.aggregates.totalIncidents, 2);
  assert.equal(result.aggregates.uniqueOperators, 2);
  assert.deepEqual(Array.from(result.aggregates.phaseCounts), [['Approach', 1]]);
});

test('does not query when every identifier is unresolved', async () => {
  const client = new RecordingClient();
  const result = await retrieveBulk(client, ['nope', 'also_nope']);
  assert.equal(client.queries.length, 0);
  assert.deepEqual(result.unresolved, ['nope', 'also_nope']);
  assert.equal(result.aggregates.totalIncidents, 0);
});
