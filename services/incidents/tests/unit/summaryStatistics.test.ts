import assert from 'node:assert/strict';
import { test } from 'node:test';
import { computeSummaryStatistics, emptySummaryStatistics } from '../../src/retrieval/summaryStatistics';

test('empty input yields zeroed statistics', () => {
  assert.deepEqual(computeSummaryStatistics([]), emptySummaryStatistics());
});

test('counts phases and operators and distinct aircraft types', () => {
  const stats = computeSummaryStatistics([
    { phase: 'Landing', operator: 'Delta', aircraftType: 'A320' },
    { phase: 'Landing', operator: 'United', aircraftType: 'B737' },
    { phase: 'Cruise', operator: 'Delta', aircraftType: 'A320' },
    { phase: null, operator: ' Delta ', aircraftType: null }
  ]);
  assert.equal(stats.totalIncidents, 4);
  assert.equal(stats.uniqueOperators, 2);
  assert.equal(stats.uniqueAircraftTypes, 2);
  assert.deepEqual(Array.from(stats.phaseCounts), [
    ['Landing', 2],
    ['Cruise', 1]
  ]);
  assert.deepEqual(Array.from(stats.operatorCounts), [
    ['Delta', 3],
    ['United', 1]
  ]);
});

test('blank values count toward the total only', () => {
  const stats = computeSummaryStatistics([{ phase: '   ', operator: '', aircraftType: ' ' }]);
  assert.equal(stats.totalIncidents, 1);
  assert.equal(stats.uniqueOperators, 0);
  assert.equal(stats.uniqueAircraftTypes, 0);
  assert.equal(stats.phaseCounts.size, 0);
});
