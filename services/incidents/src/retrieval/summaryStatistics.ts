import type { SourceRecord } from '../db/types';

export type SummaryStatistics = {
  totalIncidents: number;
  uniqueOperators: number;
  uniqueAircraftTypes: number;
  phaseCounts: Map<string, number>;
  operatorCounts: Map<string, number>;
};

function normalizeValue(value: string | null): string | null {
  if (value === null) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

export function emptySummaryStatistics(): SummaryStatistics {
  return {
    totalIncidents: 0,
    uniqueOperators: 0,
    uniqueAircraftTypes: 0,
    phaseCounts: new Map(),
    operatorCounts: new Map()
  };
}

/**
 * Single pass over merged origin records. A missing (or blank) value still
 * counts toward the total but not toward that field's breakdown.
 */
export function computeSummaryStatistics(records: Iterable<Pick<SourceRecord, 'phase' | 'operator' | 'aircraftType'>>): SummaryStatistics {
  const stats = emptySummaryStatistics();
  const aircraftTypes = new Set<string>();

  for (const record of records) {
    stats.totalIncidents += 1;

    const phase = normalizeValue(record.phase);
    if (phase !== null) {
      increment(stats.phaseCounts, phase);
    }

    const operator = normalizeValue(record.operator);
    if (operator !== null) {
      increment(stats.operatorCounts, operator);
    }

    const aircraftType = normalizeValue(record.aircraftType);
    if (aircraftType !== null) {
      aircraftTypes.add(aircraftType);
    }
  }

  stats.uniqueOperators = stats.operatorCounts.size;
  stats.uniqueAircraftTypes = aircraftTypes.size;
  return stats;
}
