import type { SourceKind } from '../sources/registry';
import type {
  AirportDetails,
  AirportRow,
  ClassificationResult,
  ClassificationResultRow,
  MergedRecord,
  MergedRecordRow,
  SourceRecord,
  SourceRecordRow
} from './types';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * pg hands DATE columns back as a Date at local midnight; text columns come
 * through untouched.
 */
export function toIsoDate(value: string | Date | null): string | null {
  if (value === null) {
    return null;
  }
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      return null;
    }
    return `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
  }
  return value;
}

export function toIsoTimestamp(value: string | Date | null): string | null {
  if (value === null) {
    return null;
  }
  return value instanceof Date ? value.toISOString() : value;
}

export function toNullableNumber(value: number | string | null): number | null {
  if (value === null) {
    return null;
  }
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function toSourceRecord(sourceKind: SourceKind, row: SourceRecordRow): SourceRecord {
  return {
    sourceKind,
    uid: row.uid,
    date: toIsoDate(row.date),
    phase: row.phase,
    aircraftType: row.aircraft_type,
    location: row.location,
    operator: row.operator,
    narrative: row.narrative
  } satisfies SourceRecord;
}

export function toClassificationResult(row: ClassificationResultRow): ClassificationResult {
  return {
    id: Number(row.id),
    sourceUid: row.source_uid,
    modelVersion: row.model_version,
    predictedCategory: row.predicted_category,
    predictedConfidence: toNullableNumber(row.predicted_confidence),
    finalCategory: row.final_category,
    isComplete: row.is_complete === true,
    evaluatorId: row.evaluator_id,
    processedAt: toIsoTimestamp(row.processed_at)
  } satisfies ClassificationResult;
}

export function toMergedRecord(sourceKind: SourceKind, row: MergedRecordRow): MergedRecord {
  return {
    ...toClassificationResult(row),
    origin: toSourceRecord(sourceKind, {
      uid: row.origin_uid,
      date: row.origin_date,
      phase: row.origin_phase,
      aircraft_type: row.origin_aircraft_type,
      location: row.origin_location,
      operator: row.origin_operator,
      narrative: row.origin_narrative
    })
  } satisfies MergedRecord;
}

export function toAirportDetails(row: AirportRow): AirportDetails {
  return {
    icaoCode: row.icao_code,
    iataCode: row.iata_code,
    name: row.name,
    city: row.city,
    country: row.country,
    lat: toNullableNumber(row.lat),
    lon: toNullableNumber(row.lon)
  } satisfies AirportDetails;
}
