import type { QueryResult, QueryResultRow } from 'pg';
import type { SourceKind } from '../sources/registry';

/** The part of a pooled client the repositories and pipelines rely on. */
export interface QueryClient {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

/** Source row projected onto the canonical column names. */
export type SourceRecordRow = {
  uid: string;
  date: string | Date | null;
  phase: string | null;
  aircraft_type: string | null;
  location: string | null;
  operator: string | null;
  narrative: string | null;
};

export type SourceRecord = {
  sourceKind: SourceKind;
  uid: string;
  date: string | null;
  phase: string | null;
  aircraftType: string | null;
  location: string | null;
  operator: string | null;
  narrative: string | null;
};

export type ClassificationResultRow = {
  id: number;
  source_uid: string;
  model_version: string | null;
  predicted_category: string | null;
  predicted_confidence: number | string | null;
  final_category: string | null;
  is_complete: boolean | null;
  evaluator_id: string | null;
  processed_at: Date | string | null;
};

export type ClassificationResult = {
  id: number;
  sourceUid: string;
  modelVersion: string | null;
  predictedCategory: string | null;
  predictedConfidence: number | null;
  finalCategory: string | null;
  isComplete: boolean;
  evaluatorId: string | null;
  processedAt: string | null;
};

/** Classification result joined with the canonical fields of its source record. */
export type MergedRecordRow = ClassificationResultRow & {
  origin_uid: string;
  origin_date: string | Date | null;
  origin_phase: string | null;
  origin_aircraft_type: string | null;
  origin_location: string | null;
  origin_operator: string | null;
  origin_narrative: string | null;
};

export type MergedRecord = ClassificationResult & {
  origin: SourceRecord;
};

export type AssignmentStatus = 'pending' | 'complete';

export type NextAssignmentRow = {
  assignment_id: number;
  classification_result_id: number;
  source_uid: string;
};

export type NextAssignment = {
  assignmentId: number;
  classificationResultId: number;
  sourceUid: string;
};

export type AirportRow = {
  icao_code: string | null;
  iata_code: string | null;
  name: string | null;
  city: string | null;
  country: string | null;
  lat: number | string | null;
  lon: number | string | null;
};

export type AirportDetails = {
  icaoCode: string | null;
  iataCode: string | null;
  name: string | null;
  city: string | null;
  country: string | null;
  lat: number | null;
  lon: number | null;
};
