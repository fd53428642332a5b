import type { AirportDetails, ClassificationResult, MergedRecord, NextAssignment, SourceRecord } from '../db/types';
import type {
  GeolocatedIncident,
  HeatmapCell,
  HierarchyRow,
  OverTimeRow,
  StatisticsResult,
  TopNRow
} from '../query/pipelines';
import type { BulkRetrievalResult } from '../retrieval/bulkRetriever';
import type { SummaryStatistics } from '../retrieval/summaryStatistics';

export type SerializedSourceRecord = {
  source_kind: string;
  uid: string;
  date: string | null;
  phase: string | null;
  aircraft_type: string | null;
  location: string | null;
  operator: string | null;
  narrative: string | null;
};

export type SerializedClassificationResult = {
  id: number;
  source_uid: string;
  model_version: string | null;
  predicted_category: string | null;
  predicted_confidence: number | null;
  final_category: string | null;
  is_complete: boolean;
  evaluator_id: string | null;
  processed_at: string | null;
};

export type SerializedMergedRecord = SerializedClassificationResult & {
  origin_source_kind: string;
  origin_uid: string;
  origin_date: string | null;
  origin_phase: string | null;
  origin_aircraft_type: string | null;
  origin_location: string | null;
  origin_operator: string | null;
  origin_narrative: string | null;
};

export type SerializedSummaryStatistics = {
  total_incidents: number;
  unique_operators: number;
  unique_aircraft_types: number;
  phase_counts: Record<string, number>;
  operator_counts: Record<string, number>;
};

export type SerializedBulkResult = {
  results: Record<string, SerializedMergedRecord>;
  aggregates: SerializedSummaryStatistics;
  unresolved: string[];
  not_found: string[];
};

export type SerializedAirport = {
  icao_code: string | null;
  iata_code: string | null;
  name: string | null;
  city: string | null;
  country: string | null;
  lat: number | null;
  lon: number | null;
};

export function serializeSourceRecord(record: SourceRecord): SerializedSourceRecord {
  return {
    source_kind: record.sourceKind,
    uid: record.uid,
    date: record.date,
    phase: record.phase,
    aircraft_type: record.aircraftType,
    location: record.location,
    operator: record.operator,
    narrative: record.narrative
  };
}

export function serializeClassificationResult(result: ClassificationResult): SerializedClassificationResult {
  return {
    id: result.id,
    source_uid: result.sourceUid,
    model_version: result.modelVersion,
    predicted_category: result.predictedCategory,
    predicted_confidence: result.predictedConfidence,
    final_category: result.finalCategory,
    is_complete: result.isComplete,
    evaluator_id: result.evaluatorId,
    processed_at: result.processedAt
  };
}

/** Flattens the origin record next to the classification fields with an `origin_` prefix. */
export function serializeMergedRecord(record: MergedRecord): SerializedMergedRecord {
  const origin = serializeSourceRecord(record.origin);
  return {
    ...serializeClassificationResult(record),
    origin_source_kind: origin.source_kind,
    origin_uid: origin.uid,
    origin_date: origin.date,
    origin_phase: origin.phase,
    origin_aircraft_type: origin.aircraft_type,
    origin_location: origin.location,
    origin_operator: origin.operator,
    origin_narrative: origin.narrative
  };
}

export function serializeSummaryStatistics(stats: SummaryStatistics): SerializedSummaryStatistics {
  return {
    total_incidents: stats.totalIncidents,
    unique_operators: stats.uniqueOperators,
    unique_aircraft_types: stats.uniqueAircraftTypes,
    phase_counts: Object.fromEntries(stats.phaseCounts),
    operator_counts: Object.fromEntries(stats.operatorCounts)
  };
}

export function serializeBulkResult(result: BulkRetrievalResult): SerializedBulkResult {
  return {
    results: Object.fromEntries(
      Array.from(result.results, ([identifier, record]) => [identifier, serializeMergedRecord(record)] as const)
    ),
    aggregates: serializeSummaryStatistics(result.aggregates),
    unresolved: result.unresolved,
    not_found: result.notFound
  };
}

export function serializeOverTime(rows: OverTimeRow[]) {
  return rows.map((row) => ({ period: row.period, incident_count: row.incidentCount }));
}

export function serializeTopN(rows: TopNRow[]) {
  return rows.map((row) => ({ category: row.category, incident_count: row.incidentCount }));
}

export function serializeHeatmap(cells: HeatmapCell[]) {
  return cells.map((cell) => ({ x: cell.x, y: cell.y, incident_count: cell.incidentCount }));
}

export function serializeHierarchy(rows: HierarchyRow[]) {
  return rows.map((row) => ({
    operator: row.operator,
    aircraft_type: row.aircraftType,
    phase: row.phase,
    incident_count: row.incidentCount
  }));
}

export function serializeStatistics(result: StatisticsResult) {
  return { total_incidents: result.totalIncidents };
}

export function serializeGeolocations(incidents: GeolocatedIncident[]) {
  return incidents.map((incident) => ({
    uid: incident.uid,
    date: incident.date,
    location: incident.location,
    airport_name: incident.airportName,
    lat: incident.lat,
    lon: incident.lon
  }));
}

export function serializeAirport(airport: AirportDetails): SerializedAirport {
  return {
    icao_code: airport.icaoCode,
    iata_code: airport.iataCode,
    name: airport.name,
    city: airport.city,
    country: airport.country,
    lat: airport.lat,
    lon: airport.lon
  };
}

export function serializeAirports(airports: Map<string, AirportDetails>): Record<string, SerializedAirport> {
  return Object.fromEntries(Array.from(airports, ([code, airport]) => [code, serializeAirport(airport)] as const));
}

export function serializeNextAssignment(assignment: NextAssignment) {
  return {
    assignment_id: assignment.assignmentId,
    classification_result_id: assignment.classificationResultId,
    source_uid: assignment.sourceUid
  };
}
