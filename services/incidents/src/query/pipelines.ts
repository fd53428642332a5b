import type { FastifyBaseLogger } from 'fastify';
import type { QueryResultRow } from 'pg';
import { lookupAirports, normalizeAirportCodes } from '../airports/airportDirectory';
import { toIsoDate } from '../db/rowMappers';
import type { AirportDetails, QueryClient } from '../db/types';
import type { HeatmapParams, SeasonalParams, TopNParams } from '../filters/aggregationParams';
import { parseFilterSpecification, type FilterSpecification } from '../filters/filterSpecification';
import { buildQueryPlan } from './planBuilder';
import { compileQueryPlan } from './sqlCompiler';
import type { AggregationKind, QueryPlan } from './types';

export type PipelineObserver = (kind: AggregationKind, durationSeconds: number) => void;

export type PipelineOptions = {
  logger?: Pick<FastifyBaseLogger, 'debug'>;
  observe?: PipelineObserver;
};

export type GeolocationOptions = PipelineOptions & {
  lookupAirports?: (client: QueryClient, codes: Iterable<string>) => Promise<Map<string, AirportDetails>>;
};

export type OverTimeRow = {
  period: string;
  incidentCount: number;
};

export type TopNRow = {
  category: string;
  incidentCount: number;
};

export type HeatmapCell = {
  x: string;
  y: string;
  incidentCount: number;
};

export type HierarchyRow = {
  operator: string;
  aircraftType: string;
  phase: string;
  incidentCount: number;
};

export type StatisticsResult = {
  totalIncidents: number;
};

export type GeolocatedIncident = {
  uid: string;
  date: string | null;
  location: string;
  airportName: string | null;
  lat: number;
  lon: number;
};

export type IncidentIdRow = {
  uid: string;
  date: string | null;
};

export type SeasonalCell = {
  x: string;
  y: string;
  v: number;
};

type Count = number | string;

export async function executePlan<R extends QueryResultRow>(
  client: QueryClient,
  plan: QueryPlan,
  options: PipelineOptions = {}
): Promise<R[]> {
  const query = compileQueryPlan(plan);
  const startedAt = performance.now();
  const result = await client.query<R>(query.text, query.values);
  const durationMs = performance.now() - startedAt;

  options.logger?.debug(
    { kind: plan.kind, rowCount: result.rows.length, durationMs: Math.round(durationMs) },
    'aggregation pipeline completed'
  );
  options.observe?.(plan.kind, durationMs / 1000);
  return result.rows;
}

export async function runOverTime(
  client: QueryClient,
  filter: FilterSpecification,
  options?: PipelineOptions
): Promise<OverTimeRow[]> {
  const plan = buildQueryPlan(filter, { kind: 'over-time' });
  const rows = await executePlan<{ period: string; incident_count: Count }>(client, plan, options);
  return rows.map((row) => ({ period: row.period, incidentCount: Number(row.incident_count) }));
}

export async function runTopN(
  client: QueryClient,
  filter: FilterSpecification,
  params: TopNParams,
  options?: PipelineOptions
): Promise<TopNRow[]> {
  const plan = buildQueryPlan(filter, { kind: 'top-n', category: params.category, n: params.n });
  const rows = await executePlan<{ category: string; incident_count: Count }>(client, plan, options);
  return rows.map((row) => ({ category: row.category, incidentCount: Number(row.incident_count) }));
}

export async function runHeatmap(
  client: QueryClient,
  filter: FilterSpecification,
  params: HeatmapParams,
  options?: PipelineOptions
): Promise<HeatmapCell[]> {
  const plan = buildQueryPlan(filter, {
    kind: 'heatmap',
    dimension1: params.dimension1,
    dimension2: params.dimension2
  });
  const rows = await executePlan<{ x: string; y: string; incident_count: Count }>(client, plan, options);
  return rows.map((row) => ({ x: row.x, y: row.y, incidentCount: Number(row.incident_count) }));
}

export async function runHierarchy(
  client: QueryClient,
  filter: FilterSpecification,
  options?: PipelineOptions
): Promise<HierarchyRow[]> {
  const plan = buildQueryPlan(filter, { kind: 'hierarchy' });
  const rows = await executePlan<{
    operator: string;
    aircraft_type: string;
    phase: string;
    incident_count: Count;
  }>(client, plan, options);
  return rows.map((row) => ({
    operator: row.operator,
    aircraftType: row.aircraft_type,
    phase: row.phase,
    incidentCount: Number(row.incident_count)
  }));
}

export async function runStatistics(
  client: QueryClient,
  filter: FilterSpecification,
  options?: PipelineOptions
): Promise<StatisticsResult> {
  const plan = buildQueryPlan(filter, { kind: 'statistics' });
  const rows = await executePlan<{ total_incidents: Count }>(client, plan, options);
  const [row] = rows;
  return { totalIncidents: row ? Number(row.total_incidents) : 0 };
}

/**
 * Reads incidents in uid order, one page of `limit` rows at a time, until
 * `limit` of them resolve to an airport with coordinates or the rows run out.
 */
export async function runGeolocation(
  client: QueryClient,
  filter: FilterSpecification,
  params: { limit: number },
  options: GeolocationOptions = {}
): Promise<GeolocatedIncident[]> {
  const lookup = options.lookupAirports ?? lookupAirports;
  const incidents: GeolocatedIncident[] = [];
  let afterUid: string | undefined;

  while (incidents.length < params.limit) {
    const plan = buildQueryPlan(filter, { kind: 'geolocation', limit: params.limit, afterUid });
    const rows = await executePlan<{ uid: string; location: string; incident_date: string | Date | null }>(
      client,
      plan,
      options
    );
    const lastRow = rows.at(-1);
    if (!lastRow) {
      break;
    }

    const airports = await lookup(client, normalizeAirportCodes(rows.map((row) => row.location)));
    for (const row of rows) {
      const airport = airports.get(row.location.trim().toLowerCase());
      if (!airport || airport.lat === null || airport.lon === null) {
        continue;
      }
      incidents.push({
        uid: row.uid,
        date: toIsoDate(row.incident_date),
        location: row.location,
        airportName: airport.name,
        lat: airport.lat,
        lon: airport.lon
      });
      if (incidents.length === params.limit) {
        break;
      }
    }

    if (rows.length < params.limit) {
      break;
    }
    afterUid = lastRow.uid;
  }
  return incidents;
}

export async function runIncidentIds(
  client: QueryClient,
  filter: FilterSpecification,
  params: { limit: number },
  options?: PipelineOptions
): Promise<IncidentIdRow[]> {
  const plan = buildQueryPlan(filter, { kind: 'incident-ids', limit: params.limit });
  const rows = await executePlan<{ uid: string; incident_date: string | Date | null }>(client, plan, options);
  return rows.map((row) => ({ uid: row.uid, date: toIsoDate(row.incident_date) }));
}

export const MONTH_ABBREVIATIONS = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec'
] as const;

/**
 * Expands monthly counts into a dense year by month grid. Missing years fall
 * back to the range observed in `rows`; with neither bound nor data the grid
 * is empty.
 */
export function buildSeasonalMatrix(rows: readonly OverTimeRow[], params: SeasonalParams): SeasonalCell[] {
  const counts = new Map<string, number>();
  const observedYears: number[] = [];
  for (const row of rows) {
    counts.set(row.period, (counts.get(row.period) ?? 0) + row.incidentCount);
    observedYears.push(Number(row.period.slice(0, 4)));
  }

  const startYear = params.startYear ?? (observedYears.length > 0 ? Math.min(...observedYears) : null);
  const endYear = params.endYear ?? (observedYears.length > 0 ? Math.max(...observedYears) : null);
  if (startYear === null || endYear === null) {
    return [];
  }

  const cells: SeasonalCell[] = [];
  for (let year = startYear; year <= endYear; year += 1) {
    MONTH_ABBREVIATIONS.forEach((abbreviation, index) => {
      const period = `${year}-${String(index + 1).padStart(2, '0')}`;
      cells.push({ x: abbreviation, y: String(year), v: counts.get(period) ?? 0 });
    });
  }
  return cells;
}

export async function runSeasonalDistribution(
  client: QueryClient,
  params: SeasonalParams,
  options?: PipelineOptions
): Promise<SeasonalCell[]> {
  const filter = parseFilterSpecification({
    start_period: params.startYear === null ? undefined : `${params.startYear}-01`,
    end_period: params.endYear === null ? undefined : `${params.endYear}-12`,
    period_granularity: 'month'
  });
  const rows = await runOverTime(client, filter, options);
  return buildSeasonalMatrix(rows, params);
}
