import type { CategoryDimension } from '../filters/aggregationParams';
import type { PeriodGranularity } from '../filters/filterSpecification';
import type { SourceKind } from '../sources/registry';

export type AggregationKind =
  | 'over-time'
  | 'top-n'
  | 'heatmap'
  | 'hierarchy'
  | 'statistics'
  | 'geolocation'
  | 'incident-ids';

/** Columns of the unified incident relation every plan reads from. */
export type IncidentField = 'uid' | 'incident_date' | CategoryDimension;

export type PlanExpression =
  | { type: 'field'; field: IncidentField }
  | { type: 'period'; granularity: PeriodGranularity }
  | { type: 'count' };

export type SelectTerm = {
  alias: string;
  expression: PlanExpression;
};

export type PlanPredicate =
  | { type: 'in'; field: CategoryDimension; values: readonly string[] }
  | { type: 'not_null'; field: IncidentField }
  | { type: 'date_from'; date: string }
  | { type: 'date_before'; date: string }
  | { type: 'uid_after'; uid: string };

export type SortDirection = 'asc' | 'desc';

export type OrderTerm = {
  alias: string;
  direction: SortDirection;
  /** Compare as raw code points instead of the database collation. */
  binaryCollation?: boolean;
};

export type QueryPlan = Readonly<{
  kind: AggregationKind;
  sources: readonly SourceKind[];
  select: readonly SelectTerm[];
  predicates: readonly PlanPredicate[];
  groupBy: readonly PlanExpression[];
  orderBy: readonly OrderTerm[];
  limit: number | null;
}>;

export type AggregationRequest =
  | { kind: 'over-time' }
  | { kind: 'top-n'; category: string; n: number }
  | { kind: 'heatmap'; dimension1: string; dimension2: string }
  | { kind: 'hierarchy' }
  | { kind: 'statistics' }
  | { kind: 'geolocation'; limit: number; afterUid?: string }
  | { kind: 'incident-ids'; limit: number };

export type CompiledQuery = {
  text: string;
  values: unknown[];
};
