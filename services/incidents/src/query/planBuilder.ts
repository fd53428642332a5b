import { ValidationError } from '../errors/domain';
import {
  HIERARCHY_DIMENSIONS,
  isCategoryDimension,
  type CategoryDimension
} from '../filters/aggregationParams';
import { monthStart, nextMonthStart, type FilterSpecification } from '../filters/filterSpecification';
import { SOURCE_KINDS } from '../sources/registry';
import type {
  AggregationRequest,
  IncidentField,
  OrderTerm,
  PlanExpression,
  PlanPredicate,
  QueryPlan,
  SelectTerm
} from './types';

const COUNT: PlanExpression = { type: 'count' };

function field(name: IncidentField): PlanExpression {
  return { type: 'field', field: name };
}

function notNull(name: IncidentField): PlanPredicate {
  return { type: 'not_null', field: name };
}

function requireDimension(name: string, value: string): CategoryDimension {
  if (!isCategoryDimension(value)) {
    throw ValidationError.forField(name, `Unsupported dimension "${value}"`);
  }
  return value;
}

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw ValidationError.forField(name, `${name} must be an integer >= 1`);
  }
  return value;
}

/**
 * Predicates shared by every plan. Incidents without a uid or a sanitized
 * date are outside the analytical population, so every pipeline counts the
 * same set of rows for a given filter.
 */
export function buildFilterPredicates(filter: FilterSpecification): PlanPredicate[] {
  const predicates: PlanPredicate[] = [notNull('uid'), notNull('incident_date')];

  const dimensions: Array<[CategoryDimension, readonly string[]]> = [
    ['operator', filter.operators],
    ['phase', filter.phases],
    ['aircraft_type', filter.aircraftTypes],
    ['location', filter.locations]
  ];
  for (const [dimension, values] of dimensions) {
    if (values.length > 0) {
      predicates.push({ type: 'in', field: dimension, values });
    }
  }

  if (filter.startPeriod) {
    predicates.push({ type: 'date_from', date: monthStart(filter.startPeriod) });
  }
  if (filter.endPeriod) {
    predicates.push({ type: 'date_before', date: nextMonthStart(filter.endPeriod) });
  }

  return predicates;
}

type PlanShape = {
  select: SelectTerm[];
  predicates?: PlanPredicate[];
  groupBy?: PlanExpression[];
  orderBy?: OrderTerm[];
  limit?: number | null;
};

function shapeFor(filter: FilterSpecification, request: AggregationRequest): PlanShape {
  switch (request.kind) {
    case 'over-time': {
      const period: PlanExpression = { type: 'period', granularity: filter.periodGranularity };
      return {
        select: [
          { alias: 'period', expression: period },
          { alias: 'incident_count', expression: COUNT }
        ],
        groupBy: [period],
        orderBy: [{ alias: 'period', direction: 'asc' }]
      };
    }
    case 'top-n': {
      const category = requireDimension('category', request.category);
      const n = requirePositiveInteger('n', request.n);
      return {
        select: [
          { alias: 'category', expression: field(category) },
          { alias: 'incident_count', expression: COUNT }
        ],
        predicates: [notNull(category)],
        groupBy: [field(category)],
        orderBy: [
          { alias: 'incident_count', direction: 'desc' },
          { alias: 'category', direction: 'asc', binaryCollation: true }
        ],
        limit: n
      };
    }
    case 'heatmap': {
      const first = requireDimension('dimension1', request.dimension1);
      const second = requireDimension('dimension2', request.dimension2);
      const dimensions = first === second ? [first] : [first, second];
      return {
        select: [
          { alias: 'x', expression: field(first) },
          { alias: 'y', expression: field(second) },
          { alias: 'incident_count', expression: COUNT }
        ],
        predicates: dimensions.map(notNull),
        groupBy: dimensions.map(field),
        orderBy: [
          { alias: 'incident_count', direction: 'desc' },
          { alias: 'x', direction: 'asc', binaryCollation: true },
          { alias: 'y', direction: 'asc', binaryCollation: true }
        ]
      };
    }
    case 'hierarchy':
      return {
        select: [
          ...HIERARCHY_DIMENSIONS.map((dimension) => ({ alias: dimension, expression: field(dimension) })),
          { alias: 'incident_count', expression: COUNT }
        ],
        predicates: HIERARCHY_DIMENSIONS.map(notNull),
        groupBy: HIERARCHY_DIMENSIONS.map(field),
        orderBy: [
          { alias: 'incident_count', direction: 'desc' },
          ...HIERARCHY_DIMENSIONS.map((dimension): OrderTerm => ({
            alias: dimension,
            direction: 'asc',
            binaryCollation: true
          }))
        ]
      };
    case 'statistics':
      return {
        select: [{ alias: 'total_incidents', expression: COUNT }]
      };
    case 'geolocation': {
      const predicates: PlanPredicate[] = [notNull('location')];
      if (request.afterUid !== undefined) {
        predicates.push({ type: 'uid_after', uid: request.afterUid });
      }
      return {
        select: [
          { alias: 'uid', expression: field('uid') },
          { alias: 'location', expression: field('location') },
          { alias: 'incident_date', expression: field('incident_date') }
        ],
        predicates,
        orderBy: [{ alias: 'uid', direction: 'asc', binaryCollation: true }],
        limit: requirePositiveInteger('limit', request.limit)
      };
    }
    case 'incident-ids':
      return {
        select: [
          { alias: 'uid', expression: field('uid') },
          { alias: 'incident_date', expression: field('incident_date') }
        ],
        orderBy: [
          { alias: 'incident_date', direction: 'desc' },
          { alias: 'uid', direction: 'asc' }
        ],
        limit: requirePositiveInteger('limit', request.limit)
      };
    default: {
      const exhaustive: never = request;
      throw new Error(`Unsupported aggregation kind: ${JSON.stringify(exhaustive)}`);
    }
  }
}

export function buildQueryPlan(filter: FilterSpecification, request: AggregationRequest): QueryPlan {
  const shape = shapeFor(filter, request);
  return Object.freeze({
    kind: request.kind,
    sources: SOURCE_KINDS,
    select: shape.select,
    predicates: [...buildFilterPredicates(filter), ...(shape.predicates ?? [])],
    groupBy: shape.groupBy ?? [],
    orderBy: shape.orderBy ?? [],
    limit: shape.limit ?? null
  });
}
