import { quoteIdentifier } from '@aerolens/shared';
import type { PeriodGranularity } from '../filters/filterSpecification';
import { getSource, type SourceDefinition, type SourceKind } from '../sources/registry';
import type { CompiledQuery, OrderTerm, PlanExpression, PlanPredicate, QueryPlan } from './types';

const ALIAS_REGEX = /^[a-z][a-z0-9_]*$/;

const PERIOD_FORMATS: Record<PeriodGranularity, string> = {
  year: 'YYYY',
  month: 'YYYY-MM'
};

const PROJECTED_DIMENSIONS = ['phase', 'aircraft_type', 'location', 'operator'] as const;

class SqlBuilder {
  private readonly params: unknown[] = [];

  add(value: unknown): string {
    this.params.push(value);
    return `$${this.params.length}`;
  }

  getParameters(): unknown[] {
    return this.params;
  }
}

function projectColumn(column: string | null, alias: string): string {
  return column === null ? `NULL::text AS ${alias}` : `${quoteIdentifier(column)} AS ${alias}`;
}

/** Projects one source table onto the unified incident columns. */
export function buildSourceProjection(source: SourceDefinition): string {
  const columns = [
    projectColumn(source.columns.uid, 'uid'),
    projectColumn(source.periodColumn, 'incident_date'),
    ...PROJECTED_DIMENSIONS.map((dimension) => projectColumn(source.columns[dimension], dimension))
  ];
  return `SELECT ${columns.join(', ')} FROM ${quoteIdentifier(source.table)}`;
}

function buildIncidentsCte(sources: readonly SourceKind[]): string {
  if (sources.length === 0) {
    throw new Error('Query plan must read from at least one source');
  }
  const branches = sources.map((kind) => `  ${buildSourceProjection(getSource(kind))}`);
  return `WITH incidents AS (\n${branches.join('\n  UNION ALL\n')}\n)`;
}

function compileExpression(expression: PlanExpression): string {
  switch (expression.type) {
    case 'field':
      return expression.field;
    case 'period':
      return `to_char(date_trunc('${expression.granularity}', incident_date), '${PERIOD_FORMATS[expression.granularity]}')`;
    case 'count':
      return 'COUNT(*)';
    default: {
      const exhaustive: never = expression;
      throw new Error(`Unsupported plan expression: ${JSON.stringify(exhaustive)}`);
    }
  }
}

function compilePredicate(builder: SqlBuilder, predicate: PlanPredicate): string {
  switch (predicate.type) {
    case 'in':
      return `${predicate.field} = ANY(${builder.add([...predicate.values])}::text[])`;
    case 'not_null':
      return `${predicate.field} IS NOT NULL`;
    case 'date_from':
      return `incident_date >= ${builder.add(predicate.date)}::date`;
    case 'date_before':
      return `incident_date < ${builder.add(predicate.date)}::date`;
    case 'uid_after':
      return `uid COLLATE "C" > ${builder.add(predicate.uid)}`;
    default: {
      const exhaustive: never = predicate;
      throw new Error(`Unsupported plan predicate: ${JSON.stringify(exhaustive)}`);
    }
  }
}

function assertAlias(alias: string): string {
  if (!ALIAS_REGEX.test(alias)) {
    throw new Error(`Invalid column alias: ${alias}`);
  }
  return alias;
}

function compileOrderTerm(plan: QueryPlan, term: OrderTerm): string {
  const direction = term.direction === 'asc' ? 'ASC' : 'DESC';
  if (!term.binaryCollation) {
    return `${assertAlias(term.alias)} ${direction}`;
  }
  const selected = plan.select.find((candidate) => candidate.alias === term.alias);
  if (!selected) {
    throw new Error(`Order term references unknown column: ${term.alias}`);
  }
  return `${compileExpression(selected.expression)} COLLATE "C" ${direction}`;
}

export function compileQueryPlan(plan: QueryPlan): CompiledQuery {
  if (plan.select.length === 0) {
    throw new Error('Query plan must select at least one column');
  }

  const builder = new SqlBuilder();
  const lines = [buildIncidentsCte(plan.sources)];

  const selectList = plan.select.map(
    (term) => `${compileExpression(term.expression)} AS ${assertAlias(term.alias)}`
  );
  lines.push(`SELECT ${selectList.join(', ')}`);
  lines.push('FROM incidents');

  if (plan.predicates.length > 0) {
    const predicates = plan.predicates.map((predicate) => compilePredicate(builder, predicate));
    lines.push(`WHERE ${predicates.join(' AND ')}`);
  }

  if (plan.groupBy.length > 0) {
    lines.push(`GROUP BY ${plan.groupBy.map(compileExpression).join(', ')}`);
  }

  if (plan.orderBy.length > 0) {
    lines.push(`ORDER BY ${plan.orderBy.map((term) => compileOrderTerm(plan, term)).join(', ')}`);
  }

  if (plan.limit !== null) {
    lines.push(`LIMIT ${builder.add(plan.limit)}`);
  }

  return {
    text: lines.join('\n'),
    values: builder.getParameters()
  };
}
