import { quoteIdentifier } from '@aerolens/shared';
import { toMergedRecord } from '../db/rowMappers';
import type { MergedRecord, MergedRecordRow, QueryClient } from '../db/types';
import { getSource, resolveBatch, type SourceDefinition, type SourceKind } from '../sources/registry';
import { computeSummaryStatistics, type SummaryStatistics } from './summaryStatistics';

export const MAX_BULK_IDENTIFIERS = 5000;

export type BulkRetrievalResult = {
  results: Map<string, MergedRecord>;
  /** Identifiers whose prefix does not name a registered source. */
  unresolved: string[];
  /** Well-formed identifiers without a classification result or origin row. */
  notFound: string[];
  aggregates: SummaryStatistics;
};

const CLASSIFICATION_COLUMNS = [
  'id',
  'source_uid',
  'model_version',
  'predicted_category',
  'predicted_confidence',
  'final_category',
  'is_complete',
  'evaluator_id',
  'processed_at'
] as const;

const ORIGIN_FIELDS = ['uid', 'date', 'phase', 'aircraft_type', 'location', 'operator', 'narrative'] as const;

function originColumn(source: SourceDefinition, field: (typeof ORIGIN_FIELDS)[number]): string {
  const column = source.columns[field];
  const alias = `origin_${field}`;
  return column === null ? `NULL::text AS ${alias}` : `src.${quoteIdentifier(column)}::text AS ${alias}`;
}

/**
 * Joins the newest classification result of each requested uid with the
 * source row it was produced from, renaming source columns to the canonical
 * `origin_*` names.
 */
export function buildPartitionQuery(source: SourceDefinition): string {
  const columns = [
    ...CLASSIFICATION_COLUMNS.map((column) => `cr.${column}`),
    ...ORIGIN_FIELDS.map((field) => originColumn(source, field))
  ];
  const uidColumn = source.columns.uid ?? 'uid';
  return [
    `SELECT DISTINCT ON (cr.source_uid) ${columns.join(', ')}`,
    'FROM classification_results cr',
    `JOIN ${quoteIdentifier(source.table)} src ON src.${quoteIdentifier(uidColumn)} = cr.source_uid`,
    'WHERE cr.source_uid = ANY($1::text[])',
    'ORDER BY cr.source_uid, cr.processed_at DESC NULLS LAST, cr.id DESC'
  ].join('\n');
}

async function fetchPartition(
  client: QueryClient,
  kind: SourceKind,
  identifiers: Set<string>
): Promise<MergedRecord[]> {
  const result = await client.query<MergedRecordRow>(buildPartitionQuery(getSource(kind)), [
    Array.from(identifiers)
  ]);
  return result.rows.map((row) => toMergedRecord(kind, row));
}

export async function retrieveBulk(client: QueryClient, identifiers: Iterable<string>): Promise<BulkRetrievalResult> {
  const { partitions, unknown } = resolveBatch(identifiers);
  const results = new Map<string, MergedRecord>();
  const notFound: string[] = [];

  for (const [kind, partition] of partitions) {
    const records = await fetchPartition(client, kind, partition);
    for (const record of records) {
      results.set(record.sourceUid, record);
    }
    for (const identifier of partition) {
      if (!results.has(identifier)) {
        notFound.push(identifier);
      }
    }
  }

  const aggregates = computeSummaryStatistics(Array.from(results.values(), (record) => record.origin));
  return { results, unresolved: unknown, notFound, aggregates };
}
