import { quoteIdentifier } from '@aerolens/shared';
import type { ClassificationListParams } from '../filters/aggregationParams';
import type { SourceDefinition } from '../sources/registry';
import { toClassificationResult, toSourceRecord } from './rowMappers';
import type {
  ClassificationResult,
  ClassificationResultRow,
  NextAssignment,
  NextAssignmentRow,
  QueryClient,
  SourceRecord,
  SourceRecordRow
} from './types';

const RECORD_FIELDS = ['uid', 'date', 'phase', 'aircraft_type', 'location', 'operator', 'narrative'] as const;

export function buildSourceRecordQuery(source: SourceDefinition): string {
  const columns = RECORD_FIELDS.map((field) => {
    const column = source.columns[field];
    return column === null ? `NULL::text AS ${field}` : `${quoteIdentifier(column)}::text AS ${field}`;
  });
  const uidColumn = source.columns.uid ?? 'uid';
  return `SELECT ${columns.join(', ')} FROM ${quoteIdentifier(source.table)} WHERE ${quoteIdentifier(uidColumn)} = $1 LIMIT 1`;
}

export async function fetchSourceRecord(
  client: QueryClient,
  source: SourceDefinition,
  uid: string
): Promise<SourceRecord | null> {
  const result = await client.query<SourceRecordRow>(buildSourceRecordQuery(source), [uid]);
  const [row] = result.rows;
  return row ? toSourceRecord(source.kind, row) : null;
}

const CLASSIFICATION_SELECT = `SELECT id, source_uid, model_version, predicted_category, predicted_confidence,
       final_category, is_complete, evaluator_id, processed_at
  FROM classification_results`;

export async function listClassificationResults(
  client: QueryClient,
  params: ClassificationListParams
): Promise<ClassificationResult[]> {
  const values: unknown[] = [];
  let where = '';
  if (params.evaluatorId !== null) {
    values.push(params.evaluatorId);
    where = `\n WHERE evaluator_id = $${values.length}`;
  }
  values.push(params.skip);
  const offsetParam = `$${values.length}`;
  values.push(params.limit);
  const limitParam = `$${values.length}`;

  const result = await client.query<ClassificationResultRow>(
    `${CLASSIFICATION_SELECT}${where}\n ORDER BY id ASC\n OFFSET ${offsetParam} LIMIT ${limitParam}`,
    values
  );
  return result.rows.map(toClassificationResult);
}

export async function fetchNextAssignment(client: QueryClient, evaluatorId: string): Promise<NextAssignment | null> {
  const result = await client.query<NextAssignmentRow>(
    `SELECT assignment.id AS assignment_id,
            assignment.classification_result_id,
            result.source_uid
       FROM evaluation_assignments assignment
       JOIN classification_results result ON result.id = assignment.classification_result_id
      WHERE assignment.evaluator_id = $1
        AND assignment.status = 'pending'
      ORDER BY assignment.id ASC
      LIMIT 1`,
    [evaluatorId]
  );
  const [row] = result.rows;
  if (!row) {
    return null;
  }
  return {
    assignmentId: Number(row.assignment_id),
    classificationResultId: Number(row.classification_result_id),
    sourceUid: row.source_uid
  };
}
