import type { QueryClient } from '../db/types';

export type HumanEvaluationSubmission = {
  classificationResultId: number;
  evaluatorId: string;
  humanCategory: string;
  humanConfidence: number;
  humanReasoning: string | null;
};

export type SubmissionOutcome =
  | { status: 'completed'; assignmentId: number; evaluationId: number }
  | { status: 'not_found_or_already_complete' };

/**
 * Completes a pending assignment and records the evaluation in one statement.
 * Nothing is written unless exactly one pending assignment matches. A racing
 * submission blocks on the assignment row lock, re-checks `status` once the
 * winner commits and then updates nothing.
 */
export const COMPLETE_ASSIGNMENT_SQL = `WITH candidates AS (
  SELECT id
    FROM evaluation_assignments
   WHERE classification_result_id = $1::integer
     AND evaluator_id = $2::text
     AND status = 'pending'
), completed AS (
  UPDATE evaluation_assignments assignment
     SET status = 'complete', completed_at = $6::timestamptz
    FROM candidates
   WHERE assignment.id = candidates.id
     AND assignment.status = 'pending'
     AND (SELECT COUNT(*) FROM candidates) = 1
  RETURNING assignment.id, assignment.classification_result_id, assignment.evaluator_id
), flagged AS (
  UPDATE classification_results result
     SET is_complete = TRUE, evaluator_id = completed.evaluator_id
    FROM completed
   WHERE result.id = completed.classification_result_id
  RETURNING result.id
), inserted AS (
  INSERT INTO human_evaluation
    (classification_result_id, evaluator_id, human_category, human_confidence, human_reasoning, created_at)
  SELECT completed.classification_result_id, completed.evaluator_id, $3::text, $4::double precision, $5::text, $6::timestamptz
    FROM completed
  RETURNING id
)
SELECT completed.id AS assignment_id, inserted.id AS evaluation_id
  FROM completed
 CROSS JOIN inserted`;

type CompletionRow = {
  assignment_id: number | string;
  evaluation_id: number | string;
};

export async function submitEvaluation(
  client: QueryClient,
  submission: HumanEvaluationSubmission,
  now: Date
): Promise<SubmissionOutcome> {
  const result = await client.query<CompletionRow>(COMPLETE_ASSIGNMENT_SQL, [
    submission.classificationResultId,
    submission.evaluatorId,
    submission.humanCategory,
    submission.humanConfidence,
    submission.humanReasoning,
    now.toISOString()
  ]);

  const [row] = result.rows;
  if (!row) {
    return { status: 'not_found_or_already_complete' };
  }
  return {
    status: 'completed',
    assignmentId: Number(row.assignment_id),
    evaluationId: Number(row.evaluation_id)
  };
}
