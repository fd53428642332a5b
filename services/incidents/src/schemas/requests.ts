import { z } from 'zod';
import { MAX_AIRPORT_CODES } from '../airports/airportDirectory';
import type { HumanEvaluationSubmission } from '../evaluation/assignmentGuard';
import { toValidationError } from '../filters/filterSpecification';
import { MAX_BULK_IDENTIFIERS } from '../retrieval/bulkRetriever';

const identifierSchema = z
  .string()
  .trim()
  .min(1, 'Identifier must not be empty')
  .max(256, 'Identifier exceeds 256 characters');

const bulkIdentifiersSchema = z.object({
  identifiers: z
    .array(identifierSchema, { invalid_type_error: 'Request body must be a JSON array of identifiers' })
    .max(MAX_BULK_IDENTIFIERS, `At most ${MAX_BULK_IDENTIFIERS} identifiers are allowed per request`)
    .transform((values) => Array.from(new Set(values)))
});

/** Accepts a JSON array of identifiers, trimmed and de-duplicated in request order. */
export function parseBulkIdentifiers(body: unknown): string[] {
  const result = bulkIdentifiersSchema.safeParse({ identifiers: body });
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data.identifiers;
}

const MAX_INTEGER_ID = 2_147_483_647;

const evaluatorIdSchema = z
  .string()
  .trim()
  .min(1, 'evaluator_id is required')
  .max(64, 'evaluator_id exceeds 64 characters');

const submissionSchema = z.object({
  classification_result_id: z.coerce
    .number({ invalid_type_error: 'classification_result_id must be a number' })
    .int('classification_result_id must be an integer')
    .positive('classification_result_id must be positive')
    .max(MAX_INTEGER_ID, 'classification_result_id is out of range'),
  evaluator_id: evaluatorIdSchema,
  human_category: z.string().trim().min(1, 'human_category is required').max(64),
  human_confidence: z.coerce
    .number({ invalid_type_error: 'human_confidence must be a number' })
    .min(0, 'human_confidence must be between 0 and 1')
    .max(1, 'human_confidence must be between 0 and 1'),
  human_reasoning: z.string().max(10_000).nullable().optional()
});

export function parseSubmissionPayload(body: unknown): HumanEvaluationSubmission {
  const result = submissionSchema.safeParse(body ?? {});
  if (!result.success) {
    throw toValidationError(result.error);
  }
  const value = result.data;
  return {
    classificationResultId: value.classification_result_id,
    evaluatorId: value.evaluator_id,
    humanCategory: value.human_category,
    humanConfidence: value.human_confidence,
    humanReasoning: value.human_reasoning ?? null
  };
}

export function parseEvaluatorId(raw: unknown): string {
  const result = z.object({ evaluator_id: evaluatorIdSchema }).safeParse({ evaluator_id: raw });
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data.evaluator_id;
}

const airportCodesSchema = z.object({
  codes: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform((value) => (value === undefined ? [] : Array.isArray(value) ? value : [value]))
    .refine((codes) => codes.length <= MAX_AIRPORT_CODES, { message: `At most ${MAX_AIRPORT_CODES} codes are allowed` })
});

export function parseAirportCodes(raw: Record<string, unknown>): string[] {
  const result = airportCodesSchema.safeParse(raw);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data.codes;
}
