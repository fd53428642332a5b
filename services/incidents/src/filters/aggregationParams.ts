import { z } from 'zod';
import { toValidationError, type RawParameters } from './filterSpecification';

export const CATEGORY_DIMENSIONS = ['operator', 'phase', 'aircraft_type', 'location'] as const;
export type CategoryDimension = (typeof CATEGORY_DIMENSIONS)[number];

export const HIERARCHY_DIMENSIONS = ['operator', 'aircraft_type', 'phase'] as const satisfies readonly CategoryDimension[];

export const DEFAULT_TOP_N = 10;
export const MAX_TOP_N = 100;

export function isCategoryDimension(value: string): value is CategoryDimension {
  return (CATEGORY_DIMENSIONS as readonly string[]).includes(value);
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: RawParameters): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

const topNSchema = z.object({
  category: z.enum(CATEGORY_DIMENSIONS),
  n: z.coerce
    .number()
    .int('n must be an integer')
    .min(1, 'n must be at least 1')
    .max(MAX_TOP_N, `n must be at most ${MAX_TOP_N}`)
    .default(DEFAULT_TOP_N)
});

export type TopNParams = z.infer<typeof topNSchema>;

export function parseTopNParams(raw: RawParameters): TopNParams {
  return parseWith(topNSchema, raw);
}

const heatmapSchema = z.object({
  dimension1: z.enum(CATEGORY_DIMENSIONS),
  dimension2: z.enum(CATEGORY_DIMENSIONS)
});

export type HeatmapParams = z.infer<typeof heatmapSchema>;

export function parseHeatmapParams(raw: RawParameters): HeatmapParams {
  return parseWith(heatmapSchema, raw);
}

export type ListingLimits = {
  defaultLimit: number;
  maxLimit: number;
};

export function parseListingLimit(raw: RawParameters, limits: ListingLimits): number {
  const schema = z.object({
    limit: z.coerce
      .number()
      .int('limit must be an integer')
      .min(1, 'limit must be at least 1')
      .max(limits.maxLimit, `limit must be at most ${limits.maxLimit}`)
      .default(limits.defaultLimit)
  });
  return parseWith(schema, raw).limit;
}

const yearSchema = z.coerce.number().int('Expected a calendar year').min(1900).max(2999);

const seasonalSchema = z
  .object({
    start_year: yearSchema.optional(),
    end_year: yearSchema.optional()
  })
  .superRefine((value, ctx) => {
    if (value.start_year !== undefined && value.end_year !== undefined && value.start_year > value.end_year) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['end_year'],
        message: 'end_year must not be earlier than start_year'
      });
    }
  });

export type SeasonalParams = {
  startYear: number | null;
  endYear: number | null;
};

export function parseSeasonalParams(raw: RawParameters): SeasonalParams {
  const value = parseWith(seasonalSchema, raw);
  return {
    startYear: value.start_year ?? null,
    endYear: value.end_year ?? null
  };
}

const paginationSchema = z.object({
  skip: z.coerce.number().int().min(0, 'skip must not be negative').default(0),
  limit: z.coerce.number().int().min(1, 'limit must be at least 1').max(1000, 'limit must be at most 1000').default(100),
  evaluator_id: z.string().trim().min(1).max(64).optional()
});

export type ClassificationListParams = {
  skip: number;
  limit: number;
  evaluatorId: string | null;
};

export function parseClassificationListParams(raw: RawParameters): ClassificationListParams {
  const value = parseWith(paginationSchema, raw);
  return {
    skip: value.skip,
    limit: value.limit,
    evaluatorId: value.evaluator_id ?? null
  };
}
