import { z } from 'zod';
import { ValidationError, type ValidationIssue } from '../errors/domain';

export const PERIOD_GRANULARITIES = ['year', 'month'] as const;
export type PeriodGranularity = (typeof PERIOD_GRANULARITIES)[number];

export type CalendarMonth = Readonly<{
  year: number;
  month: number;
}>;

export type FilterSpecification = Readonly<{
  operators: readonly string[];
  phases: readonly string[];
  aircraftTypes: readonly string[];
  locations: readonly string[];
  startPeriod: CalendarMonth | null;
  endPeriod: CalendarMonth | null;
  periodGranularity: PeriodGranularity;
}>;

export type RawParameters = Record<string, unknown>;

const PERIOD_REGEX = /^(\d{4})-(0[1-9]|1[0-2])$/;
const MAX_FILTER_VALUES = 200;

function toValueList(value: string | string[] | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  const entries = Array.isArray(value) ? value : [value];
  const unique = new Set<string>();
  for (const entry of entries) {
    const trimmed = entry.trim();
    if (trimmed.length > 0) {
      unique.add(trimmed);
    }
  }
  return Array.from(unique);
}

const filterValuesSchema = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform(toValueList)
  .refine((values) => values.length <= MAX_FILTER_VALUES, {
    message: `At most ${MAX_FILTER_VALUES} values are allowed`
  });

const periodSchema = z
  .string()
  .trim()
  .regex(PERIOD_REGEX, 'Expected a calendar month formatted as YYYY-MM')
  .refine((value) => !value.startsWith('0000-'), 'Year must be 0001 or later')
  .transform(parseCalendarMonth)
  .optional();

const filterSchema = z
  .object({
    operators: filterValuesSchema,
    phases: filterValuesSchema,
    aircraft_types: filterValuesSchema,
    locations: filterValuesSchema,
    start_period: periodSchema,
    end_period: periodSchema,
    period_granularity: z.enum(PERIOD_GRANULARITIES).default('month')
  })
  .superRefine((value, ctx) => {
    if (value.start_period && value.end_period && compareMonths(value.start_period, value.end_period) > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['end_period'],
        message: 'end_period must not be earlier than start_period'
      });
    }
  });

function parseCalendarMonth(value: string): CalendarMonth {
  const match = PERIOD_REGEX.exec(value);
  if (!match) {
    throw new Error(`Invalid calendar month: ${value}`);
  }
  return Object.freeze({ year: Number(match[1]), month: Number(match[2]) });
}

export function compareMonths(left: CalendarMonth, right: CalendarMonth): number {
  return left.year !== right.year ? left.year - right.year : left.month - right.month;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

export function formatMonth(month: CalendarMonth): string {
  return `${pad(month.year, 4)}-${pad(month.month, 2)}`;
}

/** First calendar day of the month, as an ISO date. */
export function monthStart(month: CalendarMonth): string {
  return `${formatMonth(month)}-01`;
}

/** First calendar day after the month, as an ISO date. */
export function nextMonthStart(month: CalendarMonth): string {
  const next = month.month === 12 ? { year: month.year + 1, month: 1 } : { year: month.year, month: month.month + 1 };
  return monthStart(next);
}

export function toValidationError(error: z.ZodError): ValidationError {
  const issues: ValidationIssue[] = error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'parameters',
    message: issue.message
  }));
  return new ValidationError(issues);
}

export function parseFilterSpecification(raw: RawParameters): FilterSpecification {
  const result = filterSchema.safeParse(raw);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  const value = result.data;

  return Object.freeze({
    operators: Object.freeze(value.operators),
    phases: Object.freeze(value.phases),
    aircraftTypes: Object.freeze(value.aircraft_types),
    locations: Object.freeze(value.locations),
    startPeriod: value.start_period ?? null,
    endPeriod: value.end_period ?? null,
    periodGranularity: value.period_granularity
  });
}

export const UNRESTRICTED_FILTER: FilterSpecification = parseFilterSpecification({});
