import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'EnvConfigError';
  }
}

function formatIssue(path: (string | number)[], message: string): string {
  const location = path.length > 0 ? path.join('.') : '<root>';
  return `${location}: ${message}`;
}

/**
 * Validates an environment bag against a zod schema and reports every
 * offending variable at once.
 */
export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'aerolens';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => formatIssue(issue.path, issue.message));
    const details = issues.map((issue) => `  - ${issue}`).join('\n');
    throw new EnvConfigError(`[${context}] Invalid environment configuration\n${details}`, issues);
  }

  return result.data;
}

type CommonOptions<T> = {
  required?: boolean;
  defaultValue?: T;
  description?: string;
};

function describeVariable(ctx: z.RefinementCtx, description?: string): string {
  if (description) {
    return description;
  }
  const last = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
  return last === undefined ? 'value' : String(last);
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

function resolveMissing<T>(ctx: z.RefinementCtx, options: CommonOptions<T> | undefined): T | undefined {
  if (options?.defaultValue !== undefined) {
    return options.defaultValue;
  }
  if (options?.required) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Missing required ${describeVariable(ctx, options.description)}`
    });
    return z.NEVER;
  }
  return undefined;
}

export function booleanVar(options?: CommonOptions<boolean>) {
  return z.union([z.string(), z.boolean()]).nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveMissing(ctx, options);
    }
    if (typeof value === 'boolean') {
      return value;
    }

    const normalized = String(value).trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (FALSE_VALUES.has(normalized)) {
      return false;
    }

    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid ${describeVariable(ctx, options?.description)}. Accepted boolean values: ${[
        ...TRUE_VALUES,
        ...FALSE_VALUES
      ].join(', ')}`
    });
    return z.NEVER;
  });
}

export type IntegerVarOptions = CommonOptions<number> & {
  min?: number;
  max?: number;
};

export function integerVar(options?: IntegerVarOptions) {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveMissing(ctx, options);
    }

    const description = describeVariable(ctx, options?.description);
    const parsed = typeof value === 'number' ? value : Number(String(value).trim());
    if (!Number.isInteger(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected ${description} to be an integer` });
      return z.NEVER;
    }
    if (options?.min !== undefined && parsed < options.min) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be >= ${options.min}` });
      return z.NEVER;
    }
    if (options?.max !== undefined && parsed > options.max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be <= ${options.max}` });
      return z.NEVER;
    }
    return parsed;
  });
}

export type StringVarOptions = CommonOptions<string> & {
  lowercase?: boolean;
  pattern?: RegExp;
};

export function stringVar(options?: StringVarOptions) {
  return z.string().nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveMissing(ctx, options);
    }

    const trimmed = String(value).trim();
    const normalized = options?.lowercase ? trimmed.toLowerCase() : trimmed;
    if (options?.pattern && !options.pattern.test(normalized)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${describeVariable(ctx, options.description)} does not match expected pattern`
      });
      return z.NEVER;
    }
    return normalized;
  });
}

export type JsonVarOptions<T> = CommonOptions<T> & {
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
};

export function jsonVar<T>(options: JsonVarOptions<T>) {
  return z.string().nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveMissing(ctx, options);
    }

    const description = describeVariable(ctx, options.description);
    let parsed: unknown;
    try {
      parsed = JSON.parse(String(value));
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Failed to parse ${description} as JSON` });
      return z.NEVER;
    }

    const result = options.schema.safeParse(parsed);
    if (!result.success) {
      const [firstIssue] = result.error.issues;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} ${firstIssue?.message ?? 'does not match expected structure'}`
      });
      return z.NEVER;
    }
    return result.data;
  });
}

export const envParsers = {
  boolean: booleanVar,
  integer: integerVar,
  string: stringVar,
  json: jsonVar
};
