import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);
const DEFAULT_LIST_SEPARATOR = /[,\s]+/;

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'EnvConfigError';
    this.issues = issues;
  }
}

function formatIssue(path: (string | number)[], message: string): string {
  const location = path.length > 0 ? path.join('.') : '<root>';
  return `${location}: ${message}`;
}

/**
 * Parses an environment bag with the given schema. Every failing variable is
 * reported in one error so a misconfigured deployment shows all of its
 * problems at once.
 */
export function loadEnvConfig<Schema extends z.ZodTypeAny>(
  schema: Schema,
  options?: LoadEnvConfigOptions
): z.output<Schema> {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'stationhub';

  const result = schema.safeParse(envSource);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => formatIssue(issue.path, issue.message));
  const details = issues.map((issue) => `  - ${issue}`).join('\n');
  throw new EnvConfigError(`[${context}] Invalid environment configuration\n${details}`, issues);
}

type VarOptions<T> = {
  required?: boolean;
  defaultValue?: T;
  description?: string;
};

function describeVar(ctx: z.RefinementCtx, description?: string): string {
  if (description) {
    return description;
  }
  const name = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
  return name === undefined ? 'value' : String(name);
}

function isBlank(value: unknown): value is null | undefined | '' {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

// Shared handling for an unset variable: default, required issue, or undefined.
function resolveMissing<T>(ctx: z.RefinementCtx, options: VarOptions<T> | undefined): T | undefined {
  if (options?.defaultValue !== undefined) {
    return options.defaultValue;
  }
  if (options?.required) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${describeVar(ctx, options.description)}` });
    return z.NEVER;
  }
  return undefined;
}

export function booleanVar(options?: VarOptions<boolean>) {
  return z.union([z.string(), z.boolean()]).nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveMissing(ctx, options);
    }
    if (typeof value === 'boolean') {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (FALSE_VALUES.has(normalized)) {
      return false;
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid ${describeVar(ctx, options?.description)}. Expected one of ${[...TRUE_VALUES, ...FALSE_VALUES].join(', ')}`
    });
    return z.NEVER;
  });
}

export type NumericVarOptions = VarOptions<number> & {
  min?: number;
  max?: number;
};

function numericVar(options: NumericVarOptions | undefined, integer: boolean) {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveMissing(ctx, options);
    }
    const description = describeVar(ctx, options?.description);
    const parsed = typeof value === 'number' ? value : Number(value.trim());
    if (!Number.isFinite(parsed) || (integer && !Number.isInteger(parsed))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected ${description} to be ${integer ? 'an integer' : 'a number'}`
      });
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

export function integerVar(options?: NumericVarOptions) {
  return numericVar(options, true);
}

export function numberVar(options?: NumericVarOptions) {
  return numericVar(options, false);
}

export type StringVarOptions = VarOptions<string> & {
  lowercase?: boolean;
};

export function stringVar(options?: StringVarOptions) {
  return z.string().nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveMissing(ctx, options);
    }
    const trimmed = value.trim();
    return options?.lowercase ? trimmed.toLowerCase() : trimmed;
  });
}

export type StringListVarOptions = VarOptions<string[]> & {
  separator?: RegExp | string;
};

export function stringListVar(options?: StringListVarOptions) {
  return z.string().nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveMissing(ctx, options) ?? [];
    }
    return value
      .split(options?.separator ?? DEFAULT_LIST_SEPARATOR)
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
  });
}
