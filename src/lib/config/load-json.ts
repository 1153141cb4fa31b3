import { readFileSync } from 'node:fs';

import { ErrorCode } from '@/lib/errors/error-codes';
import { causeOf } from '@/lib/errors/error';

import type { AppError } from '@/lib/errors/error';
import type { z } from 'zod/v4';

type ConfigErrorCode =
  | typeof ErrorCode.CONFIG_INVALID
  | typeof ErrorCode.CONFIG_RULES_INVALID
  | typeof ErrorCode.CONFIG_STATIC_OVERRIDES_INVALID;

export function configError(code: ConfigErrorCode, message: string, context: Record<string, string>): AppError {
  return { code, category: 'config', message, retryable: false, redacted_context: context };
}

/** Reads a JSON config file and validates it; failures surface as a config AppError. */
export function loadJsonConfig<S extends z.ZodType>(args: {
  path: string;
  schema: S;
  code: ConfigErrorCode;
  label: string;
}): z.output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(args.path, 'utf8'));
  } catch (err) {
    throw configError(args.code, `${args.label}: unreadable JSON`, { path: args.path, cause: causeOf(err) });
  }

  const parsed = args.schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.slice(0, 20).map((issue) => ({
      field: issue.path.map(String).join('.'),
      issue: issue.code,
      message: issue.message,
    }));
    throw {
      ...configError(args.code, `${args.label}: schema validation failed`, { path: args.path }),
      details: issues,
    } satisfies AppError;
  }

  return parsed.data;
}
