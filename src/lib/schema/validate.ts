import Ajv from 'ajv/dist/2020.js';
import addFormats from 'ajv-formats';

import canonicalAssetSchema from './canonical-asset-v1.schema.json';

import type { ErrorDetail } from '@/lib/errors/error';
import type { CanonicalAssetRecord } from '@/lib/ingest/canonical';

type Issue = { instancePath: string; message: string };

export type ValidationResult = { ok: true } | { ok: false; issues: Issue[] };

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

const validateCanonical = ajv.compile<CanonicalAssetRecord>(canonicalAssetSchema);

function toIssues(errors: typeof validateCanonical.errors): Issue[] {
  if (!errors) return [];
  return errors.map((err) => ({
    instancePath: err.instancePath,
    message: err.message ?? 'invalid',
  }));
}

export function validateCanonicalAsset(input: unknown): ValidationResult {
  const ok = validateCanonical(input);
  if (ok) return { ok: true };
  return { ok: false, issues: toIssues(validateCanonical.errors) };
}

export function isCanonicalAsset(input: unknown): input is CanonicalAssetRecord {
  return validateCanonical(input);
}

export function issuesToDetails(issues: Issue[]): ErrorDetail[] {
  return issues.slice(0, 20).map((issue) => ({
    field: issue.instancePath || '/',
    issue: 'schema',
    message: issue.message,
  }));
}
