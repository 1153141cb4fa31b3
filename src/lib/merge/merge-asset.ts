import { FALLBACK_RULE } from '@/lib/categorize/classify';
import { ErrorCode } from '@/lib/errors/error-codes';
import { computeFieldChanges, equalForCompare } from '@/lib/history/collect-changed';
import { isGenericName } from '@/lib/identity/identifiers';
import { CANONICAL_VERSION, deriveDisplayName } from '@/lib/ingest/canonical';
import { ATTR, isEmptyValue } from '@/lib/ingest/raw-record';

import type { Classification } from '@/lib/categorize/classify';
import type { AppError } from '@/lib/errors/error';
import type { FieldChange } from '@/lib/history/collect-changed';
import type { IdentityResolution } from '@/lib/identity/identity-key';
import type { CanonicalAssetRecord, FieldEntry } from '@/lib/ingest/canonical';
import type { FieldValue, RawDeviceRecord, SourceName } from '@/lib/ingest/raw-record';
import type { StaticOverride } from '@/lib/static-overrides/static-overrides';

export const DEFAULT_SOURCE_PRIORITY: readonly SourceName[] = ['static', 'mdm', 'snmp', 'scan'];

export type MergeContext = {
  runId: string;
  /** Highest priority first. Only consulted when a field was already written earlier in the same run. */
  sourcePriority: readonly SourceName[];
  /** When set, attributes outside the dictionary are not tracked. */
  fieldDictionary: ReadonlySet<string> | null;
};

export type MergeResult =
  | { ok: true; record: CanonicalAssetRecord; changed: boolean; changes: FieldChange[] }
  | { ok: false; error: AppError };

function priorityRank(priority: readonly SourceName[], source: SourceName): number {
  const idx = priority.indexOf(source);
  return idx === -1 ? priority.length : idx;
}

function shapeOf(value: FieldValue): 'list' | 'scalar' {
  return Array.isArray(value) ? 'list' : 'scalar';
}

function mergeConflict(identityKey: string, field: string, stored: FieldValue, incoming: FieldValue): AppError {
  return {
    code: ErrorCode.MERGE_CONFLICT,
    category: 'merge',
    message: `field "${field}" changed shape`,
    retryable: false,
    redacted_context: { identity_key: identityKey, field },
    details: [
      {
        field: `fields.${field}`,
        issue: 'shape_mismatch',
        message: `stored ${shapeOf(stored)}, incoming ${shapeOf(incoming)}`,
      },
    ],
  };
}

function tracked(key: string, context: MergeContext): boolean {
  return !context.fieldDictionary || context.fieldDictionary.has(key);
}

function incomingFields(
  incoming: RawDeviceRecord,
  context: MergeContext,
  override: Readonly<StaticOverride> | null,
): Array<[string, FieldValue]> {
  const out: Array<[string, FieldValue]> = [];
  for (const [key, value] of Object.entries(incoming.attributes)) {
    if (value === null || isEmptyValue(value)) continue;
    if (!tracked(key, context)) continue;
    // The override table owns the name of every device it lists.
    if (override && key === ATTR.name) continue;
    out.push([key, value]);
  }
  return out;
}

function isGenericValue(value: FieldValue): boolean {
  return typeof value === 'string' && isGenericName(value);
}

/** Writes the override's name with static provenance unless it is already stored that way. */
function pinStaticName(
  fields: Record<string, FieldEntry>,
  override: Readonly<StaticOverride>,
  incoming: RawDeviceRecord,
  context: MergeContext,
): void {
  if (!tracked(ATTR.name, context)) return;
  const stored = fields[ATTR.name];
  if (stored && stored.source === 'static' && equalForCompare(stored.value, override.name)) return;
  fields[ATTR.name] = {
    value: override.name,
    source: 'static',
    updated_at: incoming.observed_at,
    run_id: context.runId,
  };
}

function mergeAliases(existing: readonly string[], incoming: readonly string[]): string[] {
  return Array.from(new Set([...existing, ...incoming]));
}

/**
 * Folds one incoming record into the stored canonical record (or starts a new one).
 *
 * Empty incoming values never clear stored ones; a changed value replaces both value and provenance; an equal value
 * keeps the provenance it already has. A field whose shape flips between scalar and list fails the whole record.
 * Devices listed in the override table always carry the table's name.
 */
export function mergeAsset(
  existing: CanonicalAssetRecord | null,
  incoming: RawDeviceRecord,
  classification: Classification,
  identity: IdentityResolution,
  context: MergeContext,
): MergeResult {
  const entryFor = (value: FieldValue): FieldEntry => ({
    value,
    source: incoming.source,
    updated_at: incoming.observed_at,
    run_id: context.runId,
  });

  const override = identity.override;

  if (!existing) {
    const fields: Record<string, FieldEntry> = {};
    for (const [key, value] of incomingFields(incoming, context, override)) fields[key] = entryFor(value);
    if (override) pinStaticName(fields, override, incoming, context);

    const record: CanonicalAssetRecord = {
      version: CANONICAL_VERSION,
      identity_key: identity.key,
      identity_aliases: mergeAliases([identity.key], identity.aliases),
      display_name: deriveDisplayName(fields, identity.key),
      device_type: classification.device_type,
      category: classification.category,
      category_source: classification.category_source,
      fields,
      location: override?.location ?? null,
      placement: override?.placement ?? null,
      last_update_source: incoming.source,
      last_update_at: incoming.observed_at,
    };
    return { ok: true, record, changed: true, changes: computeFieldChanges({ prev: null, next: record }) };
  }

  const fields: Record<string, FieldEntry> = { ...existing.fields };
  const incomingRank = priorityRank(context.sourcePriority, incoming.source);

  for (const [key, value] of incomingFields(incoming, context, override)) {
    const stored = fields[key];
    if (!stored) {
      fields[key] = entryFor(value);
      continue;
    }

    if (shapeOf(stored.value) !== shapeOf(value)) {
      return { ok: false, error: mergeConflict(existing.identity_key, key, stored.value, value) };
    }
    if (equalForCompare(stored.value, value)) continue;
    // Placeholder names such as `_gateway` or `device-1a2b` never replace a real one.
    if (key === ATTR.name && isGenericValue(value) && !isGenericValue(stored.value)) continue;

    const writtenThisRun = stored.run_id === context.runId;
    if (writtenThisRun && priorityRank(context.sourcePriority, stored.source) < incomingRank) continue;

    fields[key] = entryFor(value);
  }
  if (override) pinStaticName(fields, override, incoming, context);

  // A static category is only ever replaced by another static one; a bare fallback never replaces anything.
  const keepCategory =
    (existing.category_source === 'static' && classification.category_source === 'rules') ||
    classification.matched_rule === FALLBACK_RULE;
  const category = keepCategory
    ? { device_type: existing.device_type, category: existing.category, category_source: existing.category_source }
    : {
        device_type: classification.device_type,
        category: classification.category,
        category_source: classification.category_source,
      };

  const candidate: CanonicalAssetRecord = {
    ...existing,
    ...category,
    identity_aliases: mergeAliases(existing.identity_aliases, identity.aliases),
    display_name: deriveDisplayName(fields, existing.identity_key),
    fields,
    location: override?.location ?? existing.location,
    placement: override?.placement ?? existing.placement,
  };

  const changes = computeFieldChanges({ prev: existing, next: candidate });
  const changed = changes.length > 0 || candidate.display_name !== existing.display_name;
  if (!changed) return { ok: true, record: existing, changed: false, changes: [] };

  return {
    ok: true,
    record: { ...candidate, last_update_source: incoming.source, last_update_at: incoming.observed_at },
    changed: true,
    changes,
  };
}
