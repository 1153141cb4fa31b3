import { classify, withCloudProvider } from '@/lib/categorize/classify';
import { ErrorCode } from '@/lib/errors/error-codes';
import { computeFieldChanges } from '@/lib/history/collect-changed';
import { resolveIdentity } from '@/lib/identity/identity-key';
import { mergeAsset } from '@/lib/merge/merge-asset';
import { issuesToDetails, validateCanonicalAsset } from '@/lib/schema/validate';

import type { Classification } from '@/lib/categorize/classify';
import type { ReconcileConfig } from '@/lib/config/reconcile-config';
import type { AppError } from '@/lib/errors/error';
import type { FieldChange } from '@/lib/history/collect-changed';
import type { IdentityResolution } from '@/lib/identity/identity-key';
import type { CanonicalAssetRecord, StoredAsset } from '@/lib/ingest/canonical';
import type { RawDeviceRecord } from '@/lib/ingest/raw-record';

type BatchMember = {
  raw: RawDeviceRecord;
  identity: IdentityResolution;
  classification: Classification;
};

export type PlannedSync =
  | { action: 'create'; identity_key: string; record: CanonicalAssetRecord; changes: FieldChange[]; merged: number }
  | {
      action: 'update';
      identity_key: string;
      id: string;
      record: CanonicalAssetRecord;
      changes: FieldChange[];
      merged: number;
    }
  | { action: 'skip'; identity_key: string; id: string; record: CanonicalAssetRecord; merged: number }
  | { action: 'fail'; identity_key: string; error: AppError; merged: number };

function indexSnapshot(snapshot: readonly StoredAsset[]): Map<string, StoredAsset> {
  const index = new Map<string, StoredAsset>();
  // Primary keys first so an alias never shadows another record's own key.
  for (const asset of snapshot) index.set(asset.record.identity_key, asset);
  for (const asset of snapshot) {
    for (const alias of asset.record.identity_aliases) if (!index.has(alias)) index.set(alias, asset);
  }
  return index;
}

type BatchGroup = { existing: StoredAsset | null; members: BatchMember[] };

function findExisting(keys: string[], index: Map<string, StoredAsset>): StoredAsset | null {
  for (const key of keys) {
    const hit = index.get(key);
    if (hit) return hit;
  }
  return null;
}

/**
 * Groups batch members that share an identity key or alias, or that resolve to the same stored asset. Groups keep
 * batch order; the first member starts the fold.
 */
function groupBatch(members: BatchMember[], index: Map<string, StoredAsset>): BatchGroup[] {
  const groups: BatchGroup[] = [];
  const groupByKey = new Map<string, number>();

  for (const member of members) {
    const keys = [member.identity.key, ...member.identity.aliases];
    const existing = findExisting(keys, index);
    const groupKeys = existing ? [`asset:${existing.id}`, ...keys] : keys;

    let idx = groupKeys.map((k) => groupByKey.get(k)).find((g) => g !== undefined);
    if (idx === undefined) {
      idx = groups.length;
      groups.push({ existing, members: [] });
    }

    const group = groups[idx];
    if (!group) continue;
    group.members.push(member);
    if (!group.existing && existing) group.existing = existing;
    for (const k of groupKeys) if (!groupByKey.has(k)) groupByKey.set(k, idx);
  }
  return groups;
}

function schemaError(identityKey: string, issues: Parameters<typeof issuesToDetails>[0]): AppError {
  return {
    code: ErrorCode.SCHEMA_VALIDATION_FAILED,
    category: 'schema',
    message: 'canonical record failed schema validation',
    retryable: false,
    redacted_context: { identity_key: identityKey },
    details: issuesToDetails(issues),
  };
}

function planGroup(group: BatchGroup, config: ReconcileConfig, runId: string): PlannedSync {
  const { existing, members } = group;
  const merged = members.length;
  const groupKey = existing?.record.identity_key ?? members[0]?.identity.key ?? 'unknown';

  let acc: CanonicalAssetRecord | null = existing?.record ?? null;
  for (const member of members) {
    const result = mergeAsset(acc, member.raw, member.classification, member.identity, {
      runId,
      sourcePriority: config.sourcePriority,
      fieldDictionary: config.fieldDictionary,
    });
    if (!result.ok) return { action: 'fail', identity_key: groupKey, error: result.error, merged };
    acc = result.record;
  }

  if (!acc) return { action: 'fail', identity_key: groupKey, error: schemaError(groupKey, []), merged };

  const validation = validateCanonicalAsset(acc);
  if (!validation.ok) {
    return { action: 'fail', identity_key: groupKey, error: schemaError(groupKey, validation.issues), merged };
  }

  if (!existing) {
    const changes = computeFieldChanges({ prev: null, next: acc });
    return { action: 'create', identity_key: groupKey, record: acc, changes, merged };
  }

  const changes = computeFieldChanges({ prev: existing.record, next: acc });
  if (changes.length === 0 && acc.display_name === existing.record.display_name) {
    return { action: 'skip', identity_key: groupKey, id: existing.id, record: existing.record, merged };
  }
  return { action: 'update', identity_key: groupKey, id: existing.id, record: acc, changes, merged };
}

/**
 * Pure planning step: resolves, classifies and folds the whole batch against the snapshot before anything is
 * written. Records sharing an identity key (or alias) produce exactly one plan entry.
 */
export function planSync(args: {
  batch: readonly RawDeviceRecord[];
  snapshot: readonly StoredAsset[];
  config: ReconcileConfig;
  runId: string;
}): PlannedSync[] {
  const members: BatchMember[] = args.batch.map((record) => {
    const raw = withCloudProvider(record, args.config.rules);
    const identity = resolveIdentity(raw, args.config.overrides);
    return { raw, identity, classification: classify(raw, identity, args.config.rules) };
  });

  const index = indexSnapshot(args.snapshot);
  return groupBatch(members, index).map((group) => planGroup(group, args.config, args.runId));
}
