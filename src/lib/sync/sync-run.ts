import { randomUUID } from 'node:crypto';

import { mapWithConcurrency, TimeoutError, withTimeout } from '@/lib/concurrency/map-with-concurrency';
import { ErrorCode } from '@/lib/errors/error-codes';
import { causeOf, isAppError } from '@/lib/errors/error';
import { inventoryReadError, inventoryWriteError } from '@/lib/inventory/store';
import { logEvent } from '@/lib/logging/logger';
import { planSync } from '@/lib/sync/decide';

import type { ReconcileConfig } from '@/lib/config/reconcile-config';
import type { AppError } from '@/lib/errors/error';
import type { FieldChange } from '@/lib/history/collect-changed';
import type { StoredAsset } from '@/lib/ingest/canonical';
import type { RawDeviceRecord, SourceName } from '@/lib/ingest/raw-record';
import type { InventoryStore } from '@/lib/inventory/store';
import type { SourceCollector } from '@/lib/sources/collector';
import type { PlannedSync } from '@/lib/sync/decide';

export type SyncRecordStatus = 'created' | 'updated' | 'skipped' | 'failed' | 'cancelled';

export type SyncRecordResult = {
  identity_key: string;
  status: SyncRecordStatus;
  asset_id?: string;
  /** Raw records folded into this decision. */
  merged: number;
  changes?: FieldChange[];
  error?: AppError;
};

export type SyncRunStatus = 'succeeded' | 'partial' | 'failed' | 'cancelled';

export type SyncOutcome = {
  source: SourceName;
  run_id: string;
  status: SyncRunStatus;
  created: number;
  updated: number;
  skipped: number;
  failed: number;
  cancelled: number;
  started_at: string;
  finished_at: string;
  records: SyncRecordResult[];
  error?: AppError;
};

function acquisitionError(source: SourceName, err: unknown): AppError {
  if (isAppError(err)) return err;
  return {
    code: ErrorCode.SOURCE_ACQUISITION_FAILED,
    category: 'network',
    message: `failed to collect ${source} records`,
    retryable: true,
    redacted_context: { source, cause: causeOf(err) },
  };
}

function writeFailure(err: unknown, context: Record<string, string>, timeoutMs: number): AppError {
  if (err instanceof TimeoutError) {
    return {
      code: ErrorCode.INVENTORY_WRITE_TIMEOUT,
      category: 'timeout',
      message: `inventory write timed out after ${timeoutMs}ms`,
      retryable: true,
      redacted_context: context,
    };
  }
  return isAppError(err) ? err : inventoryWriteError(err, context);
}

function cancelledError(identityKey: string): AppError {
  return {
    code: ErrorCode.SYNC_CANCELLED,
    category: 'cancelled',
    message: 'run cancelled before this write started',
    retryable: true,
    redacted_context: { identity_key: identityKey },
  };
}

async function executePlan(
  plan: PlannedSync,
  args: { store: InventoryStore; config: ReconcileConfig; signal?: AbortSignal },
): Promise<SyncRecordResult> {
  const base = { identity_key: plan.identity_key, merged: plan.merged };

  switch (plan.action) {
    case 'fail':
      return { ...base, status: 'failed', error: plan.error };
    case 'skip':
      return { ...base, status: 'skipped', asset_id: plan.id };
    case 'create':
    case 'update':
      break;
  }

  if (args.signal?.aborted) return { ...base, status: 'cancelled', error: cancelledError(plan.identity_key) };

  const timeoutMs = args.config.writeTimeoutMs;
  try {
    if (plan.action === 'create') {
      const id = await withTimeout(args.store.create(plan.record), timeoutMs);
      return { ...base, status: 'created', asset_id: id, changes: plan.changes };
    }
    await withTimeout(args.store.update(plan.id, plan.record), timeoutMs);
    return { ...base, status: 'updated', asset_id: plan.id, changes: plan.changes };
  } catch (err) {
    const context: Record<string, string> = { identity_key: plan.identity_key, action: plan.action };
    if (plan.action === 'update') context.asset_id = plan.id;
    return { ...base, status: 'failed', error: writeFailure(err, context, timeoutMs) };
  }
}

function countBy(records: SyncRecordResult[], status: SyncRecordStatus): number {
  return records.filter((r) => r.status === status).length;
}

function finalize(args: {
  source: SourceName;
  runId: string;
  startedAt: Date;
  now: () => Date;
  records: SyncRecordResult[];
  error?: AppError;
}): SyncOutcome {
  const { records } = args;
  const counts = {
    created: countBy(records, 'created'),
    updated: countBy(records, 'updated'),
    skipped: countBy(records, 'skipped'),
    failed: countBy(records, 'failed'),
    cancelled: countBy(records, 'cancelled'),
  };

  let status: SyncRunStatus = 'succeeded';
  if (args.error) status = 'failed';
  else if (counts.cancelled > 0) status = 'cancelled';
  else if (counts.failed > 0) status = 'partial';

  const outcome: SyncOutcome = {
    source: args.source,
    run_id: args.runId,
    status,
    ...counts,
    started_at: args.startedAt.toISOString(),
    finished_at: args.now().toISOString(),
    records,
    ...(args.error ? { error: args.error } : {}),
  };

  logEvent({
    event_type: 'sync.run_finished',
    level: status === 'failed' ? 'error' : 'info',
    service: 'engine',
    source: outcome.source,
    run_id: outcome.run_id,
    status,
    ...counts,
    duration_ms: Date.parse(outcome.finished_at) - args.startedAt.getTime(),
    ...(args.error ? { error_code: args.error.code } : {}),
  });

  return outcome;
}

/**
 * Plans one source batch against the current store snapshot, then writes creates and updates through a bounded
 * worker pool. Never throws: acquisition and snapshot failures end the run as `failed` with zero records.
 */
export async function decide(args: {
  source: SourceName;
  batch: readonly RawDeviceRecord[];
  snapshot: StoredAsset[];
  store: InventoryStore;
  config: ReconcileConfig;
  runId: string;
  signal?: AbortSignal;
}): Promise<SyncRecordResult[]> {
  const plans = planSync({ batch: args.batch, snapshot: args.snapshot, config: args.config, runId: args.runId });

  const records = await mapWithConcurrency(plans, args.config.writeConcurrency, (plan) => executePlan(plan, args));

  for (const record of records) {
    if (record.status !== 'failed') continue;
    logEvent({
      event_type: 'sync.record_failed',
      level: 'error',
      service: 'engine',
      source: args.source,
      run_id: args.runId,
      identity_key: record.identity_key,
      error_code: record.error?.code,
      error: record.error,
    });
  }

  return records;
}

export async function runSourceSync(args: {
  collector: SourceCollector;
  store: InventoryStore;
  config: ReconcileConfig;
  since?: Date | null;
  runId?: string;
  signal?: AbortSignal;
  now?: () => Date;
}): Promise<SyncOutcome> {
  const now = args.now ?? (() => new Date());
  const source = args.collector.source;
  const runId = args.runId ?? randomUUID();
  const startedAt = now();

  let batch: RawDeviceRecord[];
  try {
    batch = await args.collector.collect(args.since ?? null);
  } catch (err) {
    const error = acquisitionError(source, err);
    logEvent({
      event_type: 'source.acquisition_failed',
      level: 'error',
      service: 'engine',
      source,
      run_id: runId,
      error,
    });
    return finalize({ source, runId, startedAt, now, records: [], error });
  }

  let snapshot: StoredAsset[];
  try {
    snapshot = await args.store.getAll();
  } catch (err) {
    const error = isAppError(err) ? err : inventoryReadError(err);
    return finalize({ source, runId, startedAt, now, records: [], error });
  }

  const records = await decide({
    source,
    batch,
    snapshot,
    store: args.store,
    config: args.config,
    runId,
    signal: args.signal,
  });
  return finalize({ source, runId, startedAt, now, records });
}

/** Lowest-priority source first, so higher-priority sources write last within the shared run id. */
export function cycleOrder(sources: readonly SourceName[], priority: readonly SourceName[]): SourceName[] {
  const rank = (s: SourceName) => {
    const idx = priority.indexOf(s);
    return idx === -1 ? priority.length : idx;
  };
  return [...sources].sort((a, b) => rank(b) - rank(a));
}

/**
 * Runs every collector serially under one run id. A failed source does not stop the others; an aborted signal stops
 * the cycle before the next source starts.
 */
export async function runSyncCycle(args: {
  collectors: readonly SourceCollector[];
  store: InventoryStore;
  config: ReconcileConfig;
  since?: Date | null;
  runId?: string;
  signal?: AbortSignal;
  now?: () => Date;
}): Promise<SyncOutcome[]> {
  const runId = args.runId ?? randomUUID();
  const bySource = new Map(args.collectors.map((c) => [c.source, c]));
  const order = cycleOrder(Array.from(bySource.keys()), args.config.sourcePriority);

  const outcomes: SyncOutcome[] = [];
  for (const source of order) {
    if (args.signal?.aborted) break;
    const collector = bySource.get(source);
    if (!collector) continue;
    outcomes.push(await runSourceSync({ ...args, collector, runId }));
  }
  return outcomes;
}
