import { configError } from '@/lib/config/load-json';
import { loadReconcileConfig } from '@/lib/config/reconcile-config';
import { ErrorCode } from '@/lib/errors/error-codes';
import { CachedInventoryStore } from '@/lib/inventory/cached-store';
import { JsonFileInventoryStore } from '@/lib/inventory/json-file-store';
import { logEvent } from '@/lib/logging/logger';
import { SOURCE_ADAPTERS } from '@/lib/sources/adapters';
import { payloadCollector, staticCollector } from '@/lib/sources/collector';
import { readSourceDump } from '@/lib/sources/source-dump';
import { runSourceSync } from '@/lib/sync/sync-run';

import type { SyncCliOptions } from '@/lib/cli/sync-args';
import type { ReconcileConfig } from '@/lib/config/reconcile-config';
import type { SourceCollector } from '@/lib/sources/collector';
import type { SyncOutcome, SyncRunStatus } from '@/lib/sync/sync-run';

export function collectorFor(options: SyncCliOptions, config: ReconcileConfig, now: () => Date): SourceCollector {
  const { source, input } = options;
  if (source === 'static') return staticCollector(config.overrides, now);
  if (!input) throw configError(ErrorCode.CONFIG_INVALID, `--input is required for source ${source}`, { source });

  const adapter = SOURCE_ADAPTERS[source];
  return payloadCollector(
    source,
    () => readSourceDump(source, input),
    (payload, since) => adapter(payload, { now: now(), since }),
  );
}

export function exitCodeFor(status: SyncRunStatus): number {
  if (status === 'failed') return 1;
  if (status === 'partial' || status === 'cancelled') return 2;
  return 0;
}

/** One source batch from a dump file into a JSON-file inventory; prints the summary as a `cli` event. */
export async function runSyncCli(
  options: SyncCliOptions,
  deps: { now?: () => Date; signal?: AbortSignal } = {},
): Promise<SyncOutcome> {
  const now = deps.now ?? (() => new Date());
  const config = loadReconcileConfig({
    rulesPath: options.rulesPath,
    overridesPath: options.overridesPath,
    fieldDictionary: options.fields,
  });
  const store = new CachedInventoryStore(new JsonFileInventoryStore(options.store), config.cacheTtlMs, () =>
    now().getTime(),
  );

  const outcome = await runSourceSync({
    collector: collectorFor(options, config, now),
    store,
    config,
    since: options.since,
    runId: options.runId,
    signal: deps.signal,
    now,
  });

  logEvent({
    event_type: 'cli.sync_summary',
    level: outcome.status === 'failed' ? 'error' : 'info',
    service: 'cli',
    source: outcome.source,
    run_id: outcome.run_id,
    status: outcome.status,
    created: outcome.created,
    updated: outcome.updated,
    skipped: outcome.skipped,
    failed: outcome.failed,
    cancelled: outcome.cancelled,
    ...(outcome.error ? { error: outcome.error } : {}),
  });

  if (options.debug) {
    for (const record of outcome.records) {
      logEvent({
        event_type: 'cli.sync_record',
        level: 'info',
        service: 'cli',
        run_id: outcome.run_id,
        identity_key: record.identity_key,
        status: record.status,
        asset_id: record.asset_id ?? null,
        merged: record.merged,
        changes: record.changes ?? [],
        ...(record.error ? { error: record.error } : {}),
      });
    }
  }

  return outcome;
}
