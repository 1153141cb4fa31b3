import { staticOverrideRecords } from '@/lib/static-overrides/static-overrides';

import type { RawDeviceRecord, SourceName } from '@/lib/ingest/raw-record';
import type { StaticOverrideTable } from '@/lib/static-overrides/static-overrides';

/** Pull-based input: everything the source has seen since the last successful run (`null` = full inventory). */
export interface SourceCollector {
  readonly source: SourceName;
  collect(since: Date | null): Promise<RawDeviceRecord[]>;
}

export function staticCollector(table: StaticOverrideTable, now: () => Date = () => new Date()): SourceCollector {
  return {
    source: 'static',
    collect: async () => staticOverrideRecords(table, now()),
  };
}

/** Loads a native payload and hands it, with the `since` watermark, to the adapter that maps it. */
export function payloadCollector<T>(
  source: SourceName,
  load: () => Promise<T>,
  toRecords: (payload: T, since: Date | null) => RawDeviceRecord[],
): SourceCollector {
  return {
    source,
    collect: async (since) => toRecords(await load(), since),
  };
}
