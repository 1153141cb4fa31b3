import { managedDevicesToRecords } from '@plugins/mdm/normalize';
import { scanHostsToRecords } from '@plugins/scan/normalize';
import { snmpHostsToRecords } from '@plugins/snmp/normalize';

import type { RawDeviceRecord, SourceName } from '@/lib/ingest/raw-record';

export type DumpSource = Exclude<SourceName, 'static'>;

export type SourceAdapter = (payload: unknown, opts: { now: Date; since: Date | null }) => RawDeviceRecord[];

export const SOURCE_ADAPTERS: Readonly<Record<DumpSource, SourceAdapter>> = {
  mdm: (payload, opts) => managedDevicesToRecords(payload, opts),
  snmp: (payload, opts) => snmpHostsToRecords(payload, opts),
  scan: (payload, opts) => scanHostsToRecords(payload, opts),
};
