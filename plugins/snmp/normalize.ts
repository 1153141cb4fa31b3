import { formatMac, normalizeIp } from '@/lib/identity/identifiers';
import { ATTR, createRawDeviceRecord } from '@/lib/ingest/raw-record';

import type { RawDeviceRecord } from '@/lib/ingest/raw-record';

export const SNMP_OIDS = {
  sysDescr: '1.3.6.1.2.1.1.1.0',
  sysUpTime: '1.3.6.1.2.1.1.3.0',
  sysContact: '1.3.6.1.2.1.1.4.0',
  sysName: '1.3.6.1.2.1.1.5.0',
  sysLocation: '1.3.6.1.2.1.1.6.0',
  ifPhysAddress1: '1.3.6.1.2.1.2.2.1.6.1',
  entPhysicalSerialNum: '1.3.6.1.2.1.47.1.1.1.1.11.1',
  entPhysicalMfgName: '1.3.6.1.2.1.47.1.1.1.1.12.1',
  entPhysicalModelName: '1.3.6.1.2.1.47.1.1.1.1.13.1',
} as const;

// Checked in order against sysDescr; first hit wins.
const VENDOR_TOKENS: ReadonlyArray<readonly [token: string, vendor: string]> = [
  ['meraki', 'Cisco Meraki'],
  ['cisco', 'Cisco'],
  ['juniper', 'Juniper'],
  ['junos', 'Juniper'],
  ['fortigate', 'Fortinet'],
  ['fortinet', 'Fortinet'],
  ['palo alto', 'Palo Alto Networks'],
  ['aruba', 'Aruba'],
  ['procurve', 'HP'],
  ['hewlett-packard', 'HP'],
  ['ubiquiti', 'Ubiquiti'],
  ['unifi', 'Ubiquiti'],
  ['mikrotik', 'MikroTik'],
  ['routeros', 'MikroTik'],
  ['netgear', 'Netgear'],
  ['synology', 'Synology'],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function cleanString(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function oidMap(raw: Record<string, unknown>): Map<string, string> {
  const out = new Map<string, string>();
  for (const [oid, value] of Object.entries(raw)) {
    const cleaned = cleanString(value);
    if (cleaned) out.set(oid.trim().replace(/^\./, ''), cleaned);
  }
  return out;
}

export function sniffVendor(sysDescr: string | null): string | null {
  if (!sysDescr) return null;
  const lower = sysDescr.toLowerCase();
  for (const [token, vendor] of VENDOR_TOKENS) {
    if (lower.includes(token)) return vendor;
  }
  return null;
}

/** Timeticks (1/100 s) as `Nd Nh Nm`; anything non-numeric is returned as given. */
export function formatUptime(ticks: string): string {
  const trimmed = ticks.trim();
  if (!/^\d+$/.test(trimmed)) return ticks;
  const n = Number(trimmed);
  const days = Math.floor(n / 8640000);
  const hours = Math.floor((n % 8640000) / 360000);
  const minutes = Math.floor((n % 360000) / 6000);
  return `${days}d ${hours}h ${minutes}m`;
}

function physAddress(value: string | null): string | null {
  if (!value) return null;
  return formatMac(value.replace(/^0x/i, ''));
}

/** Null when the host has no usable address or answered none of the polled OIDs. */
export function normalizeSnmpHost(row: Record<string, unknown>, now: Date): RawDeviceRecord | null {
  const ip = normalizeIp(row.ip);
  if (!ip || !isRecord(row.oids)) return null;

  const oids = oidMap(row.oids);
  if (oids.size === 0) return null;
  const get = (oid: string) => oids.get(oid) ?? null;

  const sysDescr = get(SNMP_OIDS.sysDescr);
  const sysName = get(SNMP_OIDS.sysName);
  const serial = get(SNMP_OIDS.entPhysicalSerialNum);
  const mac = physAddress(get(SNMP_OIDS.ifPhysAddress1));
  const uptime = get(SNMP_OIDS.sysUpTime);

  const polledAt = cleanString(row.polled_at);
  const polled = polledAt ? new Date(polledAt) : null;

  return createRawDeviceRecord({
    source: 'snmp',
    hints: { ip, serial, mac, hostname: sysName },
    attributes: {
      [ATTR.name]: sysName,
      [ATTR.serial]: serial,
      [ATTR.manufacturer]: get(SNMP_OIDS.entPhysicalMfgName) ?? sniffVendor(sysDescr),
      [ATTR.model]: get(SNMP_OIDS.entPhysicalModelName),
      [ATTR.lastSeenIp]: ip,
      [ATTR.macAddresses]: mac ? [mac] : null,
      snmp_sys_description: sysDescr,
      snmp_location: get(SNMP_OIDS.sysLocation),
      snmp_contact: get(SNMP_OIDS.sysContact),
      snmp_uptime: uptime ? formatUptime(uptime) : null,
    },
    observedAt: polled && Number.isFinite(polled.getTime()) ? polled : now,
  });
}

/** Accepts a host array or `{ hosts: [...] }`. */
export function snmpHostsToRecords(payload: unknown, opts: { now: Date }): RawDeviceRecord[] {
  const rows: unknown[] = Array.isArray(payload)
    ? payload
    : isRecord(payload) && Array.isArray(payload.hosts)
      ? payload.hosts
      : [];

  const records: RawDeviceRecord[] = [];
  for (const row of rows) {
    if (!isRecord(row)) continue;
    const record = normalizeSnmpHost(row, opts.now);
    if (record) records.push(record);
  }
  return records;
}
