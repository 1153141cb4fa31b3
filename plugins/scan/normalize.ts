import { formatMac, normalizeIp } from '@/lib/identity/identifiers';
import { ATTR, createRawDeviceRecord } from '@/lib/ingest/raw-record';

import type { RawDeviceRecord } from '@/lib/ingest/raw-record';

const PROTOCOLS = ['tcp', 'udp'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function cleanString(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function records(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function firstHostname(value: unknown): string | null {
  for (const entry of records(value)) {
    const name = cleanString(entry.name);
    if (name) return name;
  }
  return null;
}

function firstVendor(value: unknown): string | null {
  if (!isRecord(value)) return null;
  for (const vendor of Object.values(value)) {
    const cleaned = cleanString(vendor);
    if (cleaned) return cleaned;
  }
  return null;
}

function parseAccuracy(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return Number(value.trim());
  return null;
}

// Scanners list OS guesses best-first.
function bestOsMatch(value: unknown): { name: string; accuracy: number | null } | null {
  const first = records(value)[0];
  const name = first ? cleanString(first.name) : null;
  if (!first || !name) return null;
  return { name, accuracy: parseAccuracy(first.accuracy) };
}

/** `port/proto/service (product version)` lines for open ports, tcp first, ports ascending. */
export function describeOpenPorts(host: Record<string, unknown>): { ports: string[]; services: string[] } {
  const ports: string[] = [];
  const services: string[] = [];

  for (const proto of PROTOCOLS) {
    const table = host[proto];
    if (!isRecord(table)) continue;

    const entries = Object.entries(table)
      .filter((entry): entry is [string, Record<string, unknown>] => isRecord(entry[1]))
      .sort(([a], [b]) => Number(a) - Number(b));

    for (const [port, info] of entries) {
      if (cleanString(info.state) !== 'open') continue;
      const service = cleanString(info.name) ?? 'unknown';
      const product = cleanString(info.product);
      const version = cleanString(info.version);

      let line = `${port}/${proto}/${service}`;
      if (product) line += version ? ` (${product} ${version})` : ` (${product})`;
      ports.push(line);
      if (service !== 'unknown' && !services.includes(service)) services.push(service);
    }
  }

  return { ports, services };
}

/** Null for hosts reported down or without an IPv4 address. */
export function normalizeScanHost(host: Record<string, unknown>, now: Date): RawDeviceRecord | null {
  const status = isRecord(host.status) ? cleanString(host.status.state) : null;
  if (status === 'down') return null;

  const addresses: Record<string, unknown> = isRecord(host.addresses) ? host.addresses : {};
  const ip = normalizeIp(addresses.ipv4);
  if (!ip) return null;

  const mac = formatMac(addresses.mac);
  const hostname = firstHostname(host.hostnames);
  const os = bestOsMatch(host.osmatch);
  const { ports, services } = describeOpenPorts(host);

  const scannedAt = cleanString(host.scanned_at);
  const scanned = scannedAt ? new Date(scannedAt) : null;

  return createRawDeviceRecord({
    source: 'scan',
    hints: { ip, mac, hostname },
    attributes: {
      [ATTR.name]: hostname,
      [ATTR.manufacturer]: mac ? firstVendor(host.vendor) : null,
      [ATTR.osPlatform]: os?.name ?? null,
      [ATTR.lastSeenIp]: ip,
      [ATTR.macAddresses]: mac ? [mac] : null,
      [ATTR.services]: services,
      open_ports: ports,
      os_accuracy: os?.accuracy ?? null,
    },
    observedAt: scanned && Number.isFinite(scanned.getTime()) ? scanned : now,
  });
}

/** Accepts a host array or `{ hosts: [...] }`. */
export function scanHostsToRecords(payload: unknown, opts: { now: Date }): RawDeviceRecord[] {
  const rows: unknown[] = Array.isArray(payload)
    ? payload
    : isRecord(payload) && Array.isArray(payload.hosts)
      ? payload.hosts
      : [];

  const out: RawDeviceRecord[] = [];
  for (const row of rows) {
    if (!isRecord(row)) continue;
    const record = normalizeScanHost(row, opts.now);
    if (record) out.push(record);
  }
  return out;
}
