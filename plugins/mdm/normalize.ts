import { formatMac, normalizeMacList } from '@/lib/identity/identifiers';
import { ATTR, createRawDeviceRecord } from '@/lib/ingest/raw-record';

import type { RawDeviceRecord } from '@/lib/ingest/raw-record';

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function cleanString(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function cleanCount(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value) && value > 0) return Math.trunc(value);
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    const n = Number(value.trim());
    return n > 0 ? n : null;
  }
  return null;
}

function cleanBool(value: unknown): boolean | null {
  return typeof value === 'boolean' ? value : null;
}

function parseIso(value: unknown): string | null {
  const raw = cleanString(value);
  if (!raw) return null;
  const d = new Date(raw);
  return Number.isFinite(d.getTime()) ? d.toISOString() : null;
}

/** Wi-Fi first, then wired; duplicates collapse. */
function deviceMacs(row: Record<string, unknown>): string[] {
  const macs: string[] = [];
  for (const mac of normalizeMacList([row.wiFiMacAddress, row.ethernetMacAddress].filter(isString))) {
    const formatted = formatMac(mac);
    if (formatted) macs.push(formatted);
  }
  return macs;
}

export function normalizeManagedDevice(row: Record<string, unknown>, now: Date): RawDeviceRecord {
  const macs = deviceMacs(row);
  const lastSync = parseIso(row.lastSyncDateTime);

  return createRawDeviceRecord({
    source: 'mdm',
    hints: {
      unique_device_id: cleanString(row.id),
      serial: cleanString(row.serialNumber),
      mac: macs.length > 0 ? macs.join(', ') : null,
      hostname: cleanString(row.deviceName),
    },
    attributes: {
      [ATTR.name]: cleanString(row.deviceName),
      [ATTR.serial]: cleanString(row.serialNumber),
      [ATTR.manufacturer]: cleanString(row.manufacturer),
      [ATTR.model]: cleanString(row.model),
      [ATTR.osPlatform]: cleanString(row.operatingSystem),
      [ATTR.osVersion]: cleanString(row.osVersion),
      [ATTR.macAddresses]: macs,
      mdm_device_id: cleanString(row.id),
      azure_ad_device_id: cleanString(row.azureADDeviceId),
      primary_user_upn: cleanString(row.userPrincipalName),
      primary_user_display_name: cleanString(row.userDisplayName),
      compliance_state: cleanString(row.complianceState),
      ownership: cleanString(row.managedDeviceOwnerType),
      imei: cleanString(row.imei),
      phone_number: cleanString(row.phoneNumber),
      encrypted: cleanBool(row.isEncrypted),
      supervised: cleanBool(row.isSupervised),
      total_storage_bytes: cleanCount(row.totalStorageSpaceInBytes),
      free_storage_bytes: cleanCount(row.freeStorageSpaceInBytes),
      physical_memory_bytes: cleanCount(row.physicalMemoryInBytes),
      mdm_enrolled_at: parseIso(row.enrolledDateTime),
      mdm_last_sync: lastSync,
    },
    observedAt: lastSync ?? now,
  });
}

/**
 * Maps a device list (or a single page object) into records.
 * With `since`, devices whose last check-in predates it are skipped; devices without a check-in time are kept.
 */
export function managedDevicesToRecords(
  payload: unknown,
  opts: { now: Date; since?: Date | null },
): RawDeviceRecord[] {
  const rows: unknown[] = Array.isArray(payload)
    ? payload
    : isRecord(payload) && Array.isArray(payload.value)
      ? payload.value
      : [];
  const since = opts.since ?? null;

  const records: RawDeviceRecord[] = [];
  for (const row of rows) {
    if (!isRecord(row)) continue;
    const lastSync = parseIso(row.lastSyncDateTime);
    if (since && lastSync && Date.parse(lastSync) < since.getTime()) continue;
    records.push(normalizeManagedDevice(row, opts.now));
  }
  return records;
}
