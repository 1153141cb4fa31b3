import { normalizeText } from '@/lib/identity/normalize-text';

export const SOURCE_NAMES = ['static', 'mdm', 'snmp', 'scan'] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

export function isSourceName(value: unknown): value is SourceName {
  return typeof value === 'string' && (SOURCE_NAMES as readonly string[]).includes(value);
}

export type FieldValue = string | number | boolean | string[];

export type IdentityHints = {
  ip?: string | null;
  mac?: string | null;
  serial?: string | null;
  unique_device_id?: string | null;
  hostname?: string | null;
};

export type RawDeviceRecord = {
  readonly source: SourceName;
  readonly hints: Readonly<IdentityHints>;
  readonly attributes: Readonly<Record<string, FieldValue | null>>;
  readonly observed_at: string;
};

/** Attribute keys every source adapter maps into; the engine reads nothing else. */
export const ATTR = {
  name: 'name',
  manufacturer: 'manufacturer',
  model: 'model',
  osPlatform: 'os_platform',
  osVersion: 'os_version',
  services: 'services',
  lastSeenIp: 'last_seen_ip',
  macAddresses: 'mac_addresses',
  serial: 'serial',
  cloudProvider: 'cloud_provider',
} as const;

export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.trim().length === 0;
  if (typeof value === 'number') return !Number.isFinite(value);
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

function cleanHint(value: string | null | undefined): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

const DISPLAY_ATTRS: ReadonlySet<string> = new Set([ATTR.name, ATTR.manufacturer, ATTR.model]);

function cleanAttribute(value: FieldValue | null | undefined): FieldValue | null {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string') return value.trim().length > 0 ? value.trim() : null;
  if (Array.isArray(value)) {
    const items = value.map((v) => v.trim()).filter((v) => v.length > 0);
    return items.length > 0 ? Array.from(new Set(items)) : null;
  }
  if (typeof value === 'number' && !Number.isFinite(value)) return null;
  return value;
}

/**
 * Builds an immutable record. Empty hints and attributes are dropped; name, manufacturer and model go through
 * `normalizeText`.
 */
export function createRawDeviceRecord(input: {
  source: SourceName;
  hints: IdentityHints;
  attributes: Record<string, FieldValue | null | undefined>;
  observedAt: string | Date;
}): RawDeviceRecord {
  const hints: IdentityHints = {};
  for (const key of ['ip', 'mac', 'serial', 'unique_device_id', 'hostname'] as const) {
    const cleaned = cleanHint(input.hints[key]);
    if (cleaned) hints[key] = cleaned;
  }

  const attributes: Record<string, FieldValue | null> = {};
  for (const [key, value] of Object.entries(input.attributes)) {
    const cleaned = cleanAttribute(value);
    if (cleaned === null) continue;
    if (DISPLAY_ATTRS.has(key) && typeof cleaned === 'string') {
      const display = normalizeText(cleaned);
      if (display.length > 0) attributes[key] = display;
      continue;
    }
    attributes[key] = cleaned;
  }

  const observedAt = input.observedAt instanceof Date ? input.observedAt.toISOString() : input.observedAt;

  return Object.freeze({
    source: input.source,
    hints: Object.freeze(hints),
    attributes: Object.freeze(attributes),
    observed_at: observedAt,
  });
}
