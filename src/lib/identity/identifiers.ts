import { normalizeForMatch } from '@/lib/identity/normalize-text';

const PLACEHOLDER_BLACKLIST = new Set(
  [
    // Generic
    'n/a',
    'na',
    'unknown',
    'none',
    'null',
    '-',
    '--',
    '---',
    '0',

    // UUID placeholders (raw + compact)
    '00000000-0000-0000-0000-000000000000',
    '00000000000000000000000000000000',

    // Serial placeholders
    'to be filled',
    'to be filled by o.e.m.',
    'default string',
    'system serial number',
    'not specified',
    'not available',
    'xxxxxxxxxx',
    'xxxxxxxxxxxx',

    // MAC placeholders (raw + compact)
    '00:00:00:00:00:00',
    'ff:ff:ff:ff:ff:ff',
    '00-00-00-00-00-00',
    'ff-ff-ff-ff-ff-ff',
    '000000000000',
    'ffffffffffff',
  ].map((v) => v.trim().toLowerCase()),
);

// Names scanners invent when a host has no DNS record.
const GENERIC_HOSTNAME_PREFIXES = ['device-', 'unknown', '_gateway'];

const IPV4 = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

function placeholderKey(value: string) {
  return value.trim().toLowerCase();
}

function placeholderCompactKey(value: string) {
  return value
    .trim()
    .toLowerCase()
    .replace(/[-:\s]/g, '');
}

export function isPlaceholder(value: string) {
  if (PLACEHOLDER_BLACKLIST.has(placeholderKey(value))) return true;
  if (PLACEHOLDER_BLACKLIST.has(placeholderCompactKey(value))) return true;
  return false;
}

export function normalizeDeviceId(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  if (value.trim() === '' || isPlaceholder(value)) return null;
  return value.trim().toLowerCase();
}

export function normalizeSerial(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (trimmed === '' || isPlaceholder(trimmed)) return null;
  return trimmed.toUpperCase();
}

/** Compact lower-case hex form (`aabbccddeeff`), or null for anything that is not a usable 48-bit MAC. */
export function normalizeMac(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  if (value.trim() === '' || isPlaceholder(value)) return null;
  const compact = value.trim().toLowerCase().replace(/[-:.\s]/g, '');
  if (!/^[0-9a-f]{12}$/.test(compact) || isPlaceholder(compact)) return null;
  return compact;
}

/** Parses one or more MACs separated by newlines, whitespace, commas or semicolons. */
export function normalizeMacList(value: unknown): string[] {
  const tokens: string[] = [];
  if (typeof value === 'string') tokens.push(...value.split(/[\s,;]+/));
  else if (Array.isArray(value)) {
    for (const item of value) {
      if (typeof item === 'string') tokens.push(...item.split(/[\s,;]+/));
    }
  }

  const out: string[] = [];
  for (const token of tokens) {
    const mac = normalizeMac(token);
    if (mac && !out.includes(mac)) out.push(mac);
  }
  return out;
}

/** `AA:BB:CC:DD:EE:FF` display form. */
export function formatMac(value: unknown): string | null {
  const mac = normalizeMac(value);
  if (!mac) return null;
  return (mac.match(/.{2}/g) ?? []).join(':').toUpperCase();
}

export function isIpv4(value: string): boolean {
  const m = IPV4.exec(value.trim());
  if (!m) return false;
  return m.slice(1).every((octet) => Number(octet) <= 255);
}

export function normalizeIp(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (trimmed === '' || isPlaceholder(trimmed)) return null;
  if (trimmed === '0.0.0.0') return null;
  return trimmed.toLowerCase();
}

export function isGenericHostname(value: string): boolean {
  const lower = value.trim().toLowerCase();
  return lower.length < 2 || GENERIC_HOSTNAME_PREFIXES.some((prefix) => lower.startsWith(prefix));
}

/** Scanner placeholder names, plus anything shorter than three characters. */
export function isGenericName(value: string): boolean {
  return value.trim().length < 3 || isGenericHostname(value);
}

/** Short, case-folded host label; IP literals and scanner-generated names are not hostnames. */
export function normalizeHostname(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (trimmed === '' || isPlaceholder(trimmed) || isIpv4(trimmed) || isGenericHostname(trimmed)) return null;
  const shortName = normalizeForMatch(trimmed.split('.')[0]);
  return shortName.length >= 2 ? shortName : null;
}
