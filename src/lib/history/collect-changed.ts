import type { CanonicalAssetRecord } from '@/lib/ingest/canonical';

export type FieldChange = { path: string; before: string; after: string };

export function stableStringify(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(',')}]`;
  if (typeof value === 'object') {
    const entries = Object.entries(value).sort(([a], [b]) => a.localeCompare(b));
    return `{${entries.map(([k, v]) => `${k}:${stableStringify(v)}`).join(',')}}`;
  }
  return String(value);
}

function summarizeValue(value: unknown): string {
  if (value === null || value === undefined) return '';

  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);

  // MAC list, services, etc.
  if (Array.isArray(value)) {
    const strings = value
      .filter((v) => typeof v === 'string')
      .map((v) => v.trim())
      .filter((v) => v.length > 0);
    if (strings.length > 0) return Array.from(new Set(strings)).sort().join(';');
    return stableStringify(value);
  }

  const raw = stableStringify(value);
  return raw.length > 200 ? `${raw.slice(0, 200)}…` : raw;
}

export function equalForCompare(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  return stableStringify(a) === stableStringify(b);
}

function recordPaths(record: CanonicalAssetRecord | null): Map<string, unknown> {
  const out = new Map<string, unknown>();
  if (!record) return out;
  out.set('device_type', record.device_type);
  out.set('category', record.category);
  out.set('category_source', record.category_source);
  out.set('location', record.location);
  out.set('placement', record.placement);
  out.set('identity_aliases', record.identity_aliases);
  for (const [key, entry] of Object.entries(record.fields)) out.set(`fields.${key}`, entry.value);
  return out;
}

/**
 * Value-level diff of two canonical records. Provenance and update stamps are ignored: a record whose values are all
 * unchanged yields an empty list.
 */
export function computeFieldChanges(args: {
  prev: CanonicalAssetRecord | null;
  next: CanonicalAssetRecord;
  maxFields?: number;
}): FieldChange[] {
  const maxFields = args.maxFields ?? Number.POSITIVE_INFINITY;
  const before = recordPaths(args.prev);
  const after = recordPaths(args.next);

  const paths = Array.from(new Set([...before.keys(), ...after.keys()]));
  const changes: FieldChange[] = [];
  for (const path of paths) {
    const prevValue = before.get(path);
    const nextValue = after.get(path);
    if (equalForCompare(prevValue, nextValue)) continue;
    changes.push({ path, before: summarizeValue(prevValue), after: summarizeValue(nextValue) });
    if (changes.length >= maxFields) break;
  }
  return changes;
}
