import { normalizeText } from '@/lib/identity/normalize-text';

import type { DeviceType } from '@/lib/categorize/device-type';
import type { FieldValue, SourceName } from '@/lib/ingest/raw-record';

export const CANONICAL_VERSION = 'canonical-asset-v1';

export type FieldEntry = {
  value: FieldValue;
  source: SourceName;
  updated_at: string;
  run_id: string;
};

export type CategorySource = 'static' | 'rules';

export type CanonicalAssetRecord = {
  version: typeof CANONICAL_VERSION;
  identity_key: string;
  identity_aliases: string[];
  display_name: string;
  device_type: DeviceType;
  category: string;
  category_source: CategorySource;
  fields: Record<string, FieldEntry>;
  location: string | null;
  placement: string | null;
  last_update_source: SourceName;
  last_update_at: string;
};

/** A canonical record as held by the inventory store, keyed by the store's own id. */
export type StoredAsset = {
  id: string;
  record: CanonicalAssetRecord;
};

/** Name, else model, else the fallback; the chosen text is display-normalized. */
export function deriveDisplayName(fields: Record<string, FieldEntry>, fallback: string): string {
  for (const key of ['name', 'model']) {
    const value = fields[key]?.value;
    const display = typeof value === 'string' ? normalizeText(value) : '';
    if (display.length > 0) return display;
  }
  return fallback;
}
