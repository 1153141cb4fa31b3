import { loadCategorizationRules } from '@/lib/categorize/rules';
import { DEFAULT_RULES_PATH } from '@/lib/config/reconcile-config';
import { createRawDeviceRecord } from '@/lib/ingest/raw-record';
import { DEFAULT_SOURCE_PRIORITY } from '@/lib/merge/merge-asset';
import { buildStaticOverrideTable } from '@/lib/static-overrides/static-overrides';

import type { ReconcileConfig } from '@/lib/config/reconcile-config';
import type { CanonicalAssetRecord } from '@/lib/ingest/canonical';

export function canonicalFixture(overrides: Partial<CanonicalAssetRecord> = {}): CanonicalAssetRecord {
  return {
    version: 'canonical-asset-v1',
    identity_key: 'serial:PF3X',
    identity_aliases: ['serial:PF3X', 'mac:aabbccddeeff'],
    display_name: 'LT-042',
    device_type: 'Laptop',
    category: 'Laptops',
    category_source: 'rules',
    fields: {
      name: { value: 'LT-042', source: 'mdm', updated_at: '2026-01-01T00:00:00.000Z', run_id: 'run-1' },
    },
    location: null,
    placement: null,
    last_update_source: 'mdm',
    last_update_at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function testConfig(overrides: Partial<ReconcileConfig> = {}): ReconcileConfig {
  return {
    rules: loadCategorizationRules(DEFAULT_RULES_PATH),
    overrides: buildStaticOverrideTable({
      version: 1,
      overrides: {
        '192.168.1.1': {
          device_type: 'Firewall',
          category: 'Firewalls',
          name: 'Meraki MX85 Gateway',
          location: 'Head Office',
          placement: 'Server Room',
        },
      },
    }),
    sourcePriority: DEFAULT_SOURCE_PRIORITY,
    fieldDictionary: null,
    writeConcurrency: 4,
    writeTimeoutMs: 1_000,
    cacheTtlMs: 0,
    ...overrides,
  };
}

export function mdmLaptop(observedAt = '2026-01-01T00:00:00.000Z') {
  return createRawDeviceRecord({
    source: 'mdm',
    hints: { unique_device_id: 'dev-1', serial: 'PF3X', mac: 'AA:BB:CC:DD:EE:01' },
    attributes: {
      name: 'LT-042',
      manufacturer: 'Lenovo',
      model: 'ThinkPad T14',
      os_platform: 'Windows',
      os_version: '10.0.22631',
    },
    observedAt,
  });
}

export function mdmPhone(observedAt = '2026-01-01T00:00:00.000Z') {
  return createRawDeviceRecord({
    source: 'mdm',
    hints: { unique_device_id: 'dev-2' },
    attributes: { name: 'PH-007', manufacturer: 'Apple', model: 'iPhone 15', os_platform: 'iOS' },
    observedAt,
  });
}
