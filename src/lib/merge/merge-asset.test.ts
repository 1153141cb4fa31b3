import { describe, expect, it } from 'vitest';

import { createRawDeviceRecord } from '@/lib/ingest/raw-record';
import { DEFAULT_SOURCE_PRIORITY, mergeAsset } from '@/lib/merge/merge-asset';

import type { Classification } from '@/lib/categorize/classify';
import type { IdentityResolution } from '@/lib/identity/identity-key';
import type { CanonicalAssetRecord } from '@/lib/ingest/canonical';
import type { FieldValue, SourceName } from '@/lib/ingest/raw-record';
import type { MergeContext } from '@/lib/merge/merge-asset';

const T1 = '2026-01-01T00:00:00.000Z';
const T2 = '2026-01-02T00:00:00.000Z';

const laptop: Classification = {
  device_type: 'Laptop',
  category: 'Laptops',
  category_source: 'rules',
  matched_rule: 'computer/laptop-keyword',
};

const identity: IdentityResolution = {
  key: 'serial:PF3X',
  via: 'serial',
  confidence: 'high',
  aliases: ['serial:PF3X'],
  override: null,
};

function ctx(overrides: Partial<MergeContext> = {}): MergeContext {
  return { runId: 'run-2', sourcePriority: DEFAULT_SOURCE_PRIORITY, fieldDictionary: null, ...overrides };
}

function raw(attributes: Record<string, FieldValue | null>, source: SourceName = 'mdm', observedAt = T2) {
  return createRawDeviceRecord({ source, hints: { serial: 'PF3X' }, attributes, observedAt });
}

function stored(overrides: Partial<CanonicalAssetRecord> = {}): CanonicalAssetRecord {
  return {
    version: 'canonical-asset-v1',
    identity_key: 'serial:PF3X',
    identity_aliases: ['serial:PF3X'],
    display_name: 'LT-042',
    device_type: 'Laptop',
    category: 'Laptops',
    category_source: 'rules',
    fields: {
      name: { value: 'LT-042', source: 'mdm', updated_at: T1, run_id: 'run-1' },
      os_version: { value: '14.2', source: 'mdm', updated_at: T1, run_id: 'run-1' },
      mac_addresses: { value: ['AA:BB:CC:DD:EE:FF'], source: 'mdm', updated_at: T1, run_id: 'run-1' },
    },
    location: null,
    placement: null,
    last_update_source: 'mdm',
    last_update_at: T1,
    ...overrides,
  };
}

describe('mergeAsset', () => {
  it('creates a record with per-field provenance', () => {
    const result = mergeAsset(null, raw({ name: 'LT-042', os_version: '14.2', model: '' }), laptop, identity, ctx());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.changed).toBe(true);
    expect(result.record).toEqual({
      version: 'canonical-asset-v1',
      identity_key: 'serial:PF3X',
      identity_aliases: ['serial:PF3X'],
      display_name: 'LT-042',
      device_type: 'Laptop',
      category: 'Laptops',
      category_source: 'rules',
      fields: {
        name: { value: 'LT-042', source: 'mdm', updated_at: T2, run_id: 'run-2' },
        os_version: { value: '14.2', source: 'mdm', updated_at: T2, run_id: 'run-2' },
      },
      location: null,
      placement: null,
      last_update_source: 'mdm',
      last_update_at: T2,
    });
  });

  it('keeps a stored value when the incoming one is empty', () => {
    const existing = stored();
    const result = mergeAsset(existing, raw({ name: 'LT-042', os_version: '' }, 'scan'), laptop, identity, ctx());

    expect(result).toEqual({ ok: true, record: existing, changed: false, changes: [] });
    if (result.ok) expect(result.record.fields.os_version?.value).toBe('14.2');
  });

  it('overwrites value and provenance when the value differs', () => {
    const result = mergeAsset(stored(), raw({ os_version: '14.3' }, 'snmp'), laptop, identity, ctx());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.record.fields.os_version).toEqual({ value: '14.3', source: 'snmp', updated_at: T2, run_id: 'run-2' });
    expect(result.record.fields.name).toEqual({ value: 'LT-042', source: 'mdm', updated_at: T1, run_id: 'run-1' });
    expect(result.record.last_update_source).toBe('snmp');
    expect(result.record.last_update_at).toBe(T2);
    expect(result.changes).toEqual([{ path: 'fields.os_version', before: '14.2', after: '14.3' }]);
  });

  it('keeps provenance for an equal value and leaves absent fields untouched', () => {
    const existing = stored();
    const result = mergeAsset(existing, raw({ mac_addresses: ['AA:BB:CC:DD:EE:FF'] }, 'scan'), laptop, identity, ctx());

    expect(result.ok && result.changed).toBe(false);
    if (result.ok) expect(result.record.fields.mac_addresses?.source).toBe('mdm');
  });

  it('never lets a rules classification replace a static one', () => {
    const existing = stored({ device_type: 'Firewall', category: 'Firewalls', category_source: 'static' });
    const result = mergeAsset(existing, raw({ name: 'LT-042' }), laptop, identity, ctx());

    expect(result).toMatchObject({ ok: true, changed: false });
    if (result.ok) expect(result.record.category).toBe('Firewalls');
  });

  it('keeps a known category when the incoming record only reaches the fallback', () => {
    const fallback: Classification = {
      device_type: 'Other Device',
      category: 'Other Assets',
      category_source: 'rules',
      matched_rule: 'fallback',
    };
    const result = mergeAsset(stored(), raw({ last_seen_ip: '10.0.0.5' }, 'scan'), fallback, identity, ctx());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.record).toMatchObject({ device_type: 'Laptop', category: 'Laptops' });
    expect(result.changes.map((c) => c.path)).toEqual(['fields.last_seen_ip']);
  });

  it('lets a static classification replace a rules one', () => {
    const firewall: Classification = {
      device_type: 'Firewall',
      category: 'Firewalls',
      category_source: 'static',
      matched_rule: 'static-override',
    };
    const result = mergeAsset(stored(), raw({ name: 'LT-042' }, 'static'), firewall, identity, ctx());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.record).toMatchObject({ device_type: 'Firewall', category: 'Firewalls', category_source: 'static' });
    expect(result.changes.map((c) => c.path)).toEqual(['device_type', 'category', 'category_source']);
  });

  it('fails the record when a field changes shape', () => {
    const result = mergeAsset(stored(), raw({ mac_addresses: 'AA:BB:CC:DD:EE:01' }), laptop, identity, ctx());

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'MERGE_CONFLICT',
        category: 'merge',
        message: 'field "mac_addresses" changed shape',
        retryable: false,
        redacted_context: { identity_key: 'serial:PF3X', field: 'mac_addresses' },
        details: [{ field: 'fields.mac_addresses', issue: 'shape_mismatch', message: 'stored list, incoming scalar' }],
      },
    });
  });

  it('does not let a lower-priority source overwrite a field written earlier in the same run', () => {
    const existing = stored({
      fields: {
        name: { value: 'LT-042', source: 'mdm', updated_at: T1, run_id: 'run-1' },
        os_version: { value: '14.2', source: 'mdm', updated_at: T1, run_id: 'run-2' },
      },
    });

    const sameRun = mergeAsset(existing, raw({ os_version: '14' }, 'scan'), laptop, identity, ctx());
    expect(sameRun).toMatchObject({ ok: true, changed: false });

    const nextRun = mergeAsset(existing, raw({ os_version: '14' }, 'scan'), laptop, identity, ctx({ runId: 'run-3' }));
    expect(nextRun.ok && nextRun.record.fields.os_version?.value).toBe('14');

    const reversed = mergeAsset(
      existing,
      raw({ os_version: '14' }, 'scan'),
      laptop,
      identity,
      ctx({ sourcePriority: ['scan', 'mdm'] }),
    );
    expect(reversed.ok && reversed.record.fields.os_version?.source).toBe('scan');
  });

  it('tracks only dictionary fields when a dictionary is supplied', () => {
    const result = mergeAsset(
      null,
      raw({ name: 'LT-042', imei: '350000000000001' }),
      laptop,
      identity,
      ctx({ fieldDictionary: new Set(['name']) }),
    );

    expect(result.ok && Object.keys(result.record.fields)).toEqual(['name']);
  });

  it('adds new aliases and override location data', () => {
    const withAlias: IdentityResolution = {
      ...identity,
      aliases: ['serial:PF3X', 'mac:aabbccddeeff'],
      override: {
        ip: '10.0.0.5',
        device_type: 'Laptop',
        category: 'Laptops',
        name: 'LT-042',
        services: null,
        location: 'Head Office',
        placement: null,
      },
    };
    const result = mergeAsset(stored(), raw({ name: 'LT-042' }), laptop, withAlias, ctx());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.record.identity_aliases).toEqual(['serial:PF3X', 'mac:aabbccddeeff']);
    expect(result.record.location).toBe('Head Office');
    expect(result.changes).toEqual([
      { path: 'location', before: '', after: 'Head Office' },
      { path: 'identity_aliases', before: 'serial:PF3X', after: 'mac:aabbccddeeff;serial:PF3X' },
    ]);
  });

  it('keeps a real stored name when a scanner reports a placeholder one', () => {
    const result = mergeAsset(stored(), raw({ name: '_gateway', os_version: '14.3' }, 'scan'), laptop, identity, ctx());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.record.fields.name).toEqual({ value: 'LT-042', source: 'mdm', updated_at: T1, run_id: 'run-1' });
    expect(result.record.display_name).toBe('LT-042');
    expect(result.changes).toEqual([{ path: 'fields.os_version', before: '14.2', after: '14.3' }]);
  });

  it('replaces a placeholder stored name with a real one', () => {
    const existing = stored({
      display_name: 'Device-1A2B',
      fields: { name: { value: 'Device-1A2B', source: 'scan', updated_at: T1, run_id: 'run-1' } },
    });
    const result = mergeAsset(existing, raw({ name: 'LT-042' }), laptop, identity, ctx());

    expect(result.ok && result.record.display_name).toBe('LT-042');
  });

  describe('static override names', () => {
    const firewall: Classification = {
      device_type: 'Firewall',
      category: 'Firewalls',
      category_source: 'static',
      matched_rule: 'static-override',
    };
    const gateway: IdentityResolution = {
      key: 'static:192.168.1.1',
      via: 'static',
      confidence: 'high',
      aliases: ['static:192.168.1.1'],
      override: {
        ip: '192.168.1.1',
        device_type: 'Firewall',
        category: 'Firewalls',
        name: 'Meraki MX85 Gateway',
        services: null,
        location: 'Head Office',
        placement: null,
      },
    };

    it('names a new asset after the table whatever the source reports', () => {
      const incoming = raw({ name: 'edge-gw01', manufacturer: 'Generic' }, 'scan');
      const result = mergeAsset(null, incoming, firewall, gateway, ctx());

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.record.display_name).toBe('Meraki MX85 Gateway');
      expect(result.record.fields.name).toEqual({
        value: 'Meraki MX85 Gateway',
        source: 'static',
        updated_at: T2,
        run_id: 'run-2',
      });
      expect(result.record.fields.manufacturer?.value).toBe('Generic');
    });

    it('refuses a later rename from another source and reports nothing changed', () => {
      const existing = stored({
        identity_key: 'static:192.168.1.1',
        identity_aliases: ['static:192.168.1.1'],
        display_name: 'Meraki MX85 Gateway',
        device_type: 'Firewall',
        category: 'Firewalls',
        category_source: 'static',
        fields: { name: { value: 'Meraki MX85 Gateway', source: 'static', updated_at: T1, run_id: 'run-1' } },
        location: 'Head Office',
      });
      const result = mergeAsset(existing, raw({ name: 'edge-gw01' }, 'scan'), firewall, gateway, ctx());

      expect(result).toEqual({ ok: true, record: existing, changed: false, changes: [] });
    });

    it('restores the table name over a name another source stored earlier', () => {
      const existing = stored({
        identity_key: 'static:192.168.1.1',
        identity_aliases: ['static:192.168.1.1'],
        display_name: 'edge-gw01',
        fields: { name: { value: 'edge-gw01', source: 'scan', updated_at: T1, run_id: 'run-1' } },
      });
      const result = mergeAsset(existing, raw({ last_seen_ip: '192.168.1.1' }, 'scan'), firewall, gateway, ctx());

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.record.display_name).toBe('Meraki MX85 Gateway');
      expect(result.record.fields.name?.source).toBe('static');
      expect(result.changes.map((c) => c.path)).toContain('fields.name');
    });
  });
});

