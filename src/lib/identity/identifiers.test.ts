import { describe, expect, it } from 'vitest';

import {
  formatMac,
  isGenericName,
  isPlaceholder,
  normalizeHostname,
  normalizeIp,
  normalizeMac,
  normalizeMacList,
  normalizeSerial,
} from '@/lib/identity/identifiers';

describe('identifiers', () => {
  it('treats OEM filler serials as placeholders (trim/case-insensitive)', () => {
    expect(isPlaceholder(' To be filled by O.E.M. ')).toBe(true);
    expect(normalizeSerial('To Be Filled')).toBeNull();
    expect(normalizeSerial('  abC123  ')).toBe('ABC123');
  });

  it('normalizes MACs to compact hex and rejects placeholders/garbage', () => {
    expect(normalizeMac('AA:BB:CC:DD:EE:FF')).toBe('aabbccddeeff');
    expect(normalizeMac('aa-bb-cc-dd-ee-ff')).toBe('aabbccddeeff');
    expect(normalizeMac('aabb.ccdd.eeff')).toBe('aabbccddeeff');
    expect(normalizeMac('00:00:00:00:00:00')).toBeNull();
    expect(normalizeMac('not-a-mac')).toBeNull();
    expect(formatMac('aabbccddeeff')).toBe('AA:BB:CC:DD:EE:FF');
  });

  it('parses MAC lists separated by newlines, commas and semicolons (deduplicated)', () => {
    expect(normalizeMacList('AA:BB:CC:DD:EE:FF\n11-22-33-44-55-66; aa:bb:cc:dd:ee:ff')).toEqual([
      'aabbccddeeff',
      '112233445566',
    ]);
    expect(normalizeMacList(['11:22:33:44:55:66', 'ff:ff:ff:ff:ff:ff'])).toEqual(['112233445566']);
  });

  it('reduces hostnames to the short case-folded label', () => {
    expect(normalizeHostname('FILESRV01.corp.example')).toBe('filesrv01');
    expect(normalizeHostname('Device-10.0.0.5')).toBeNull();
    expect(normalizeHostname('10.0.0.5')).toBeNull();
    expect(normalizeHostname('_gateway')).toBeNull();
  });

  it('drops unusable IPs', () => {
    expect(normalizeIp(' 10.0.0.1 ')).toBe('10.0.0.1');
    expect(normalizeIp('0.0.0.0')).toBeNull();
    expect(normalizeIp('n/a')).toBeNull();
  });

  it('flags scanner placeholder names', () => {
    expect(isGenericName('_gateway')).toBe(true);
    expect(isGenericName('Device-1A2B')).toBe(true);
    expect(isGenericName('unknown-host')).toBe(true);
    expect(isGenericName(' ab ')).toBe(true);
    expect(isGenericName('LT-042')).toBe(false);
    expect(isGenericName('gw1')).toBe(false);
  });
});
