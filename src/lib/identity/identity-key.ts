import { createHash } from 'node:crypto';

import { stableStringify } from '@/lib/history/collect-changed';
import {
  normalizeDeviceId,
  normalizeHostname,
  normalizeIp,
  normalizeMacList,
  normalizeSerial,
} from '@/lib/identity/identifiers';
import { logEvent } from '@/lib/logging/logger';
import { lookupStaticOverride } from '@/lib/static-overrides/static-overrides';

import type { RawDeviceRecord } from '@/lib/ingest/raw-record';
import type { StaticOverride, StaticOverrideTable } from '@/lib/static-overrides/static-overrides';

export type IdentityVia = 'static' | 'mdm' | 'serial' | 'mac' | 'ip' | 'hostname' | 'fingerprint';

export type IdentityResolution = {
  key: string;
  via: IdentityVia;
  confidence: 'high' | 'low';
  /** Strong keys (static, mdm, serial, every MAC) this record can be matched by, primary key first. */
  aliases: string[];
  override: Readonly<StaticOverride> | null;
};

const FINGERPRINT_LENGTH = 16;

export function identityKey(via: IdentityVia, value: string, source?: string): string {
  if (via === 'hostname' || via === 'fingerprint') return `${via}:${source ?? 'unknown'}:${value}`;
  return `${via}:${value}`;
}

function fingerprintOf(record: RawDeviceRecord): string {
  const digest = createHash('sha256').update(stableStringify(record.attributes)).digest('hex');
  return digest.slice(0, FINGERPRINT_LENGTH);
}

/**
 * Picks the canonical identity key by precedence: static override IP, management device id, serial, primary MAC,
 * last-seen IP, source-scoped hostname. Records with none of these get a fingerprint key and a low-confidence log line.
 */
export function resolveIdentity(record: RawDeviceRecord, overrides: StaticOverrideTable): IdentityResolution {
  const ip = normalizeIp(record.hints.ip);
  const override = lookupStaticOverride(overrides, ip);
  const deviceId = normalizeDeviceId(record.hints.unique_device_id);
  const serial = normalizeSerial(record.hints.serial);
  const macs = normalizeMacList(record.hints.mac);
  const hostname = normalizeHostname(record.hints.hostname);

  const strong: Array<{ via: IdentityVia; key: string }> = [];
  if (override && ip) strong.push({ via: 'static', key: identityKey('static', ip) });
  if (deviceId) strong.push({ via: 'mdm', key: identityKey('mdm', deviceId) });
  if (serial) strong.push({ via: 'serial', key: identityKey('serial', serial) });
  for (const mac of macs) strong.push({ via: 'mac', key: identityKey('mac', mac) });

  const aliases = strong.map((c) => c.key);
  const primary = strong[0];
  if (primary) return { key: primary.key, via: primary.via, confidence: 'high', aliases, override };

  if (ip) {
    const key = identityKey('ip', ip);
    return { key, via: 'ip', confidence: 'high', aliases: [key], override };
  }

  if (hostname) {
    const key = identityKey('hostname', hostname, record.source);
    return { key, via: 'hostname', confidence: 'low', aliases: [key], override };
  }

  const key = identityKey('fingerprint', fingerprintOf(record), record.source);
  logEvent({
    event_type: 'identity.low_confidence',
    level: 'info',
    service: 'engine',
    source: record.source,
    identity_key: key,
    message: 'no usable identity hint; using attribute fingerprint',
  });
  return { key, via: 'fingerprint', confidence: 'low', aliases: [key], override };
}
