import { z } from 'zod/v4';

import { DEVICE_TYPES } from '@/lib/categorize/device-type';
import { deepFreeze } from '@/lib/config/deep-freeze';
import { loadJsonConfig } from '@/lib/config/load-json';
import { ErrorCode } from '@/lib/errors/error-codes';
import { isIpv4 } from '@/lib/identity/identifiers';
import { ATTR, createRawDeviceRecord } from '@/lib/ingest/raw-record';

import type { DeviceType } from '@/lib/categorize/device-type';
import type { RawDeviceRecord } from '@/lib/ingest/raw-record';

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v && v.length > 0 ? v : null));

const StaticOverrideEntrySchema = z
  .object({
    device_type: z.enum(DEVICE_TYPES),
    category: z.string().trim().min(1),
    name: z.string().trim().min(1),
    services: optionalText,
    location: optionalText,
    placement: optionalText,
  })
  .strict();

export const StaticOverrideFileSchema = z.object({
  version: z.literal(1),
  overrides: z.record(
    z.string().refine((ip) => isIpv4(ip), { message: 'override keys must be IPv4 addresses' }),
    StaticOverrideEntrySchema,
  ),
});

export type StaticOverride = {
  ip: string;
  device_type: DeviceType;
  category: string;
  name: string;
  services: string | null;
  location: string | null;
  placement: string | null;
};

export type StaticOverrideTable = ReadonlyMap<string, Readonly<StaticOverride>>;

export function buildStaticOverrideTable(input: z.input<typeof StaticOverrideFileSchema>): StaticOverrideTable {
  const parsed = StaticOverrideFileSchema.parse(input);
  return toTable(parsed);
}

function toTable(parsed: z.output<typeof StaticOverrideFileSchema>): StaticOverrideTable {
  const table = new Map<string, Readonly<StaticOverride>>();
  for (const [ip, entry] of Object.entries(parsed.overrides)) {
    table.set(
      ip.trim(),
      deepFreeze({
        ip: ip.trim(),
        device_type: entry.device_type,
        category: entry.category,
        name: entry.name,
        services: entry.services ?? null,
        location: entry.location ?? null,
        placement: entry.placement ?? null,
      }),
    );
  }
  return table;
}

export function loadStaticOverrides(path: string): StaticOverrideTable {
  const parsed = loadJsonConfig({
    path,
    schema: StaticOverrideFileSchema,
    code: ErrorCode.CONFIG_STATIC_OVERRIDES_INVALID,
    label: 'static overrides',
  });
  return toTable(parsed);
}

export function lookupStaticOverride(
  table: StaticOverrideTable,
  ip: string | null | undefined,
): Readonly<StaticOverride> | null {
  if (!ip) return null;
  return table.get(ip.trim()) ?? null;
}

/** Every entry as a `static` source record, so curated devices exist even if no scanner has seen them. */
export function staticOverrideRecords(table: StaticOverrideTable, observedAt: string | Date): RawDeviceRecord[] {
  return Array.from(table.values()).map((entry) =>
    createRawDeviceRecord({
      source: 'static',
      hints: { ip: entry.ip },
      attributes: {
        [ATTR.name]: entry.name,
        [ATTR.lastSeenIp]: entry.ip,
        static_services: entry.services,
      },
      observedAt,
    }),
  );
}
