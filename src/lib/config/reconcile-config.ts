import { fileURLToPath } from 'node:url';

import { loadCategorizationRules } from '@/lib/categorize/rules';
import { configError } from '@/lib/config/load-json';
import { serverEnv } from '@/lib/env/server';
import { ErrorCode } from '@/lib/errors/error-codes';
import { isSourceName, SOURCE_NAMES } from '@/lib/ingest/raw-record';
import { loadStaticOverrides } from '@/lib/static-overrides/static-overrides';

import type { CategorizationRules } from '@/lib/categorize/rules';
import type { SourceName } from '@/lib/ingest/raw-record';
import type { StaticOverrideTable } from '@/lib/static-overrides/static-overrides';

export const DEFAULT_RULES_PATH = fileURLToPath(new URL('../../../config/categorization-rules.json', import.meta.url));
export const DEFAULT_STATIC_OVERRIDES_PATH = fileURLToPath(
  new URL('../../../config/static-overrides.json', import.meta.url),
);

/** Everything the engine needs, resolved once and passed explicitly. */
export type ReconcileConfig = Readonly<{
  rules: CategorizationRules;
  overrides: StaticOverrideTable;
  /** Highest priority first. */
  sourcePriority: readonly SourceName[];
  fieldDictionary: ReadonlySet<string> | null;
  writeConcurrency: number;
  writeTimeoutMs: number;
  cacheTtlMs: number;
}>;

/**
 * Parses a comma-separated ranking such as `static,mdm,snmp,scan`. Sources left out rank below the listed ones in
 * their default order.
 */
export function parseSourcePriority(raw: string): SourceName[] {
  const ranked: SourceName[] = [];
  for (const token of raw.split(',')) {
    const name = token.trim().toLowerCase();
    if (!name) continue;
    if (!isSourceName(name)) {
      throw configError(ErrorCode.CONFIG_INVALID, `unknown source in priority list: ${name}`, { value: raw });
    }
    if (!ranked.includes(name)) ranked.push(name);
  }
  for (const name of SOURCE_NAMES) if (!ranked.includes(name)) ranked.push(name);
  return ranked;
}

export function loadReconcileConfig(
  options: {
    rulesPath?: string;
    overridesPath?: string;
    fieldDictionary?: Iterable<string>;
  } = {},
): ReconcileConfig {
  const rulesPath = options.rulesPath ?? serverEnv.DEVICE_RECONCILE_RULES_PATH ?? DEFAULT_RULES_PATH;
  const overridesPath =
    options.overridesPath ?? serverEnv.DEVICE_RECONCILE_STATIC_OVERRIDES_PATH ?? DEFAULT_STATIC_OVERRIDES_PATH;

  const dictionary = options.fieldDictionary ? new Set(options.fieldDictionary) : null;

  return Object.freeze({
    rules: loadCategorizationRules(rulesPath),
    overrides: loadStaticOverrides(overridesPath),
    sourcePriority: Object.freeze(parseSourcePriority(serverEnv.DEVICE_RECONCILE_SOURCE_PRIORITY)),
    fieldDictionary: dictionary && dictionary.size > 0 ? dictionary : null,
    writeConcurrency: serverEnv.DEVICE_RECONCILE_WRITE_CONCURRENCY,
    writeTimeoutMs: serverEnv.DEVICE_RECONCILE_WRITE_TIMEOUT_MS,
    cacheTtlMs: serverEnv.DEVICE_RECONCILE_STORE_CACHE_TTL_MS,
  });
}
