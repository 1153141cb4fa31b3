import { FALLBACK_DEVICE_TYPE } from '@/lib/categorize/device-type';
import { normalizeForMatch } from '@/lib/identity/normalize-text';
import { ATTR } from '@/lib/ingest/raw-record';
import { logEvent } from '@/lib/logging/logger';

import type { DeviceType } from '@/lib/categorize/device-type';
import type { CategorizationRules, RuleCondition, RuleField } from '@/lib/categorize/rules';
import type { IdentityResolution } from '@/lib/identity/identity-key';
import type { CategorySource } from '@/lib/ingest/canonical';
import type { FieldValue, RawDeviceRecord } from '@/lib/ingest/raw-record';

export type Classification = {
  device_type: DeviceType;
  category: string;
  category_source: CategorySource;
  matched_rule: string;
};

export const FALLBACK_RULE = 'fallback';

type MatchInput = Record<RuleField, string>;

function textOf(value: FieldValue | null | undefined): string {
  if (value === null || value === undefined) return '';
  if (Array.isArray(value)) return normalizeForMatch(value.join(' '));
  return normalizeForMatch(String(value));
}

function matchInputOf(record: RawDeviceRecord): MatchInput {
  const attrs = record.attributes;
  return {
    vendor: textOf(attrs[ATTR.manufacturer]),
    model: textOf(attrs[ATTR.model]),
    os: textOf(attrs[ATTR.osPlatform]),
    services: textOf(attrs[ATTR.services]),
    hostname: textOf(attrs[ATTR.name] ?? record.hints.hostname),
  };
}

function conditionHolds(input: MatchInput, condition: RuleCondition): boolean {
  const text = input[condition.field];
  if (text.length === 0) return false;
  switch (condition.op) {
    case 'contains':
      return condition.values.some((v) => text.includes(v));
    case 'equals':
      return condition.values.some((v) => text === v);
    case 'starts_with':
      return condition.values.some((v) => text.startsWith(v));
  }
}

function matches(input: MatchInput, matcher: { all?: RuleCondition[]; any?: RuleCondition[] }): boolean {
  const all = matcher.all ?? [];
  const any = matcher.any ?? [];
  if (!all.every((c) => conditionHolds(input, c))) return false;
  return any.length === 0 || any.some((c) => conditionHolds(input, c));
}

/**
 * Walks the rule groups in order; the first matching rule (or a guarded group's default) wins. A static override
 * short-circuits evaluation entirely.
 */
export function classify(
  record: RawDeviceRecord,
  identity: Pick<IdentityResolution, 'key' | 'override'>,
  rules: CategorizationRules,
): Classification {
  if (identity.override) {
    return {
      device_type: identity.override.device_type,
      category: identity.override.category,
      category_source: 'static',
      matched_rule: 'static-override',
    };
  }

  const input = matchInputOf(record);
  const result = (deviceType: DeviceType, matchedRule: string): Classification => ({
    device_type: deviceType,
    category: rules.categories[deviceType],
    category_source: 'rules',
    matched_rule: matchedRule,
  });

  for (const group of rules.groups) {
    if (group.when && !matches(input, group.when)) continue;

    for (const rule of group.rules) {
      if (matches(input, rule)) return result(rule.device_type, `${group.group}/${rule.name ?? rule.device_type}`);
    }

    if (group.default) return result(group.default, `${group.group}/default`);
  }

  logEvent({
    event_type: 'classify.fallback',
    level: 'debug',
    service: 'engine',
    source: record.source,
    identity_key: identity.key,
    vendor: input.vendor,
    model: input.model,
    os: input.os,
  });
  return result(FALLBACK_DEVICE_TYPE, FALLBACK_RULE);
}

export function deriveCloudProvider(record: RawDeviceRecord, rules: CategorizationRules): string | null {
  const table = rules.cloud_providers;
  if (!table) return null;

  const input = matchInputOf(record);
  if (input.vendor.length === 0 || input.model.length === 0) return null;

  const hit = table.rules.find((rule) => matches(input, rule));
  return hit?.provider ?? table.default ?? null;
}

/** Adds the derived `cloud_provider` attribute unless the source already reported one. */
export function withCloudProvider(record: RawDeviceRecord, rules: CategorizationRules): RawDeviceRecord {
  if (record.attributes[ATTR.cloudProvider] !== undefined) return record;
  const provider = deriveCloudProvider(record, rules);
  if (!provider) return record;
  return Object.freeze({
    ...record,
    attributes: Object.freeze({ ...record.attributes, [ATTR.cloudProvider]: provider }),
  });
}
