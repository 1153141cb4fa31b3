import { z } from 'zod/v4';

import { DEVICE_TYPES } from '@/lib/categorize/device-type';
import { deepFreeze } from '@/lib/config/deep-freeze';
import { loadJsonConfig } from '@/lib/config/load-json';
import { ErrorCode } from '@/lib/errors/error-codes';

export const RULE_FIELDS = ['vendor', 'model', 'os', 'services', 'hostname'] as const;
export type RuleField = (typeof RULE_FIELDS)[number];

const ConditionSchema = z
  .object({
    field: z.enum(RULE_FIELDS),
    op: z.enum(['contains', 'equals', 'starts_with']),
    values: z.array(z.string().trim().toLowerCase().min(1)).min(1),
  })
  .strict();

const MatcherShape = {
  all: z.array(ConditionSchema).optional(),
  any: z.array(ConditionSchema).optional(),
};

function hasConditions(m: { all?: unknown[]; any?: unknown[] }) {
  return (m.all?.length ?? 0) + (m.any?.length ?? 0) > 0;
}

const RuleSchema = z
  .object({
    name: z.string().min(1).optional(),
    device_type: z.enum(DEVICE_TYPES),
    ...MatcherShape,
  })
  .strict()
  .refine(hasConditions, { message: 'a rule needs at least one condition' });

const RuleGroupSchema = z
  .object({
    group: z.string().min(1),
    when: z.object(MatcherShape).strict().refine(hasConditions, { message: 'empty group guard' }).optional(),
    rules: z.array(RuleSchema),
    default: z.enum(DEVICE_TYPES).optional(),
  })
  .strict();

const CloudProviderRuleSchema = z
  .object({
    name: z.string().min(1).optional(),
    provider: z.string().trim().min(1),
    ...MatcherShape,
  })
  .strict()
  .refine(hasConditions, { message: 'a rule needs at least one condition' });

const CloudProvidersSchema = z
  .object({
    rules: z.array(CloudProviderRuleSchema),
    default: z.string().trim().min(1).optional(),
  })
  .strict();

export const CategorizationRulesSchema = z.object({
  version: z.literal(1),
  categories: z.record(z.enum(DEVICE_TYPES), z.string().trim().min(1)),
  groups: z.array(RuleGroupSchema).min(1),
  /** Evaluated only for records that report both a vendor and a model. */
  cloud_providers: CloudProvidersSchema.optional(),
});

export type RuleCondition = z.output<typeof ConditionSchema>;
export type ClassificationRule = z.output<typeof RuleSchema>;
export type RuleGroup = z.output<typeof RuleGroupSchema>;
export type CloudProviderRules = z.output<typeof CloudProvidersSchema>;
export type CategorizationRules = z.output<typeof CategorizationRulesSchema>;

export function buildCategorizationRules(input: unknown): CategorizationRules {
  return deepFreeze(CategorizationRulesSchema.parse(input));
}

export function loadCategorizationRules(path: string): CategorizationRules {
  const parsed = loadJsonConfig({
    path,
    schema: CategorizationRulesSchema,
    code: ErrorCode.CONFIG_RULES_INVALID,
    label: 'categorization rules',
  });
  return deepFreeze(parsed);
}
