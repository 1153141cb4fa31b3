import { z } from 'zod/v4';

import { createEnv } from '@t3-oss/env-core';

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform((v) => v === 'true' || v === '1')
  .default(false);

export const serverEnv = createEnv({
  server: {
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

    DEVICE_RECONCILE_WRITE_CONCURRENCY: z.coerce.number().int().positive().default(4),
    DEVICE_RECONCILE_WRITE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    DEVICE_RECONCILE_SOURCE_PRIORITY: z.string().min(1).default('static,mdm,snmp,scan'),
    DEVICE_RECONCILE_STORE_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(60_000),

    DEVICE_RECONCILE_RULES_PATH: z.string().min(1).optional(),
    DEVICE_RECONCILE_STATIC_OVERRIDES_PATH: z.string().min(1).optional(),

    DEVICE_RECONCILE_DEBUG: booleanFlag,
    DEVICE_RECONCILE_LOG_LEVEL: z.enum(['debug', 'info', 'error']).default('info'),
  },
  runtimeEnv: process.env,
  skipValidation: !!process.env.SKIP_ENV_VALIDATION,
  emptyStringAsUndefined: true,
});
