// ============================================================================
// RUTA: src/shared/config/env.ts
// ============================================================================

import { z } from 'zod';

import { CACHE_DEFAULTS } from '@/shared/config/constants';

const emptyToUndefined = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => {
    if (value === undefined || value === null) {
      return undefined;
    }

    if (typeof value === 'string' && value.trim().length === 0) {
      return undefined;
    }

    return value;
  }, schema.optional());

const positiveCapacity = (fallback: number) =>
  emptyToUndefined(z.coerce.number().int().min(1, 'La capacidad debe ser al menos 1')).transform(
    (value) => value ?? fallback,
  );

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CACHE_MESSAGE_CAPACITY: positiveCapacity(CACHE_DEFAULTS.messageCapacity),
  CACHE_DM_CHANNEL_CAPACITY: positiveCapacity(CACHE_DEFAULTS.dmChannelCapacity),
});

export type Env = z.infer<typeof EnvSchema>;

export const env: Env = EnvSchema.parse(process.env);
