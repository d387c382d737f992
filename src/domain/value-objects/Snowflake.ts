// ============================================================================
// RUTA: src/domain/value-objects/Snowflake.ts
// ============================================================================

import { DISCORD_EPOCH_MS, SNOWFLAKE_MAX } from '@/shared/config/constants';
import { InvalidSnowflakeError } from '@/shared/errors/domain.errors';

export type Snowflake = bigint;

const SNOWFLAKE_PATTERN = /^\d{1,20}$/u;

export const isSnowflake = (value: unknown): value is Snowflake =>
  typeof value === 'bigint' && value >= 0n && value <= SNOWFLAKE_MAX;

export const parseSnowflake = (value: string | bigint): Snowflake => {
  if (typeof value === 'bigint') {
    if (!isSnowflake(value)) {
      throw new InvalidSnowflakeError(value);
    }

    return value;
  }

  if (!SNOWFLAKE_PATTERN.test(value)) {
    throw new InvalidSnowflakeError(value);
  }

  const parsed = BigInt(value);
  if (parsed > SNOWFLAKE_MAX) {
    throw new InvalidSnowflakeError(value);
  }

  return parsed;
};

export const parseOptionalSnowflake = (value: string | null | undefined): Snowflake | null =>
  value === null || value === undefined ? null : parseSnowflake(value);

export const snowflakeCreatedAt = (id: Snowflake): Date => new Date(Number((id >> 22n) + DISCORD_EPOCH_MS));
