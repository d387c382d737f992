// ============================================================================
// RUTA: src/shared/config/constants.ts
// ============================================================================

export const CACHE_DEFAULTS = Object.freeze({
  messageCapacity: 1_000,
  dmChannelCapacity: 100,
});

// 2015-01-01T00:00:00.000Z
export const DISCORD_EPOCH_MS = 1_420_070_400_000n;

export const SNOWFLAKE_MAX = 0xffff_ffff_ffff_ffffn;
