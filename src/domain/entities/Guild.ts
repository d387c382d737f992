// ============================================================================
// RUTA: src/domain/entities/Guild.ts
// ============================================================================

import type { GuildMFALevel, GuildPremiumTier, GuildVerificationLevel } from 'discord-api-types/v10';

import type { Snowflake } from '@/domain/value-objects/Snowflake';

export interface Guild {
  readonly id: Snowflake;
  readonly name: string;
  readonly iconHash: string | null;
  readonly splashHash: string | null;
  readonly bannerHash: string | null;
  readonly description: string | null;
  readonly ownerId: Snowflake;
  readonly afkChannelId: Snowflake | null;
  /** Segundos. */
  readonly afkTimeout: number;
  readonly features: readonly string[];
  readonly verificationLevel: GuildVerificationLevel;
  readonly mfaLevel: GuildMFALevel;
  readonly premiumTier: GuildPremiumTier;
  readonly premiumSubscriptionCount: number | null;
  readonly preferredLocale: string;
  readonly systemChannelId: Snowflake | null;
  readonly rulesChannelId: Snowflake | null;
  readonly publicUpdatesChannelId: Snowflake | null;
  readonly vanityUrlCode: string | null;
  readonly applicationId: Snowflake | null;
  readonly joinedAt: Date | null;
  readonly isLarge: boolean | null;
  readonly memberCount: number | null;
}
