// ============================================================================
// RUTA: src/domain/entities/Member.ts
// ============================================================================

import type { User } from '@/domain/entities/User';
import type { Snowflake } from '@/domain/value-objects/Snowflake';

export interface Member {
  readonly guildId: Snowflake;
  readonly user: User;
  readonly nickname: string | null;
  readonly roleIds: readonly Snowflake[];
  readonly joinedAt: Date;
  readonly premiumSince: Date | null;
  readonly isDeaf: boolean;
  readonly isMute: boolean;
}
