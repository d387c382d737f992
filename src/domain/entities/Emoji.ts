// ============================================================================
// RUTA: src/domain/entities/Emoji.ts
// ============================================================================

import type { User } from '@/domain/entities/User';
import type { Snowflake } from '@/domain/value-objects/Snowflake';

export interface KnownCustomEmoji {
  readonly id: Snowflake;
  readonly guildId: Snowflake;
  readonly name: string | null;
  readonly isAnimated: boolean;
  readonly roleIds: readonly Snowflake[];
  /** Creador del emoji; solo llega con el permiso de gestionar emojis. */
  readonly user: User | null;
  readonly isColonsRequired: boolean;
  readonly isManaged: boolean;
  readonly isAvailable: boolean;
}
