// ============================================================================
// RUTA: src/domain/entities/Role.ts
// ============================================================================

import type { Snowflake } from '@/domain/value-objects/Snowflake';

export interface Role {
  readonly id: Snowflake;
  readonly guildId: Snowflake;
  readonly name: string;
  readonly color: number;
  readonly isHoisted: boolean;
  readonly position: number;
  readonly permissions: bigint;
  readonly isManaged: boolean;
  readonly isMentionable: boolean;
}
