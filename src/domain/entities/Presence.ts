// ============================================================================
// RUTA: src/domain/entities/Presence.ts
// ============================================================================

import type { ActivityType, PresenceUpdateStatus } from 'discord-api-types/v10';

import type { Snowflake } from '@/domain/value-objects/Snowflake';

export interface Activity {
  readonly name: string;
  readonly type: ActivityType;
  readonly url: string | null;
  readonly createdAt: Date;
  readonly details: string | null;
  readonly state: string | null;
}

export interface ClientStatus {
  readonly desktop: PresenceUpdateStatus;
  readonly mobile: PresenceUpdateStatus;
  readonly web: PresenceUpdateStatus;
}

export interface MemberPresence {
  readonly userId: Snowflake;
  readonly guildId: Snowflake;
  readonly visibleStatus: PresenceUpdateStatus;
  readonly activities: readonly Activity[];
  readonly clientStatus: ClientStatus;
}
