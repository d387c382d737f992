// ============================================================================
// RUTA: src/domain/entities/VoiceState.ts
// ============================================================================

import type { Member } from '@/domain/entities/Member';
import type { Snowflake } from '@/domain/value-objects/Snowflake';

export interface VoiceState {
  readonly guildId: Snowflake;
  /** `null` cuando el usuario acaba de salir del canal de voz. */
  readonly channelId: Snowflake | null;
  readonly userId: Snowflake;
  readonly member: Member;
  readonly sessionId: string;
  readonly isGuildDeafened: boolean;
  readonly isGuildMuted: boolean;
  readonly isSelfDeafened: boolean;
  readonly isSelfMuted: boolean;
  readonly isStreaming: boolean;
  readonly isSuppressed: boolean;
  readonly isVideoEnabled: boolean;
}
