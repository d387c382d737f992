// ============================================================================
// RUTA: src/infrastructure/cache/records/VoiceStateRecord.ts
// ============================================================================

import type { User } from '@/domain/entities/User';
import type { VoiceState } from '@/domain/entities/VoiceState';
import type { Snowflake } from '@/domain/value-objects/Snowflake';
import { buildMember, type MemberRecord, toMemberRecord } from '@/infrastructure/cache/records/MemberRecord';

export interface VoiceStateRecord {
  readonly channelId: Snowflake | null;
  readonly guildId: Snowflake;
  readonly isGuildDeafened: boolean;
  readonly isGuildMuted: boolean;
  readonly isSelfDeafened: boolean;
  readonly isSelfMuted: boolean;
  readonly isStreaming: boolean;
  readonly isSuppressed: boolean;
  readonly isVideoEnabled: boolean;
  readonly userId: Snowflake;
  readonly sessionId: string;
  readonly member: MemberRecord;
}

export const toVoiceStateRecord = (voiceState: VoiceState): VoiceStateRecord =>
  Object.freeze({
    channelId: voiceState.channelId,
    guildId: voiceState.guildId,
    isGuildDeafened: voiceState.isGuildDeafened,
    isGuildMuted: voiceState.isGuildMuted,
    isSelfDeafened: voiceState.isSelfDeafened,
    isSelfMuted: voiceState.isSelfMuted,
    isStreaming: voiceState.isStreaming,
    isSuppressed: voiceState.isSuppressed,
    isVideoEnabled: voiceState.isVideoEnabled,
    userId: voiceState.userId,
    sessionId: voiceState.sessionId,
    member: toMemberRecord(voiceState.member),
  });

export const buildVoiceState = (record: VoiceStateRecord, user: User): VoiceState => ({
  guildId: record.guildId,
  channelId: record.channelId,
  userId: record.userId,
  member: buildMember(record.member, user),
  sessionId: record.sessionId,
  isGuildDeafened: record.isGuildDeafened,
  isGuildMuted: record.isGuildMuted,
  isSelfDeafened: record.isSelfDeafened,
  isSelfMuted: record.isSelfMuted,
  isStreaming: record.isStreaming,
  isSuppressed: record.isSuppressed,
  isVideoEnabled: record.isVideoEnabled,
});
