// ============================================================================
// RUTA: src/infrastructure/cache/records/MemberRecord.ts
// ============================================================================

import type { Member } from '@/domain/entities/Member';
import type { User } from '@/domain/entities/User';
import type { Snowflake } from '@/domain/value-objects/Snowflake';

/** Miembro sin el objeto `User`; el usuario se resuelve por `id` en la lectura. */
export interface MemberRecord {
  readonly id: Snowflake;
  readonly guildId: Snowflake;
  readonly nickname: string | null;
  readonly roleIds: readonly Snowflake[];
  readonly joinedAt: Date;
  readonly premiumSince: Date | null;
  readonly isDeaf: boolean;
  readonly isMute: boolean;
}

export const toMemberRecord = (member: Member): MemberRecord =>
  Object.freeze({
    id: member.user.id,
    guildId: member.guildId,
    nickname: member.nickname,
    roleIds: Object.freeze([...member.roleIds]),
    joinedAt: member.joinedAt,
    premiumSince: member.premiumSince,
    isDeaf: member.isDeaf,
    isMute: member.isMute,
  });

export const buildMember = (record: MemberRecord, user: User): Member => ({
  guildId: record.guildId,
  user,
  nickname: record.nickname,
  roleIds: [...record.roleIds],
  joinedAt: record.joinedAt,
  premiumSince: record.premiumSince,
  isDeaf: record.isDeaf,
  isMute: record.isMute,
});
