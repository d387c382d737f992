// ============================================================================
// RUTA: src/infrastructure/cache/stores/MemberStore.ts
// ============================================================================

import { Collection } from 'discord.js';
import type { Logger } from 'pino';

import type { Member } from '@/domain/entities/Member';
import type { Snowflake } from '@/domain/value-objects/Snowflake';
import { buildMember, type MemberRecord, toMemberRecord } from '@/infrastructure/cache/records/MemberRecord';
import type { GuildRecordStore } from '@/infrastructure/cache/stores/GuildRecordStore';
import type { UserStore } from '@/infrastructure/cache/stores/UserStore';
import type { UpdateResult } from '@/shared/types/cache';

export class MemberStore {
  public constructor(
    private readonly guilds: GuildRecordStore,
    private readonly users: UserStore,
    private readonly logger: Logger,
  ) {}

  public get(guildId: Snowflake, userId: Snowflake): Member | undefined {
    const record = this.guilds.getRecord(guildId)?.members.get(userId);

    return record ? this.build(record) : undefined;
  }

  public view(guildId: Snowflake): Collection<Snowflake, Member> {
    const members = new Collection<Snowflake, Member>();
    const records = this.guilds.getRecord(guildId)?.members;
    if (!records) {
      return members;
    }

    for (const [userId, record] of records) {
      const member = this.build(record);
      if (member) {
        members.set(userId, member);
      }
    }

    return members;
  }

  public set(member: Member): void {
    const guildRecord = this.guilds.getOrCreateRecord(member.guildId);
    const previous = guildRecord.members.get(member.user.id);

    this.guilds.acquireUser(guildRecord, member.user);
    guildRecord.members.set(member.user.id, toMemberRecord(member));

    if (previous) {
      this.guilds.releaseUser(guildRecord, previous.id);
    }
  }

  public delete(guildId: Snowflake, userId: Snowflake): Member | undefined {
    const guildRecord = this.guilds.getRecord(guildId);
    const record = guildRecord?.members.get(userId);
    if (!guildRecord || !record) {
      return undefined;
    }

    const member = this.build(record);
    guildRecord.members.delete(userId);
    this.guilds.releaseUser(guildRecord, userId);
    this.guilds.prune(guildId);

    return member;
  }

  public update(member: Member): UpdateResult<Member> {
    const old = this.get(member.guildId, member.user.id);
    this.set(member);

    return [old, this.get(member.guildId, member.user.id)];
  }

  public clear(guildId: Snowflake): Collection<Snowflake, Member> {
    const cleared = this.view(guildId);
    const guildRecord = this.guilds.getRecord(guildId);
    if (!guildRecord) {
      return cleared;
    }

    for (const userId of Array.from(guildRecord.members.keys())) {
      guildRecord.members.delete(userId);
      this.guilds.releaseUser(guildRecord, userId);
    }

    this.guilds.prune(guildId);

    return cleared;
  }

  private build(record: MemberRecord): Member | undefined {
    const user = this.users.get(record.id);
    if (!user) {
      this.logger.trace(
        { guildId: record.guildId.toString(), userId: record.id.toString() },
        'Miembro sin usuario en cache; se omite.',
      );
      return undefined;
    }

    return buildMember(record, user);
  }
}
