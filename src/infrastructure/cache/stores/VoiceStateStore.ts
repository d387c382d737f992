// ============================================================================
// RUTA: src/infrastructure/cache/stores/VoiceStateStore.ts
// ============================================================================

import { Collection } from 'discord.js';
import type { Logger } from 'pino';

import type { VoiceState } from '@/domain/entities/VoiceState';
import type { Snowflake } from '@/domain/value-objects/Snowflake';
import {
  buildVoiceState,
  toVoiceStateRecord,
  type VoiceStateRecord,
} from '@/infrastructure/cache/records/VoiceStateRecord';
import type { GuildRecordStore } from '@/infrastructure/cache/stores/GuildRecordStore';
import type { UserStore } from '@/infrastructure/cache/stores/UserStore';
import type { UpdateResult } from '@/shared/types/cache';

export class VoiceStateStore {
  public constructor(
    private readonly guilds: GuildRecordStore,
    private readonly users: UserStore,
    private readonly logger: Logger,
  ) {}

  public get(guildId: Snowflake, userId: Snowflake): VoiceState | undefined {
    const record = this.guilds.getRecord(guildId)?.voiceStates.get(userId);

    return record ? this.build(record) : undefined;
  }

  public view(guildId: Snowflake): Collection<Snowflake, VoiceState> {
    return this.collect(guildId, () => true);
  }

  public viewForChannel(guildId: Snowflake, channelId: Snowflake): Collection<Snowflake, VoiceState> {
    return this.collect(guildId, (record) => record.channelId === channelId);
  }

  public set(voiceState: VoiceState): void {
    const guildRecord = this.guilds.getOrCreateRecord(voiceState.guildId);
    const previous = guildRecord.voiceStates.get(voiceState.userId);

    this.guilds.acquireUser(guildRecord, voiceState.member.user);
    guildRecord.voiceStates.set(voiceState.userId, toVoiceStateRecord(voiceState));

    if (previous) {
      this.guilds.releaseUser(guildRecord, previous.member.id);
    }
  }

  public delete(guildId: Snowflake, userId: Snowflake): VoiceState | undefined {
    const guildRecord = this.guilds.getRecord(guildId);
    const record = guildRecord?.voiceStates.get(userId);
    if (!guildRecord || !record) {
      return undefined;
    }

    const voiceState = this.build(record);
    guildRecord.voiceStates.delete(userId);
    this.guilds.releaseUser(guildRecord, record.member.id);
    this.guilds.prune(guildId);

    return voiceState;
  }

  public update(voiceState: VoiceState): UpdateResult<VoiceState> {
    const old = this.get(voiceState.guildId, voiceState.userId);
    this.set(voiceState);

    return [old, this.get(voiceState.guildId, voiceState.userId)];
  }

  public clear(guildId: Snowflake): Collection<Snowflake, VoiceState> {
    const cleared = this.view(guildId);
    const guildRecord = this.guilds.getRecord(guildId);
    if (!guildRecord) {
      return cleared;
    }

    for (const [userId, record] of Array.from(guildRecord.voiceStates)) {
      guildRecord.voiceStates.delete(userId);
      this.guilds.releaseUser(guildRecord, record.member.id);
    }

    this.guilds.prune(guildId);

    return cleared;
  }

  private collect(
    guildId: Snowflake,
    predicate: (record: VoiceStateRecord) => boolean,
  ): Collection<Snowflake, VoiceState> {
    const voiceStates = new Collection<Snowflake, VoiceState>();
    const records = this.guilds.getRecord(guildId)?.voiceStates;
    if (!records) {
      return voiceStates;
    }

    for (const [userId, record] of records) {
      if (!predicate(record)) {
        continue;
      }

      const voiceState = this.build(record);
      if (voiceState) {
        voiceStates.set(userId, voiceState);
      }
    }

    return voiceStates;
  }

  private build(record: VoiceStateRecord): VoiceState | undefined {
    const user = this.users.get(record.member.id);
    if (!user) {
      this.logger.trace(
        { guildId: record.guildId.toString(), userId: record.userId.toString() },
        'Estado de voz sin usuario en cache; se omite.',
      );
      return undefined;
    }

    return buildVoiceState(record, user);
  }
}
