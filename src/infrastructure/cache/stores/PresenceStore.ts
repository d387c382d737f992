// ============================================================================
// RUTA: src/infrastructure/cache/stores/PresenceStore.ts
// ============================================================================

import type { Collection } from 'discord.js';

import type { MemberPresence } from '@/domain/entities/Presence';
import type { Snowflake } from '@/domain/value-objects/Snowflake';
import type { GuildRecordStore } from '@/infrastructure/cache/stores/GuildRecordStore';
import type { UpdateResult } from '@/shared/types/cache';
import { snapshotOf } from '@/shared/utils/collections';

export class PresenceStore {
  public constructor(private readonly guilds: GuildRecordStore) {}

  public get(guildId: Snowflake, userId: Snowflake): MemberPresence | undefined {
    return this.guilds.getRecord(guildId)?.presences.get(userId);
  }

  public view(guildId: Snowflake): Collection<Snowflake, MemberPresence> {
    return snapshotOf(this.guilds.getRecord(guildId)?.presences);
  }

  public set(presence: MemberPresence): void {
    this.guilds.getOrCreateRecord(presence.guildId).presences.set(
      presence.userId,
      Object.freeze({
        ...presence,
        activities: Object.freeze(presence.activities.map((activity) => Object.freeze({ ...activity }))),
        clientStatus: Object.freeze({ ...presence.clientStatus }),
      }),
    );
  }

  public delete(guildId: Snowflake, userId: Snowflake): MemberPresence | undefined {
    const record = this.guilds.getRecord(guildId);
    const presence = record?.presences.get(userId);
    if (!record || !presence) {
      return undefined;
    }

    record.presences.delete(userId);
    this.guilds.prune(guildId);

    return presence;
  }

  public update(presence: MemberPresence): UpdateResult<MemberPresence> {
    const old = this.get(presence.guildId, presence.userId);
    this.set(presence);

    return [old, this.get(presence.guildId, presence.userId)];
  }

  public clear(guildId: Snowflake): Collection<Snowflake, MemberPresence> {
    const cleared = this.view(guildId);
    const record = this.guilds.getRecord(guildId);
    if (!record) {
      return cleared;
    }

    record.presences.clear();
    this.guilds.prune(guildId);

    return cleared;
  }
}
