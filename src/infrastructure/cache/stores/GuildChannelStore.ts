// ============================================================================
// RUTA: src/infrastructure/cache/stores/GuildChannelStore.ts
// ============================================================================

import type { Collection } from 'discord.js';

import { type GuildChannel, isTextableGuildChannel } from '@/domain/entities/Channel';
import type { Snowflake } from '@/domain/value-objects/Snowflake';
import type { GuildRecordStore } from '@/infrastructure/cache/stores/GuildRecordStore';
import type { UpdateResult } from '@/shared/types/cache';
import { snapshotOf } from '@/shared/utils/collections';

export class GuildChannelStore {
  public constructor(private readonly guilds: GuildRecordStore) {}

  public get(channelId: Snowflake): GuildChannel | undefined {
    const guildId = this.guilds.ownerOf('channels', channelId);
    if (guildId === undefined) {
      return undefined;
    }

    return this.guilds.getRecord(guildId)?.channels.get(channelId);
  }

  public view(guildId: Snowflake): Collection<Snowflake, GuildChannel> {
    return snapshotOf(this.guilds.getRecord(guildId)?.channels);
  }

  public set(channel: GuildChannel): void {
    const previousOwner = this.guilds.ownerOf('channels', channel.id);
    if (previousOwner !== undefined && previousOwner !== channel.guildId) {
      this.delete(channel.id);
    }

    this.guilds
      .getOrCreateRecord(channel.guildId)
      .channels.set(channel.id, Object.freeze({ ...channel, permissionOverwrites: [...channel.permissionOverwrites] }));
    this.guilds.indexOwned('channels', channel.id, channel.guildId);
  }

  public delete(channelId: Snowflake): GuildChannel | undefined {
    const guildId = this.guilds.ownerOf('channels', channelId);
    if (guildId === undefined) {
      return undefined;
    }

    this.guilds.unindexOwned('channels', channelId);
    const record = this.guilds.getRecord(guildId);
    const channel = record?.channels.get(channelId);
    record?.channels.delete(channelId);
    this.guilds.prune(guildId);

    return channel;
  }

  public update(channel: GuildChannel): UpdateResult<GuildChannel> {
    const old = this.get(channel.id);
    this.set(channel);

    return [old, this.get(channel.id)];
  }

  public clear(guildId: Snowflake): Collection<Snowflake, GuildChannel> {
    const cleared = this.view(guildId);
    for (const channelId of cleared.keys()) {
      this.delete(channelId);
    }

    return cleared;
  }

  /** Solo aplica a canales de texto y de anuncios; devuelve si hubo cambio. */
  public setLastMessageId(channelId: Snowflake, messageId: Snowflake): boolean {
    const channel = this.get(channelId);
    if (!channel || !isTextableGuildChannel(channel)) {
      return false;
    }

    this.set({ ...channel, lastMessageId: messageId });
    return true;
  }
}
