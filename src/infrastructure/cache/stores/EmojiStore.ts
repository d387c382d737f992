// ============================================================================
// RUTA: src/infrastructure/cache/stores/EmojiStore.ts
// ============================================================================

import { Collection } from 'discord.js';

import type { KnownCustomEmoji } from '@/domain/entities/Emoji';
import type { Snowflake } from '@/domain/value-objects/Snowflake';
import { buildEmoji, type EmojiRecord, toEmojiRecord } from '@/infrastructure/cache/records/EmojiRecord';
import type { GuildRecordStore } from '@/infrastructure/cache/stores/GuildRecordStore';
import type { UserStore } from '@/infrastructure/cache/stores/UserStore';
import type { UpdateResult } from '@/shared/types/cache';

export class EmojiStore {
  public constructor(
    private readonly guilds: GuildRecordStore,
    private readonly users: UserStore,
  ) {}

  public get(emojiId: Snowflake): KnownCustomEmoji | undefined {
    const record = this.findRecord(emojiId);

    return record ? this.build(record) : undefined;
  }

  public view(guildId: Snowflake): Collection<Snowflake, KnownCustomEmoji> {
    const emojis = new Collection<Snowflake, KnownCustomEmoji>();
    for (const [emojiId, record] of this.guilds.getRecord(guildId)?.emojis ?? []) {
      emojis.set(emojiId, this.build(record));
    }

    return emojis;
  }

  public set(emoji: KnownCustomEmoji): void {
    const previousOwner = this.guilds.ownerOf('emojis', emoji.id);
    if (previousOwner !== undefined && previousOwner !== emoji.guildId) {
      this.delete(emoji.id);
    }

    const guildRecord = this.guilds.getOrCreateRecord(emoji.guildId);
    const previous = guildRecord.emojis.get(emoji.id);

    if (emoji.user) {
      this.guilds.acquireUser(guildRecord, emoji.user);
    }

    guildRecord.emojis.set(emoji.id, toEmojiRecord(emoji));
    this.guilds.indexOwned('emojis', emoji.id, emoji.guildId);

    if (previous && previous.userId !== null) {
      this.guilds.releaseUser(guildRecord, previous.userId);
    }
  }

  public delete(emojiId: Snowflake): KnownCustomEmoji | undefined {
    const guildId = this.guilds.ownerOf('emojis', emojiId);
    const guildRecord = guildId === undefined ? undefined : this.guilds.getRecord(guildId);
    const record = guildRecord?.emojis.get(emojiId);
    if (guildId === undefined || !guildRecord || !record) {
      return undefined;
    }

    const emoji = this.build(record);
    guildRecord.emojis.delete(emojiId);
    this.guilds.unindexOwned('emojis', emojiId);
    if (record.userId !== null) {
      this.guilds.releaseUser(guildRecord, record.userId);
    }

    this.guilds.prune(guildId);

    return emoji;
  }

  public update(emoji: KnownCustomEmoji): UpdateResult<KnownCustomEmoji> {
    const old = this.get(emoji.id);
    this.set(emoji);

    return [old, this.get(emoji.id)];
  }

  public clear(guildId: Snowflake): Collection<Snowflake, KnownCustomEmoji> {
    const cleared = this.view(guildId);
    for (const emojiId of cleared.keys()) {
      this.delete(emojiId);
    }

    return cleared;
  }

  private findRecord(emojiId: Snowflake): EmojiRecord | undefined {
    const guildId = this.guilds.ownerOf('emojis', emojiId);

    return guildId === undefined ? undefined : this.guilds.getRecord(guildId)?.emojis.get(emojiId);
  }

  // El creador puede haber salido de la cache; el emoji sigue siendo valido sin el.
  private build(record: EmojiRecord): KnownCustomEmoji {
    const user = record.userId === null ? null : this.users.get(record.userId) ?? null;

    return buildEmoji(record, user);
  }
}
