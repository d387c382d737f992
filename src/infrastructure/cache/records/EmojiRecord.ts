// ============================================================================
// RUTA: src/infrastructure/cache/records/EmojiRecord.ts
// ============================================================================

import type { KnownCustomEmoji } from '@/domain/entities/Emoji';
import type { User } from '@/domain/entities/User';
import type { Snowflake } from '@/domain/value-objects/Snowflake';

export interface EmojiRecord {
  readonly id: Snowflake;
  readonly guildId: Snowflake;
  readonly name: string | null;
  readonly isAnimated: boolean;
  readonly roleIds: readonly Snowflake[];
  readonly userId: Snowflake | null;
  readonly isColonsRequired: boolean;
  readonly isManaged: boolean;
  readonly isAvailable: boolean;
}

export const toEmojiRecord = (emoji: KnownCustomEmoji): EmojiRecord =>
  Object.freeze({
    id: emoji.id,
    guildId: emoji.guildId,
    name: emoji.name,
    isAnimated: emoji.isAnimated,
    roleIds: Object.freeze([...emoji.roleIds]),
    userId: emoji.user?.id ?? null,
    isColonsRequired: emoji.isColonsRequired,
    isManaged: emoji.isManaged,
    isAvailable: emoji.isAvailable,
  });

export const buildEmoji = (record: EmojiRecord, user: User | null): KnownCustomEmoji => ({
  id: record.id,
  guildId: record.guildId,
  name: record.name,
  isAnimated: record.isAnimated,
  roleIds: [...record.roleIds],
  user,
  isColonsRequired: record.isColonsRequired,
  isManaged: record.isManaged,
  isAvailable: record.isAvailable,
});
