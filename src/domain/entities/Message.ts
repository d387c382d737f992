// ============================================================================
// RUTA: src/domain/entities/Message.ts
// ============================================================================

import type { MessageType } from 'discord-api-types/v10';

import type { User } from '@/domain/entities/User';
import type { Snowflake } from '@/domain/value-objects/Snowflake';

export interface Attachment {
  readonly id: Snowflake;
  readonly filename: string;
  readonly size: number;
  readonly url: string;
  readonly proxyUrl: string;
  readonly height: number | null;
  readonly width: number | null;
}

export interface Message {
  readonly id: Snowflake;
  readonly channelId: Snowflake;
  readonly guildId: Snowflake | null;
  readonly author: User;
  readonly content: string;
  readonly timestamp: Date;
  readonly editedTimestamp: Date | null;
  readonly isTts: boolean;
  readonly isMentioningEveryone: boolean;
  readonly userMentionIds: readonly Snowflake[];
  readonly roleMentionIds: readonly Snowflake[];
  readonly attachments: readonly Attachment[];
  readonly isPinned: boolean;
  readonly webhookId: Snowflake | null;
  readonly type: MessageType;
  readonly flags: number;
  readonly nonce: string | number | null;
}
