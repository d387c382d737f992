// ============================================================================
// RUTA: src/infrastructure/cache/records/DmChannelRecord.ts
// ============================================================================

import { ChannelType } from 'discord-api-types/v10';

import type { DMChannel } from '@/domain/entities/Channel';
import type { User } from '@/domain/entities/User';
import type { Snowflake } from '@/domain/value-objects/Snowflake';

export interface DmChannelRecord {
  readonly id: Snowflake;
  readonly name: string | null;
  readonly lastMessageId: Snowflake | null;
  readonly recipientId: Snowflake;
}

export const toDmChannelRecord = (channel: DMChannel): DmChannelRecord =>
  Object.freeze({
    id: channel.id,
    name: channel.name,
    lastMessageId: channel.lastMessageId,
    recipientId: channel.recipient.id,
  });

export const buildDmChannel = (record: DmChannelRecord, recipient: User): DMChannel => ({
  id: record.id,
  type: ChannelType.DM,
  name: record.name,
  lastMessageId: record.lastMessageId,
  recipient,
});
