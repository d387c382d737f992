// ============================================================================
// RUTA: src/infrastructure/cache/records/MessageRecord.ts
// ============================================================================

import type { Message } from '@/domain/entities/Message';
import type { User } from '@/domain/entities/User';
import type { Snowflake } from '@/domain/value-objects/Snowflake';

export type MessageRecord = Omit<Message, 'author'> & { readonly authorId: Snowflake };

export const toMessageRecord = (message: Message): MessageRecord => {
  const { author, ...rest } = message;

  return Object.freeze({
    ...rest,
    authorId: author.id,
    userMentionIds: Object.freeze([...message.userMentionIds]),
    roleMentionIds: Object.freeze([...message.roleMentionIds]),
    attachments: Object.freeze(message.attachments.map((attachment) => Object.freeze({ ...attachment }))),
  });
};

export const buildMessage = (record: MessageRecord, author: User): Message => {
  const { authorId: _authorId, ...rest } = record;

  return {
    ...rest,
    author,
    userMentionIds: [...record.userMentionIds],
    roleMentionIds: [...record.roleMentionIds],
    attachments: record.attachments.map((attachment) => ({ ...attachment })),
  };
};
