// ============================================================================
// RUTA: src/infrastructure/cache/stores/MessageStore.ts
// ============================================================================

import { Collection } from 'discord.js';
import type { Logger } from 'pino';

import type { Message } from '@/domain/entities/Message';
import type { Snowflake } from '@/domain/value-objects/Snowflake';
import { BoundedCache } from '@/infrastructure/cache/BoundedCache';
import { buildMessage, type MessageRecord, toMessageRecord } from '@/infrastructure/cache/records/MessageRecord';
import type { UserStore } from '@/infrastructure/cache/stores/UserStore';
import type { UpdateResult } from '@/shared/types/cache';

export class MessageStore {
  private readonly entries: BoundedCache<Snowflake, MessageRecord>;

  public constructor(
    capacity: number,
    private readonly users: UserStore,
    private readonly logger: Logger,
  ) {
    this.entries = new BoundedCache(capacity, (messageId, record) => {
      this.logger.trace({ messageId: messageId.toString() }, 'Mensaje expulsado por capacidad.');
      this.users.release(record.authorId);
    });
  }

  public get size(): number {
    return this.entries.size;
  }

  public get capacity(): number {
    return this.entries.capacity;
  }

  public get(messageId: Snowflake): Message | undefined {
    const record = this.entries.get(messageId);

    return record ? this.build(record) : undefined;
  }

  public view(): Collection<Snowflake, Message> {
    return this.collect(this.entries.entriesSnapshot());
  }

  public set(message: Message): void {
    const previous = this.entries.peek(message.id);

    this.users.acquire(message.author);
    this.entries.set(message.id, toMessageRecord(message));

    if (previous) {
      this.users.release(previous.authorId);
    }
  }

  public delete(messageId: Snowflake): Message | undefined {
    const record = this.entries.delete(messageId);
    if (!record) {
      return undefined;
    }

    const message = this.build(record);
    this.users.release(record.authorId);

    return message;
  }

  public deleteMany(messageIds: Iterable<Snowflake>): Collection<Snowflake, Message> {
    const deleted = new Collection<Snowflake, Message>();
    for (const messageId of messageIds) {
      const message = this.delete(messageId);
      if (message) {
        deleted.set(messageId, message);
      }
    }

    return deleted;
  }

  public update(message: Message): UpdateResult<Message> {
    const old = this.get(message.id);
    this.set(message);

    return [old, this.get(message.id)];
  }

  public clear(): Collection<Snowflake, Message> {
    const drained = this.entries.clear();
    const cleared = this.collect(drained);

    for (const [, record] of drained) {
      this.users.release(record.authorId);
    }

    return cleared;
  }

  private collect(entries: ReadonlyArray<[Snowflake, MessageRecord]>): Collection<Snowflake, Message> {
    const messages = new Collection<Snowflake, Message>();
    for (const [messageId, record] of entries) {
      const message = this.build(record);
      if (message) {
        messages.set(messageId, message);
      }
    }

    return messages;
  }

  private build(record: MessageRecord): Message | undefined {
    const author = this.users.get(record.authorId);
    if (!author) {
      this.logger.trace(
        { messageId: record.id.toString(), userId: record.authorId.toString() },
        'Mensaje sin autor en cache; se omite.',
      );
      return undefined;
    }

    return buildMessage(record, author);
  }
}
