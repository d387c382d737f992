// ============================================================================
// RUTA: src/infrastructure/cache/stores/DmChannelStore.ts
// ============================================================================

import { Collection } from 'discord.js';
import type { Logger } from 'pino';

import type { DMChannel } from '@/domain/entities/Channel';
import type { Snowflake } from '@/domain/value-objects/Snowflake';
import { BoundedCache } from '@/infrastructure/cache/BoundedCache';
import {
  buildDmChannel,
  type DmChannelRecord,
  toDmChannelRecord,
} from '@/infrastructure/cache/records/DmChannelRecord';
import type { UserStore } from '@/infrastructure/cache/stores/UserStore';
import type { UpdateResult } from '@/shared/types/cache';

/** Canales directos indexados por el id del destinatario. */
export class DmChannelStore {
  private readonly entries: BoundedCache<Snowflake, DmChannelRecord>;

  // id de canal -> id del destinatario
  private readonly recipientByChannel = new Map<Snowflake, Snowflake>();

  public constructor(
    capacity: number,
    private readonly users: UserStore,
    private readonly logger: Logger,
  ) {
    this.entries = new BoundedCache(capacity, (recipientId, record) => {
      this.logger.debug(
        { channelId: record.id.toString(), userId: recipientId.toString() },
        'Canal directo expulsado por capacidad.',
      );
      this.forget(record);
    });
  }

  public get size(): number {
    return this.entries.size;
  }

  public get capacity(): number {
    return this.entries.capacity;
  }

  public get(recipientId: Snowflake): DMChannel | undefined {
    const record = this.entries.get(recipientId);

    return record ? this.build(record) : undefined;
  }

  public getByChannelId(channelId: Snowflake): DMChannel | undefined {
    const recipientId = this.recipientByChannel.get(channelId);

    return recipientId === undefined ? undefined : this.get(recipientId);
  }

  public view(): Collection<Snowflake, DMChannel> {
    const channels = new Collection<Snowflake, DMChannel>();
    for (const [recipientId, record] of this.entries.entriesSnapshot()) {
      const channel = this.build(record);
      if (channel) {
        channels.set(recipientId, channel);
      }
    }

    return channels;
  }

  public set(channel: DMChannel): void {
    const recipientId = channel.recipient.id;
    const previous = this.entries.peek(recipientId);

    this.users.acquire(channel.recipient);
    this.entries.set(recipientId, toDmChannelRecord(channel));
    if (previous && previous.id !== channel.id) {
      this.recipientByChannel.delete(previous.id);
    }

    this.recipientByChannel.set(channel.id, recipientId);

    if (previous) {
      this.users.release(previous.recipientId);
    }
  }

  public delete(recipientId: Snowflake): DMChannel | undefined {
    const record = this.entries.delete(recipientId);
    if (!record) {
      return undefined;
    }

    const channel = this.build(record);
    this.forget(record);

    return channel;
  }

  public update(channel: DMChannel): UpdateResult<DMChannel> {
    const old = this.get(channel.recipient.id);
    this.set(channel);

    return [old, this.get(channel.recipient.id)];
  }

  public clear(): Collection<Snowflake, DMChannel> {
    const drained = this.entries.clear();
    const cleared = new Collection<Snowflake, DMChannel>();

    for (const [recipientId, record] of drained) {
      const channel = this.build(record);
      if (channel) {
        cleared.set(recipientId, channel);
      }
    }

    for (const [, record] of drained) {
      this.forget(record);
    }

    return cleared;
  }

  /** Actualiza el ultimo mensaje sin tocar las referencias; devuelve si el canal estaba en cache. */
  public setLastMessageId(channelId: Snowflake, messageId: Snowflake): boolean {
    const recipientId = this.recipientByChannel.get(channelId);
    const record = recipientId === undefined ? undefined : this.entries.peek(recipientId);
    if (recipientId === undefined || !record) {
      return false;
    }

    this.entries.set(recipientId, Object.freeze({ ...record, lastMessageId: messageId }));
    return true;
  }

  private forget(record: DmChannelRecord): void {
    this.recipientByChannel.delete(record.id);
    this.users.release(record.recipientId);
  }

  private build(record: DmChannelRecord): DMChannel | undefined {
    const recipient = this.users.get(record.recipientId);
    if (!recipient) {
      this.logger.trace(
        { channelId: record.id.toString(), userId: record.recipientId.toString() },
        'Canal directo sin destinatario en cache; se omite.',
      );
      return undefined;
    }

    return buildDmChannel(record, recipient);
  }
}
