// ============================================================================
// RUTA: src/infrastructure/cache/StatefulCache.ts
// ============================================================================

import type { Logger } from 'pino';
import { z, ZodError } from 'zod';

import type { Channel } from '@/domain/entities/Channel';
import type { OwnUser } from '@/domain/entities/User';
import type { Snowflake } from '@/domain/value-objects/Snowflake';
import { DmChannelStore } from '@/infrastructure/cache/stores/DmChannelStore';
import { EmojiStore } from '@/infrastructure/cache/stores/EmojiStore';
import { GuildChannelStore } from '@/infrastructure/cache/stores/GuildChannelStore';
import { GuildRecordStore } from '@/infrastructure/cache/stores/GuildRecordStore';
import { MemberStore } from '@/infrastructure/cache/stores/MemberStore';
import { MessageStore } from '@/infrastructure/cache/stores/MessageStore';
import { PresenceStore } from '@/infrastructure/cache/stores/PresenceStore';
import { RoleStore } from '@/infrastructure/cache/stores/RoleStore';
import { UserStore } from '@/infrastructure/cache/stores/UserStore';
import { VoiceStateStore } from '@/infrastructure/cache/stores/VoiceStateStore';
import { env } from '@/shared/config/env';
import { ValidationFailedError } from '@/shared/errors/domain.errors';
import { createChildLogger } from '@/shared/logger/pino';
import type { UpdateResult } from '@/shared/types/cache';

const CacheOptionsSchema = z.object({
  messageCapacity: z.number().int().min(1, 'messageCapacity debe ser al menos 1'),
  dmChannelCapacity: z.number().int().min(1, 'dmChannelCapacity debe ser al menos 1'),
});

export type CacheCapacities = z.infer<typeof CacheOptionsSchema>;

export interface StatefulCacheOptions extends Partial<CacheCapacities> {
  readonly logger?: Logger;
}

const parseCapacities = (options: StatefulCacheOptions): CacheCapacities => {
  try {
    return CacheOptionsSchema.parse({
      messageCapacity: options.messageCapacity ?? env.CACHE_MESSAGE_CAPACITY,
      dmChannelCapacity: options.dmChannelCapacity ?? env.CACHE_DM_CHANNEL_CAPACITY,
    });
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ValidationFailedError(error.flatten().fieldErrors);
    }

    throw error;
  }
};

/**
 * Punto de entrada unico de la cache. Cada tipo de entidad tiene su propio
 * almacen porque la forma de propiedad cambia: los servidores poseen miembros,
 * roles, emojis, canales, estados de voz y presencias; los usuarios se
 * comparten con conteo de referencias; canales directos y mensajes viven en
 * caches LRU acotadas.
 */
export class StatefulCache {
  public readonly users: UserStore;

  public readonly guilds: GuildRecordStore;

  public readonly members: MemberStore;

  public readonly roles: RoleStore;

  public readonly emojis: EmojiStore;

  public readonly guildChannels: GuildChannelStore;

  public readonly voiceStates: VoiceStateStore;

  public readonly presences: PresenceStore;

  public readonly dmChannels: DmChannelStore;

  public readonly messages: MessageStore;

  private me: OwnUser | undefined = undefined;

  private readonly logger: Logger;

  public constructor(options: StatefulCacheOptions = {}) {
    const capacities = parseCapacities(options);
    this.logger = options.logger ?? createChildLogger({ module: 'state-cache' });

    this.users = new UserStore(this.logger);
    this.guilds = new GuildRecordStore(this.users, this.logger);
    this.members = new MemberStore(this.guilds, this.users, this.logger);
    this.roles = new RoleStore(this.guilds);
    this.emojis = new EmojiStore(this.guilds, this.users);
    this.guildChannels = new GuildChannelStore(this.guilds);
    this.voiceStates = new VoiceStateStore(this.guilds, this.users, this.logger);
    this.presences = new PresenceStore(this.guilds);
    this.dmChannels = new DmChannelStore(capacities.dmChannelCapacity, this.users, this.logger);
    this.messages = new MessageStore(capacities.messageCapacity, this.users, this.logger);

    this.logger.debug(capacities, 'Cache de estado inicializada.');
  }

  public getMe(): OwnUser | undefined {
    return this.me;
  }

  public setMe(user: OwnUser): void {
    this.me = user;
  }

  public deleteMe(): OwnUser | undefined {
    const me = this.me;
    this.me = undefined;

    return me;
  }

  public updateMe(user: OwnUser): UpdateResult<OwnUser> {
    const old = this.me;
    this.me = user;

    return [old, this.me];
  }

  public getChannel(channelId: Snowflake): Channel | undefined {
    return this.guildChannels.get(channelId) ?? this.dmChannels.getByChannelId(channelId);
  }

  /** Refresca `lastMessageId` del canal en cache, sea de servidor o directo. */
  public setLastMessageId(channelId: Snowflake, messageId: Snowflake): boolean {
    return (
      this.guildChannels.setLastMessageId(channelId, messageId) ||
      this.dmChannels.setLastMessageId(channelId, messageId)
    );
  }

  /** Vacia toda la sesion (reconexion completa). */
  public clearAll(): void {
    this.messages.clear();
    this.dmChannels.clear();

    for (const guildId of this.guilds.recordIds()) {
      this.guilds.purge(guildId);
    }

    this.users.clear();
    this.me = undefined;
    this.logger.debug('Cache de estado vaciada.');
  }
}
