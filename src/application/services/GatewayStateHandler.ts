// ============================================================================
// RUTA: src/application/services/GatewayStateHandler.ts
// ============================================================================

import { ChannelType, GatewayDispatchEvents, PresenceUpdateStatus } from 'discord-api-types/v10';
import type { Collection } from 'discord.js';
import type { Logger } from 'pino';

import { type Channel, isDMChannel } from '@/domain/entities/Channel';
import type { KnownCustomEmoji } from '@/domain/entities/Emoji';
import type { Guild } from '@/domain/entities/Guild';
import type { Member } from '@/domain/entities/Member';
import type { Message } from '@/domain/entities/Message';
import type { MemberPresence } from '@/domain/entities/Presence';
import type { Role } from '@/domain/entities/Role';
import type { OwnUser } from '@/domain/entities/User';
import type { VoiceState } from '@/domain/entities/VoiceState';
import { parseSnowflake, type Snowflake } from '@/domain/value-objects/Snowflake';
import type { StatefulCache } from '@/infrastructure/cache/StatefulCache';
import {
  applyMessageUpdate,
  deserializeChannel,
  deserializeGuild,
  deserializeGuildChannel,
  deserializeKnownCustomEmoji,
  deserializeMember,
  deserializeMemberPresence,
  deserializeMessage,
  deserializeOwnUser,
  deserializeRole,
  deserializeVoiceState,
  isSupportedGuildChannelType,
} from '@/infrastructure/gateway/EntityFactory';
import type {
  ChannelPayload,
  DispatchPayloads,
  GatewayDispatch,
  GuildCreatePayload,
  GuildEmojisUpdatePayload,
  GuildMemberEventPayload,
  GuildMembersChunkPayload,
  GuildPayload,
  HandledDispatch,
  HandledDispatchEvent,
  MessageUpdatePayload,
  PresencePayload,
  ReadyPayload,
  UnavailableGuildPayload,
  VoiceStatePayload,
} from '@/infrastructure/gateway/payloads';
import { InvalidSnowflakeError, PayloadDecodeError } from '@/shared/errors/domain.errors';
import { createChildLogger } from '@/shared/logger/pino';
import type { UpdateResult } from '@/shared/types/cache';
import { snapshotOf } from '@/shared/utils/collections';

/** Lo que devuelve cada evento para notificar cambios. */
export interface DispatchResults {
  [GatewayDispatchEvents.Ready]: UpdateResult<OwnUser>;
  [GatewayDispatchEvents.GuildCreate]: UpdateResult<Guild>;
  [GatewayDispatchEvents.GuildUpdate]: UpdateResult<Guild>;
  [GatewayDispatchEvents.GuildDelete]: Guild | undefined;
  [GatewayDispatchEvents.GuildRoleCreate]: UpdateResult<Role>;
  [GatewayDispatchEvents.GuildRoleUpdate]: UpdateResult<Role>;
  [GatewayDispatchEvents.GuildRoleDelete]: Role | undefined;
  [GatewayDispatchEvents.GuildEmojisUpdate]: UpdateResult<Collection<Snowflake, KnownCustomEmoji>>;
  [GatewayDispatchEvents.GuildMemberAdd]: UpdateResult<Member>;
  [GatewayDispatchEvents.GuildMemberUpdate]: UpdateResult<Member>;
  [GatewayDispatchEvents.GuildMemberRemove]: Member | undefined;
  [GatewayDispatchEvents.GuildMembersChunk]: Collection<Snowflake, Member>;
  [GatewayDispatchEvents.ChannelCreate]: UpdateResult<Channel>;
  [GatewayDispatchEvents.ChannelUpdate]: UpdateResult<Channel>;
  [GatewayDispatchEvents.ChannelDelete]: Channel | undefined;
  [GatewayDispatchEvents.MessageCreate]: Message;
  [GatewayDispatchEvents.MessageUpdate]: UpdateResult<Message>;
  [GatewayDispatchEvents.MessageDelete]: Message | undefined;
  [GatewayDispatchEvents.MessageDeleteBulk]: Collection<Snowflake, Message>;
  [GatewayDispatchEvents.PresenceUpdate]: UpdateResult<MemberPresence>;
  [GatewayDispatchEvents.VoiceStateUpdate]: UpdateResult<VoiceState>;
  [GatewayDispatchEvents.UserUpdate]: UpdateResult<OwnUser>;
}

export type DispatchResult = DispatchResults[HandledDispatchEvent];

type DispatchHandlers = {
  [K in HandledDispatchEvent]: (data: DispatchPayloads[K]) => DispatchResults[K];
};

const NOTHING: UpdateResult<never> = [undefined, undefined];

/**
 * Traduce los eventos del gateway ya recibidos a operaciones sobre la cache.
 * No hace E/S: el transporte entrega `{ t, d }` y aqui solo se decodifica y
 * se escribe.
 */
export class GatewayStateHandler {
  private readonly handlers: DispatchHandlers = {
    [GatewayDispatchEvents.Ready]: (data) => this.onReady(data),
    [GatewayDispatchEvents.GuildCreate]: (data) => this.onGuildCreate(data),
    [GatewayDispatchEvents.GuildUpdate]: (data) => this.onGuildUpdate(data),
    [GatewayDispatchEvents.GuildDelete]: (data) => this.onGuildDelete(data),
    [GatewayDispatchEvents.GuildRoleCreate]: (data) =>
      this.cache.roles.update(deserializeRole(data.role, parseSnowflake(data.guild_id))),
    [GatewayDispatchEvents.GuildRoleUpdate]: (data) =>
      this.cache.roles.update(deserializeRole(data.role, parseSnowflake(data.guild_id))),
    [GatewayDispatchEvents.GuildRoleDelete]: (data) => this.cache.roles.delete(parseSnowflake(data.role_id)),
    [GatewayDispatchEvents.GuildEmojisUpdate]: (data) => this.onEmojisUpdate(data),
    [GatewayDispatchEvents.GuildMemberAdd]: (data) =>
      this.cache.members.update(deserializeMember(data, parseSnowflake(data.guild_id))),
    [GatewayDispatchEvents.GuildMemberUpdate]: (data) => this.onMemberUpdate(data),
    [GatewayDispatchEvents.GuildMemberRemove]: (data) =>
      this.cache.members.delete(parseSnowflake(data.guild_id), parseSnowflake(data.user.id)),
    [GatewayDispatchEvents.GuildMembersChunk]: (data) => this.onMembersChunk(data),
    [GatewayDispatchEvents.ChannelCreate]: (data) => this.onChannelUpsert(data),
    [GatewayDispatchEvents.ChannelUpdate]: (data) => this.onChannelUpsert(data),
    [GatewayDispatchEvents.ChannelDelete]: (data) => this.onChannelDelete(data),
    [GatewayDispatchEvents.MessageCreate]: (data) => {
      const message = deserializeMessage(data);
      this.cache.messages.set(message);
      this.cache.setLastMessageId(message.channelId, message.id);

      return message;
    },
    [GatewayDispatchEvents.MessageUpdate]: (data) => this.onMessageUpdate(data),
    [GatewayDispatchEvents.MessageDelete]: (data) => this.cache.messages.delete(parseSnowflake(data.id)),
    [GatewayDispatchEvents.MessageDeleteBulk]: (data) =>
      this.cache.messages.deleteMany(data.ids.map((messageId) => parseSnowflake(messageId))),
    [GatewayDispatchEvents.PresenceUpdate]: (data) => this.onPresenceUpdate(data),
    [GatewayDispatchEvents.VoiceStateUpdate]: (data) => this.onVoiceStateUpdate(data),
    [GatewayDispatchEvents.UserUpdate]: (data) => this.cache.updateMe(deserializeOwnUser(data)),
  };

  public constructor(
    private readonly cache: StatefulCache,
    private readonly logger: Logger = createChildLogger({ module: 'gateway-state' }),
  ) {}

  public handle(event: GatewayDispatch): DispatchResult | undefined {
    if (!this.isHandled(event)) {
      this.logger.debug({ event: event.t }, 'Evento del gateway sin efecto en la cache.');
      return undefined;
    }

    try {
      return this.dispatch<HandledDispatchEvent>(event);
    } catch (error) {
      if (error instanceof PayloadDecodeError || error instanceof InvalidSnowflakeError) {
        this.logger.warn({ event: event.t, err: error }, 'No se pudo decodificar el evento del gateway.');
      }

      throw error;
    }
  }

  private isHandled(event: GatewayDispatch): event is HandledDispatch {
    return Object.hasOwn(this.handlers, event.t);
  }

  private dispatch<K extends HandledDispatchEvent>(event: HandledDispatch<K>): DispatchResults[K] {
    const handler = this.handlers[event.t];

    return handler(event.d);
  }

  private onReady(data: ReadyPayload): UpdateResult<OwnUser> {
    const me = deserializeOwnUser(data.user);
    const guildIds = data.guilds.map((guild) => parseSnowflake(guild.id));

    this.cache.guilds.setInitialUnavailable(guildIds);
    this.logger.info(
      { userId: me.id.toString(), guilds: guildIds.length },
      'Sesion lista; servidores pendientes marcados como no disponibles.',
    );

    return this.cache.updateMe(me);
  }

  private onGuildCreate(data: GuildCreatePayload): UpdateResult<Guild> {
    const guildId = parseSnowflake(data.id);
    if (data.unavailable === true) {
      this.cache.guilds.setAvailability(guildId, false);
      return NOTHING;
    }

    // Se decodifica todo antes de escribir para no dejar el servidor a medias.
    const guild = deserializeGuild(data);
    const roles = data.roles.map((role) => deserializeRole(role, guildId));
    const emojis = data.emojis.map((emoji) => deserializeKnownCustomEmoji(emoji, guildId));
    const channels = (data.channels ?? [])
      .filter((channel) => this.isCacheableChannel(channel))
      .map((channel) => deserializeGuildChannel(channel, guildId));
    const members = (data.members ?? []).map((member) => deserializeMember(member, guildId));
    const presences = (data.presences ?? []).map((presence) => deserializeMemberPresence(presence, guildId));
    const membersById = new Map(members.map((member) => [member.user.id, member] as const));
    const voiceStates = (data.voice_states ?? []).flatMap((payload) => {
      const voiceState = this.decodeVoiceState(payload, guildId, (userId) => membersById.get(userId));
      return voiceState ? [voiceState] : [];
    });

    const old = this.cache.guilds.getRecord(guildId)?.guild;
    this.cache.guilds.purge(guildId);
    this.cache.guilds.set(guild);
    roles.forEach((role) => this.cache.roles.set(role));
    emojis.forEach((emoji) => this.cache.emojis.set(emoji));
    channels.forEach((channel) => this.cache.guildChannels.set(channel));
    members.forEach((member) => this.cache.members.set(member));
    presences.forEach((presence) => this.cache.presences.set(presence));
    voiceStates.forEach((voiceState) => this.cache.voiceStates.set(voiceState));

    this.logger.debug(
      { guildId: guildId.toString(), members: members.length, channels: channels.length },
      'Servidor cargado en cache.',
    );

    return [old, this.cache.guilds.get(guildId)];
  }

  private onGuildUpdate(data: GuildPayload): UpdateResult<Guild> {
    const guild = deserializeGuild(data);
    const roles = data.roles.map((role) => deserializeRole(role, guild.id));
    const result = this.cache.guilds.update(guild);

    const roleIds = new Set(roles.map((role) => role.id));
    roles.forEach((role) => this.cache.roles.set(role));
    for (const roleId of this.cache.roles.view(guild.id).keys()) {
      if (!roleIds.has(roleId)) {
        this.cache.roles.delete(roleId);
      }
    }

    this.replaceEmojis(
      guild.id,
      data.emojis.map((emoji) => deserializeKnownCustomEmoji(emoji, guild.id)),
    );

    return result;
  }

  private onGuildDelete(data: UnavailableGuildPayload): Guild | undefined {
    const guildId = parseSnowflake(data.id);
    if (data.unavailable === true) {
      this.cache.guilds.setAvailability(guildId, false);
      return this.cache.guilds.getRecord(guildId)?.guild;
    }

    return this.cache.guilds.purge(guildId);
  }

  private onEmojisUpdate(data: GuildEmojisUpdatePayload): UpdateResult<Collection<Snowflake, KnownCustomEmoji>> {
    const guildId = parseSnowflake(data.guild_id);
    const emojis = data.emojis.map((emoji) => deserializeKnownCustomEmoji(emoji, guildId));
    const old = this.cache.emojis.view(guildId);

    this.replaceEmojis(guildId, emojis);

    return [old, this.cache.emojis.view(guildId)];
  }

  // Escribe primero los nuevos para no soltar creadores que siguen en uso.
  private replaceEmojis(guildId: Snowflake, emojis: readonly KnownCustomEmoji[]): void {
    const emojiIds = new Set(emojis.map((emoji) => emoji.id));
    emojis.forEach((emoji) => this.cache.emojis.set(emoji));

    for (const emojiId of this.cache.emojis.view(guildId).keys()) {
      if (!emojiIds.has(emojiId)) {
        this.cache.emojis.delete(emojiId);
      }
    }
  }

  private onMemberUpdate(data: GuildMemberEventPayload): UpdateResult<Member> {
    const guildId = parseSnowflake(data.guild_id);
    const cached = data.user ? this.cache.members.get(guildId, parseSnowflake(data.user.id)) : undefined;
    if (data.joined_at === null && !cached) {
      this.logger.trace(
        { guildId: guildId.toString(), userId: data.user?.id },
        'Miembro pendiente sin copia en cache; se omite.',
      );
      return NOTHING;
    }

    const decoded = deserializeMember(data, guildId, cached?.joinedAt);

    return this.cache.members.update({
      ...decoded,
      isDeaf: data.deaf ?? cached?.isDeaf ?? false,
      isMute: data.mute ?? cached?.isMute ?? false,
    });
  }

  private onMembersChunk(data: GuildMembersChunkPayload): Collection<Snowflake, Member> {
    const guildId = parseSnowflake(data.guild_id);
    const members = data.members.map((member) => deserializeMember(member, guildId));
    const presences = (data.presences ?? []).map((presence) => deserializeMemberPresence(presence, guildId));

    members.forEach((member) => this.cache.members.set(member));
    presences.forEach((presence) => this.cache.presences.set(presence));
    this.logger.debug(
      { guildId: guildId.toString(), chunk: data.chunk_index, of: data.chunk_count, members: members.length },
      'Bloque de miembros recibido.',
    );

    return snapshotOf(members.map((member) => [member.user.id, member] as const));
  }

  private onChannelUpsert(data: ChannelPayload): UpdateResult<Channel> {
    if (!this.isCacheableChannel(data)) {
      return NOTHING;
    }

    const channel = deserializeChannel(data);

    return isDMChannel(channel) ? this.cache.dmChannels.update(channel) : this.cache.guildChannels.update(channel);
  }

  private onChannelDelete(data: ChannelPayload): Channel | undefined {
    const channelId = parseSnowflake(data.id);
    const guildChannel = this.cache.guildChannels.delete(channelId);
    if (guildChannel) {
      return guildChannel;
    }

    const dmChannel = this.cache.dmChannels.getByChannelId(channelId);

    return dmChannel ? this.cache.dmChannels.delete(dmChannel.recipient.id) : undefined;
  }

  private onMessageUpdate(data: MessageUpdatePayload): UpdateResult<Message> {
    const cached = this.cache.messages.get(parseSnowflake(data.id));
    if (!cached) {
      return NOTHING;
    }

    return this.cache.messages.update(applyMessageUpdate(cached, data));
  }

  private onPresenceUpdate(data: PresencePayload): UpdateResult<MemberPresence> {
    const presence = deserializeMemberPresence(data);
    if (presence.visibleStatus === PresenceUpdateStatus.Offline) {
      return [this.cache.presences.delete(presence.guildId, presence.userId), undefined];
    }

    return this.cache.presences.update(presence);
  }

  private onVoiceStateUpdate(data: VoiceStatePayload): UpdateResult<VoiceState> {
    if (data.guild_id === undefined) {
      this.logger.debug({ userId: data.user_id }, 'Estado de voz fuera de un servidor; se ignora.');
      return NOTHING;
    }

    const guildId = parseSnowflake(data.guild_id);
    if (data.channel_id === null) {
      return [this.cache.voiceStates.delete(guildId, parseSnowflake(data.user_id)), undefined];
    }

    const voiceState = this.decodeVoiceState(data, guildId);

    return voiceState ? this.cache.voiceStates.update(voiceState) : NOTHING;
  }

  private decodeVoiceState(
    payload: VoiceStatePayload,
    guildId: Snowflake,
    resolveMember: (userId: Snowflake) => Member | undefined = (userId) => this.cache.members.get(guildId, userId),
  ): VoiceState | undefined {
    const member = payload.member ? undefined : resolveMember(parseSnowflake(payload.user_id));
    if (!payload.member && !member) {
      this.logger.trace(
        { guildId: guildId.toString(), userId: payload.user_id },
        'Estado de voz sin miembro en cache; se omite.',
      );
      return undefined;
    }

    return deserializeVoiceState(payload, guildId, member);
  }

  private isCacheableChannel(channel: ChannelPayload): boolean {
    if (channel.type === ChannelType.DM) {
      return true;
    }

    if (isSupportedGuildChannelType(channel.type)) {
      return true;
    }

    this.logger.debug({ channelId: channel.id, type: channel.type }, 'Tipo de canal sin cache; se omite.');
    return false;
  }
}
