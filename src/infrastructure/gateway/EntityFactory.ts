// ============================================================================
// RUTA: src/infrastructure/gateway/EntityFactory.ts
// ============================================================================

import { ChannelType, PresenceUpdateStatus } from 'discord-api-types/v10';

import type {
  Channel,
  DMChannel,
  GuildChannel,
  PermissionOverwrite,
} from '@/domain/entities/Channel';
import type { KnownCustomEmoji } from '@/domain/entities/Emoji';
import type { Guild } from '@/domain/entities/Guild';
import type { Member } from '@/domain/entities/Member';
import type { Attachment, Message } from '@/domain/entities/Message';
import type { Activity, ClientStatus, MemberPresence } from '@/domain/entities/Presence';
import type { Role } from '@/domain/entities/Role';
import type { OwnUser, User } from '@/domain/entities/User';
import type { VoiceState } from '@/domain/entities/VoiceState';
import {
  parseOptionalSnowflake,
  parseSnowflake,
  type Snowflake,
} from '@/domain/value-objects/Snowflake';
import type {
  ActivityPayload,
  AttachmentPayload,
  ChannelPayload,
  ClientStatusPayload,
  EmojiPayload,
  GuildMemberPayload,
  GuildPayload,
  MessagePayload,
  MessageUpdatePayload,
  OverwritePayload,
  OwnUserPayload,
  PresencePayload,
  RolePayload,
  UserPayload,
  VoiceStatePayload,
} from '@/infrastructure/gateway/payloads';
import { InvalidSnowflakeError, PayloadDecodeError } from '@/shared/errors/domain.errors';

const BITFIELD_PATTERN = /^\d+$/u;

const SUPPORTED_GUILD_CHANNEL_TYPES: ReadonlySet<ChannelType> = new Set([
  ChannelType.GuildCategory,
  ChannelType.GuildText,
  ChannelType.GuildAnnouncement,
  ChannelType.GuildVoice,
  ChannelType.GuildStageVoice,
]);

// Los snowflakes invalidos se reportan como fallo de decodificacion de la entidad.
const decoding = <T>(entity: string, decode: () => T): T => {
  try {
    return decode();
  } catch (error) {
    if (error instanceof InvalidSnowflakeError) {
      throw new PayloadDecodeError(entity, error.message, error);
    }

    throw error;
  }
};

const parseTimestamp = (value: string, entity: string): Date => {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new PayloadDecodeError(entity, `marca de tiempo invalida "${value}"`);
  }

  return date;
};

const parseOptionalTimestamp = (value: string | null | undefined, entity: string): Date | null =>
  value === null || value === undefined ? null : parseTimestamp(value, entity);

const parseBitfield = (value: string, entity: string): bigint => {
  if (!BITFIELD_PATTERN.test(value)) {
    throw new PayloadDecodeError(entity, `campo de bits invalido "${value}"`);
  }

  return BigInt(value);
};

const resolveGuildId = (payloadGuildId: string | undefined, fallback: Snowflake | undefined, entity: string) => {
  if (payloadGuildId !== undefined) {
    return parseSnowflake(payloadGuildId);
  }

  if (fallback === undefined) {
    throw new PayloadDecodeError(entity, 'falta guild_id');
  }

  return fallback;
};

export const isSupportedGuildChannelType = (type: ChannelType): boolean =>
  SUPPORTED_GUILD_CHANNEL_TYPES.has(type);

export const deserializeUser = (payload: UserPayload): User =>
  decoding('user', () => ({
    id: parseSnowflake(payload.id),
    username: payload.username,
    discriminator: payload.discriminator,
    globalName: payload.global_name ?? null,
    avatarHash: payload.avatar,
    isBot: payload.bot ?? false,
    isSystem: payload.system ?? false,
    flags: payload.public_flags ?? payload.flags ?? 0,
  }));

export const deserializeOwnUser = (payload: OwnUserPayload): OwnUser => ({
  ...deserializeUser(payload),
  isMfaEnabled: payload.mfa_enabled ?? false,
  locale: payload.locale ?? null,
  isVerified: payload.verified ?? null,
  email: payload.email ?? null,
  premiumType: payload.premium_type ?? null,
});

export const deserializeGuild = (payload: GuildPayload): Guild =>
  decoding('guild', () => ({
    id: parseSnowflake(payload.id),
    name: payload.name,
    iconHash: payload.icon,
    splashHash: payload.splash,
    bannerHash: payload.banner,
    description: payload.description,
    ownerId: parseSnowflake(payload.owner_id),
    afkChannelId: parseOptionalSnowflake(payload.afk_channel_id),
    afkTimeout: payload.afk_timeout,
    features: [...payload.features],
    verificationLevel: payload.verification_level,
    mfaLevel: payload.mfa_level,
    premiumTier: payload.premium_tier,
    premiumSubscriptionCount: payload.premium_subscription_count ?? null,
    preferredLocale: payload.preferred_locale,
    systemChannelId: parseOptionalSnowflake(payload.system_channel_id),
    rulesChannelId: parseOptionalSnowflake(payload.rules_channel_id),
    publicUpdatesChannelId: parseOptionalSnowflake(payload.public_updates_channel_id),
    vanityUrlCode: payload.vanity_url_code,
    applicationId: parseOptionalSnowflake(payload.application_id),
    joinedAt: parseOptionalTimestamp(payload.joined_at, 'guild'),
    isLarge: payload.large ?? null,
    memberCount: payload.member_count ?? null,
  }));

/** `joinedAt` cubre a los miembros pendientes, que llegan con `joined_at` nulo. */
export const deserializeMember = (payload: GuildMemberPayload, guildId: Snowflake, joinedAt?: Date): Member =>
  decoding('guild member', () => {
    if (!payload.user) {
      throw new PayloadDecodeError('guild member', 'falta el usuario');
    }

    const joined = payload.joined_at === null ? joinedAt : parseTimestamp(payload.joined_at, 'guild member');
    if (!joined) {
      throw new PayloadDecodeError('guild member', 'falta joined_at');
    }

    return {
      guildId,
      user: deserializeUser(payload.user),
      nickname: payload.nick ?? null,
      roleIds: payload.roles.map((roleId) => parseSnowflake(roleId)),
      joinedAt: joined,
      premiumSince: parseOptionalTimestamp(payload.premium_since, 'guild member'),
      isDeaf: payload.deaf ?? false,
      isMute: payload.mute ?? false,
    };
  });

export const deserializeRole = (payload: RolePayload, guildId: Snowflake): Role =>
  decoding('role', () => ({
    id: parseSnowflake(payload.id),
    guildId,
    name: payload.name,
    color: payload.color,
    isHoisted: payload.hoist,
    position: payload.position,
    permissions: parseBitfield(payload.permissions, 'role'),
    isManaged: payload.managed,
    isMentionable: payload.mentionable,
  }));

export const deserializeKnownCustomEmoji = (payload: EmojiPayload, guildId: Snowflake): KnownCustomEmoji =>
  decoding('emoji', () => {
    if (payload.id === null) {
      throw new PayloadDecodeError('emoji', 'un emoji unicode no es un emoji personalizado');
    }

    return {
      id: parseSnowflake(payload.id),
      guildId,
      name: payload.name,
      isAnimated: payload.animated ?? false,
      roleIds: (payload.roles ?? []).map((roleId) => parseSnowflake(roleId)),
      user: payload.user ? deserializeUser(payload.user) : null,
      isColonsRequired: payload.require_colons ?? true,
      isManaged: payload.managed ?? false,
      isAvailable: payload.available ?? true,
    };
  });

const deserializeOverwrite = (payload: OverwritePayload): PermissionOverwrite => ({
  id: parseSnowflake(payload.id),
  type: payload.type,
  allow: parseBitfield(payload.allow, 'permission overwrite'),
  deny: parseBitfield(payload.deny, 'permission overwrite'),
});

export const deserializeGuildChannel = (payload: ChannelPayload, guildId?: Snowflake): GuildChannel =>
  decoding('guild channel', () => {
    const base = {
      id: parseSnowflake(payload.id),
      guildId: resolveGuildId(payload.guild_id, guildId, 'guild channel'),
      name: payload.name ?? '',
      position: payload.position ?? 0,
      parentId: parseOptionalSnowflake(payload.parent_id),
      isNsfw: payload.nsfw ?? false,
      permissionOverwrites: (payload.permission_overwrites ?? []).map(deserializeOverwrite),
    };

    switch (payload.type) {
      case ChannelType.GuildCategory:
        return { ...base, type: payload.type };
      case ChannelType.GuildText:
        return {
          ...base,
          type: payload.type,
          topic: payload.topic ?? null,
          lastMessageId: parseOptionalSnowflake(payload.last_message_id),
          rateLimitPerUser: payload.rate_limit_per_user ?? 0,
          lastPinTimestamp: parseOptionalTimestamp(payload.last_pin_timestamp, 'guild channel'),
        };
      case ChannelType.GuildAnnouncement:
        return {
          ...base,
          type: payload.type,
          topic: payload.topic ?? null,
          lastMessageId: parseOptionalSnowflake(payload.last_message_id),
          lastPinTimestamp: parseOptionalTimestamp(payload.last_pin_timestamp, 'guild channel'),
        };
      case ChannelType.GuildVoice:
      case ChannelType.GuildStageVoice:
        return {
          ...base,
          type: payload.type,
          bitrate: payload.bitrate ?? 64_000,
          userLimit: payload.user_limit ?? 0,
        };
      default:
        throw new PayloadDecodeError('guild channel', `tipo de canal no soportado ${payload.type}`);
    }
  });

export const deserializeDmChannel = (payload: ChannelPayload): DMChannel =>
  decoding('dm channel', () => {
    if (payload.type !== ChannelType.DM) {
      throw new PayloadDecodeError('dm channel', `tipo de canal ${payload.type} no es un canal directo`);
    }

    const [recipient] = payload.recipients ?? [];
    if (!recipient) {
      throw new PayloadDecodeError('dm channel', 'falta el destinatario');
    }

    return {
      id: parseSnowflake(payload.id),
      type: ChannelType.DM,
      name: payload.name ?? null,
      lastMessageId: parseOptionalSnowflake(payload.last_message_id),
      recipient: deserializeUser(recipient),
    };
  });

export const deserializeChannel = (payload: ChannelPayload, guildId?: Snowflake): Channel =>
  payload.type === ChannelType.DM ? deserializeDmChannel(payload) : deserializeGuildChannel(payload, guildId);

/**
 * Los estados de voz de GUILD_CREATE no traen el miembro; en ese caso se usa
 * `member`, normalmente el que ya esta en cache.
 */
export const deserializeVoiceState = (
  payload: VoiceStatePayload,
  guildId?: Snowflake,
  member?: Member,
): VoiceState =>
  decoding('voice state', () => {
    const resolvedGuildId = resolveGuildId(payload.guild_id, guildId, 'voice state');
    const resolvedMember = payload.member ? deserializeMember(payload.member, resolvedGuildId) : member;
    if (!resolvedMember) {
      throw new PayloadDecodeError('voice state', 'falta el miembro');
    }

    return {
      guildId: resolvedGuildId,
      channelId: parseOptionalSnowflake(payload.channel_id),
      userId: parseSnowflake(payload.user_id),
      member: resolvedMember,
      sessionId: payload.session_id,
      isGuildDeafened: payload.deaf,
      isGuildMuted: payload.mute,
      isSelfDeafened: payload.self_deaf,
      isSelfMuted: payload.self_mute,
      isStreaming: payload.self_stream ?? false,
      isSuppressed: payload.suppress,
      isVideoEnabled: payload.self_video,
    };
  });

const deserializeActivity = (payload: ActivityPayload): Activity => ({
  name: payload.name,
  type: payload.type,
  url: payload.url ?? null,
  createdAt: new Date(payload.created_at),
  details: payload.details ?? null,
  state: payload.state ?? null,
});

const deserializeClientStatus = (payload: ClientStatusPayload | undefined): ClientStatus => ({
  desktop: payload?.desktop ?? PresenceUpdateStatus.Offline,
  mobile: payload?.mobile ?? PresenceUpdateStatus.Offline,
  web: payload?.web ?? PresenceUpdateStatus.Offline,
});

export const deserializeMemberPresence = (payload: PresencePayload, guildId?: Snowflake): MemberPresence =>
  decoding('presence', () => ({
    userId: parseSnowflake(payload.user.id),
    guildId: resolveGuildId(payload.guild_id, guildId, 'presence'),
    visibleStatus: payload.status ?? PresenceUpdateStatus.Offline,
    activities: (payload.activities ?? []).map(deserializeActivity),
    clientStatus: deserializeClientStatus(payload.client_status),
  }));

const deserializeAttachment = (payload: AttachmentPayload): Attachment => ({
  id: parseSnowflake(payload.id),
  filename: payload.filename,
  size: payload.size,
  url: payload.url,
  proxyUrl: payload.proxy_url,
  height: payload.height ?? null,
  width: payload.width ?? null,
});

export const deserializeMessage = (payload: MessagePayload): Message =>
  decoding('message', () => ({
    id: parseSnowflake(payload.id),
    channelId: parseSnowflake(payload.channel_id),
    guildId: parseOptionalSnowflake(payload.guild_id),
    author: deserializeUser(payload.author),
    content: payload.content,
    timestamp: parseTimestamp(payload.timestamp, 'message'),
    editedTimestamp: parseOptionalTimestamp(payload.edited_timestamp, 'message'),
    isTts: payload.tts,
    isMentioningEveryone: payload.mention_everyone,
    userMentionIds: payload.mentions.map((user) => parseSnowflake(user.id)),
    roleMentionIds: payload.mention_roles.map((roleId) => parseSnowflake(roleId)),
    attachments: payload.attachments.map(deserializeAttachment),
    isPinned: payload.pinned,
    webhookId: parseOptionalSnowflake(payload.webhook_id),
    type: payload.type,
    flags: payload.flags ?? 0,
    nonce: payload.nonce ?? null,
  }));

/** Aplica un MESSAGE_UPDATE parcial sobre el mensaje en cache. */
export const applyMessageUpdate = (message: Message, payload: MessageUpdatePayload): Message =>
  decoding('message', () => ({
    ...message,
    author: payload.author ? deserializeUser(payload.author) : message.author,
    content: payload.content ?? message.content,
    editedTimestamp:
      payload.edited_timestamp === undefined
        ? message.editedTimestamp
        : parseOptionalTimestamp(payload.edited_timestamp, 'message'),
    isTts: payload.tts ?? message.isTts,
    isMentioningEveryone: payload.mention_everyone ?? message.isMentioningEveryone,
    userMentionIds: payload.mentions
      ? payload.mentions.map((user) => parseSnowflake(user.id))
      : message.userMentionIds,
    roleMentionIds: payload.mention_roles
      ? payload.mention_roles.map((roleId) => parseSnowflake(roleId))
      : message.roleMentionIds,
    attachments: payload.attachments ? payload.attachments.map(deserializeAttachment) : message.attachments,
    isPinned: payload.pinned ?? message.isPinned,
    flags: payload.flags ?? message.flags,
  }));
