// ============================================================================
// RUTA: src/domain/entities/Channel.ts
// ============================================================================

import { ChannelType, type OverwriteType } from 'discord-api-types/v10';

import type { User } from '@/domain/entities/User';
import type { Snowflake } from '@/domain/value-objects/Snowflake';

export interface PermissionOverwrite {
  readonly id: Snowflake;
  readonly type: OverwriteType;
  readonly allow: bigint;
  readonly deny: bigint;
}

export interface DMChannel {
  readonly id: Snowflake;
  readonly type: ChannelType.DM;
  readonly name: string | null;
  readonly lastMessageId: Snowflake | null;
  readonly recipient: User;
}

interface BaseGuildChannel {
  readonly id: Snowflake;
  readonly guildId: Snowflake;
  readonly name: string;
  readonly position: number;
  readonly parentId: Snowflake | null;
  readonly isNsfw: boolean;
  readonly permissionOverwrites: readonly PermissionOverwrite[];
}

export interface GuildCategory extends BaseGuildChannel {
  readonly type: ChannelType.GuildCategory;
}

export interface GuildTextChannel extends BaseGuildChannel {
  readonly type: ChannelType.GuildText;
  readonly topic: string | null;
  readonly lastMessageId: Snowflake | null;
  /** Segundos entre mensajes por usuario; 0 si no hay modo lento. */
  readonly rateLimitPerUser: number;
  readonly lastPinTimestamp: Date | null;
}

export interface GuildAnnouncementChannel extends BaseGuildChannel {
  readonly type: ChannelType.GuildAnnouncement;
  readonly topic: string | null;
  readonly lastMessageId: Snowflake | null;
  readonly lastPinTimestamp: Date | null;
}

export interface GuildVoiceChannel extends BaseGuildChannel {
  readonly type: ChannelType.GuildVoice | ChannelType.GuildStageVoice;
  readonly bitrate: number;
  readonly userLimit: number;
}

export type GuildChannel = GuildCategory | GuildTextChannel | GuildAnnouncementChannel | GuildVoiceChannel;

export type TextableGuildChannel = GuildTextChannel | GuildAnnouncementChannel;

export type Channel = DMChannel | GuildChannel;

export const isDMChannel = (channel: Channel): channel is DMChannel => channel.type === ChannelType.DM;

export const isTextableGuildChannel = (channel: GuildChannel): channel is TextableGuildChannel =>
  channel.type === ChannelType.GuildText || channel.type === ChannelType.GuildAnnouncement;
