import {
  ChannelType,
  GuildMFALevel,
  GuildPremiumTier,
  GuildVerificationLevel,
  MessageType,
} from 'discord-api-types/v10';
import type { Logger } from 'pino';
import { vi } from 'vitest';

import type { DMChannel, GuildTextChannel } from '@/domain/entities/Channel';
import type { KnownCustomEmoji } from '@/domain/entities/Emoji';
import type { Guild } from '@/domain/entities/Guild';
import type { Member } from '@/domain/entities/Member';
import type { Message } from '@/domain/entities/Message';
import type { User } from '@/domain/entities/User';
import type { VoiceState } from '@/domain/entities/VoiceState';

export const createMockLogger = (): Logger =>
  ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    child: vi.fn().mockReturnThis(),
    level: 'silent',
  } as unknown as Logger);

export const makeUser = (id: bigint, overrides: Partial<User> = {}): User => ({
  id,
  username: `user-${id.toString()}`,
  discriminator: '0',
  globalName: null,
  avatarHash: null,
  isBot: false,
  isSystem: false,
  flags: 0,
  ...overrides,
});

export const makeGuild = (id: bigint, overrides: Partial<Guild> = {}): Guild => ({
  id,
  name: `guild-${id.toString()}`,
  iconHash: null,
  splashHash: null,
  bannerHash: null,
  description: null,
  ownerId: 1n,
  afkChannelId: null,
  afkTimeout: 300,
  features: [],
  verificationLevel: GuildVerificationLevel.None,
  mfaLevel: GuildMFALevel.None,
  premiumTier: GuildPremiumTier.None,
  premiumSubscriptionCount: null,
  preferredLocale: 'en-US',
  systemChannelId: null,
  rulesChannelId: null,
  publicUpdatesChannelId: null,
  vanityUrlCode: null,
  applicationId: null,
  joinedAt: null,
  isLarge: null,
  memberCount: null,
  ...overrides,
});

export const makeMember = (guildId: bigint, user: User, overrides: Partial<Member> = {}): Member => ({
  guildId,
  user,
  nickname: null,
  roleIds: [],
  joinedAt: new Date('2023-05-01T10:00:00.000Z'),
  premiumSince: null,
  isDeaf: false,
  isMute: false,
  ...overrides,
});

export const makeVoiceState = (member: Member, channelId: bigint | null = 900n): VoiceState => ({
  guildId: member.guildId,
  channelId,
  userId: member.user.id,
  member,
  sessionId: `session-${member.user.id.toString()}`,
  isGuildDeafened: false,
  isGuildMuted: false,
  isSelfDeafened: false,
  isSelfMuted: true,
  isStreaming: false,
  isSuppressed: false,
  isVideoEnabled: false,
});

export const makeEmoji = (id: bigint, guildId: bigint, user: User | null): KnownCustomEmoji => ({
  id,
  guildId,
  name: `emoji_${id.toString()}`,
  isAnimated: false,
  roleIds: [],
  user,
  isColonsRequired: true,
  isManaged: false,
  isAvailable: true,
});

export const makeDmChannel = (id: bigint, recipient: User): DMChannel => ({
  id,
  type: ChannelType.DM,
  name: null,
  lastMessageId: null,
  recipient,
});

export const makeTextChannel = (id: bigint, guildId: bigint): GuildTextChannel => ({
  id,
  guildId,
  type: ChannelType.GuildText,
  name: 'general',
  position: 0,
  parentId: null,
  isNsfw: false,
  permissionOverwrites: [],
  topic: null,
  lastMessageId: null,
  rateLimitPerUser: 0,
  lastPinTimestamp: null,
});

export const makeMessage = (id: bigint, channelId: bigint, author: User, overrides: Partial<Message> = {}): Message => ({
  id,
  channelId,
  guildId: null,
  author,
  content: `message ${id.toString()}`,
  timestamp: new Date('2024-02-03T04:05:06.000Z'),
  editedTimestamp: null,
  isTts: false,
  isMentioningEveryone: false,
  userMentionIds: [],
  roleMentionIds: [],
  attachments: [],
  isPinned: false,
  webhookId: null,
  type: MessageType.Default,
  flags: 0,
  nonce: null,
  ...overrides,
});
