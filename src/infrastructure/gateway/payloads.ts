// ============================================================================
// RUTA: src/infrastructure/gateway/payloads.ts
// ============================================================================

import {
  type ActivityType,
  type ChannelType,
  GatewayDispatchEvents,
  type GuildMFALevel,
  type GuildPremiumTier,
  type GuildVerificationLevel,
  type MessageType,
  type OverwriteType,
  type PresenceUpdateStatus,
} from 'discord-api-types/v10';

// Subconjunto del JSON del gateway que la cache consume. Los campos siguen el
// formato del cable (snake_case, snowflakes como cadenas); los objetos de
// `discord-api-types/v10` son asignables a estas formas.

export interface UserPayload {
  id: string;
  username: string;
  discriminator: string;
  global_name?: string | null;
  avatar: string | null;
  bot?: boolean;
  system?: boolean;
  flags?: number;
  public_flags?: number;
}

export interface OwnUserPayload extends UserPayload {
  mfa_enabled?: boolean;
  locale?: string;
  verified?: boolean;
  email?: string | null;
  premium_type?: number;
}

export interface RolePayload {
  id: string;
  name: string;
  color: number;
  hoist: boolean;
  position: number;
  permissions: string;
  managed: boolean;
  mentionable: boolean;
}

export interface EmojiPayload {
  id: string | null;
  name: string | null;
  animated?: boolean;
  roles?: string[];
  user?: UserPayload;
  require_colons?: boolean;
  managed?: boolean;
  available?: boolean;
}

export interface OverwritePayload {
  id: string;
  type: OverwriteType;
  allow: string;
  deny: string;
}

export interface ChannelPayload {
  id: string;
  type: ChannelType;
  guild_id?: string;
  name?: string | null;
  position?: number;
  parent_id?: string | null;
  nsfw?: boolean;
  permission_overwrites?: OverwritePayload[];
  topic?: string | null;
  last_message_id?: string | null;
  rate_limit_per_user?: number;
  last_pin_timestamp?: string | null;
  bitrate?: number;
  user_limit?: number;
  recipients?: UserPayload[];
}

export interface GuildMemberPayload {
  user?: UserPayload;
  nick?: string | null;
  roles: string[];
  joined_at: string | null;
  premium_since?: string | null;
  deaf?: boolean;
  mute?: boolean;
}

export interface VoiceStatePayload {
  guild_id?: string;
  channel_id: string | null;
  user_id: string;
  member?: GuildMemberPayload;
  session_id: string;
  deaf: boolean;
  mute: boolean;
  self_deaf: boolean;
  self_mute: boolean;
  self_stream?: boolean;
  self_video: boolean;
  suppress: boolean;
}

export interface ActivityPayload {
  name: string;
  type: ActivityType;
  url?: string | null;
  /** Milisegundos desde la epoca Unix. */
  created_at: number;
  details?: string | null;
  state?: string | null;
}

export interface ClientStatusPayload {
  desktop?: PresenceUpdateStatus;
  mobile?: PresenceUpdateStatus;
  web?: PresenceUpdateStatus;
}

export interface PresencePayload {
  user: { id: string };
  guild_id?: string;
  status?: PresenceUpdateStatus;
  activities?: ActivityPayload[];
  client_status?: ClientStatusPayload;
}

export interface AttachmentPayload {
  id: string;
  filename: string;
  size: number;
  url: string;
  proxy_url: string;
  height?: number | null;
  width?: number | null;
}

export interface MessagePayload {
  id: string;
  channel_id: string;
  guild_id?: string;
  author: UserPayload;
  content: string;
  timestamp: string;
  edited_timestamp: string | null;
  tts: boolean;
  mention_everyone: boolean;
  mentions: UserPayload[];
  mention_roles: string[];
  attachments: AttachmentPayload[];
  pinned: boolean;
  webhook_id?: string;
  type: MessageType;
  flags?: number;
  nonce?: string | number;
}

/** MESSAGE_UPDATE solo garantiza el id y el canal. */
export type MessageUpdatePayload = Partial<MessagePayload> & Pick<MessagePayload, 'id' | 'channel_id'>;

export interface UnavailableGuildPayload {
  id: string;
  unavailable?: boolean;
}

export interface GuildPayload {
  id: string;
  name: string;
  icon: string | null;
  splash: string | null;
  banner: string | null;
  description: string | null;
  owner_id: string;
  afk_channel_id: string | null;
  afk_timeout: number;
  features: string[];
  verification_level: GuildVerificationLevel;
  mfa_level: GuildMFALevel;
  premium_tier: GuildPremiumTier;
  premium_subscription_count?: number;
  preferred_locale: string;
  system_channel_id: string | null;
  rules_channel_id: string | null;
  public_updates_channel_id: string | null;
  vanity_url_code: string | null;
  application_id: string | null;
  joined_at?: string;
  large?: boolean;
  member_count?: number;
  roles: RolePayload[];
  emojis: EmojiPayload[];
}

export interface GuildCreatePayload extends GuildPayload {
  unavailable?: boolean;
  channels?: ChannelPayload[];
  members?: GuildMemberPayload[];
  presences?: PresencePayload[];
  voice_states?: VoiceStatePayload[];
}

export interface ReadyPayload {
  v: number;
  user: OwnUserPayload;
  guilds: UnavailableGuildPayload[];
  session_id: string;
}

export interface GuildRolePayload {
  guild_id: string;
  role: RolePayload;
}

export interface GuildRoleDeletePayload {
  guild_id: string;
  role_id: string;
}

export interface GuildEmojisUpdatePayload {
  guild_id: string;
  emojis: EmojiPayload[];
}

export interface GuildMemberEventPayload extends GuildMemberPayload {
  guild_id: string;
}

export interface GuildMemberRemovePayload {
  guild_id: string;
  user: UserPayload;
}

export interface GuildMembersChunkPayload {
  guild_id: string;
  members: GuildMemberPayload[];
  presences?: PresencePayload[];
  chunk_index: number;
  chunk_count: number;
}

export interface MessageDeletePayload {
  id: string;
  channel_id: string;
  guild_id?: string;
}

export interface MessageDeleteBulkPayload {
  ids: string[];
  channel_id: string;
  guild_id?: string;
}

/** Eventos que la cache procesa, con el tipo de su campo `d`. */
export interface DispatchPayloads {
  [GatewayDispatchEvents.Ready]: ReadyPayload;
  [GatewayDispatchEvents.GuildCreate]: GuildCreatePayload;
  [GatewayDispatchEvents.GuildUpdate]: GuildPayload;
  [GatewayDispatchEvents.GuildDelete]: UnavailableGuildPayload;
  [GatewayDispatchEvents.GuildRoleCreate]: GuildRolePayload;
  [GatewayDispatchEvents.GuildRoleUpdate]: GuildRolePayload;
  [GatewayDispatchEvents.GuildRoleDelete]: GuildRoleDeletePayload;
  [GatewayDispatchEvents.GuildEmojisUpdate]: GuildEmojisUpdatePayload;
  [GatewayDispatchEvents.GuildMemberAdd]: GuildMemberEventPayload;
  [GatewayDispatchEvents.GuildMemberUpdate]: GuildMemberEventPayload;
  [GatewayDispatchEvents.GuildMemberRemove]: GuildMemberRemovePayload;
  [GatewayDispatchEvents.GuildMembersChunk]: GuildMembersChunkPayload;
  [GatewayDispatchEvents.ChannelCreate]: ChannelPayload;
  [GatewayDispatchEvents.ChannelUpdate]: ChannelPayload;
  [GatewayDispatchEvents.ChannelDelete]: ChannelPayload;
  [GatewayDispatchEvents.MessageCreate]: MessagePayload;
  [GatewayDispatchEvents.MessageUpdate]: MessageUpdatePayload;
  [GatewayDispatchEvents.MessageDelete]: MessageDeletePayload;
  [GatewayDispatchEvents.MessageDeleteBulk]: MessageDeleteBulkPayload;
  [GatewayDispatchEvents.PresenceUpdate]: PresencePayload;
  [GatewayDispatchEvents.VoiceStateUpdate]: VoiceStatePayload;
  [GatewayDispatchEvents.UserUpdate]: OwnUserPayload;
}

export type HandledDispatchEvent = keyof DispatchPayloads;

export type HandledDispatch<K extends HandledDispatchEvent = HandledDispatchEvent> = {
  [P in K]: { t: P; d: DispatchPayloads[P] };
}[K];

export interface UnhandledDispatch {
  t: Exclude<GatewayDispatchEvents, HandledDispatchEvent>;
  d: unknown;
}

export type GatewayDispatch = HandledDispatch | UnhandledDispatch;
