// ============================================================================
// RUTA: src/index.ts
// ============================================================================

export { GatewayStateHandler } from '@/application/services/GatewayStateHandler';
export type { DispatchResult, DispatchResults } from '@/application/services/GatewayStateHandler';

export type {
  Channel,
  DMChannel,
  GuildAnnouncementChannel,
  GuildCategory,
  GuildChannel,
  GuildTextChannel,
  GuildVoiceChannel,
  PermissionOverwrite,
  TextableGuildChannel,
} from '@/domain/entities/Channel';
export { isDMChannel, isTextableGuildChannel } from '@/domain/entities/Channel';
export type { KnownCustomEmoji } from '@/domain/entities/Emoji';
export type { Guild } from '@/domain/entities/Guild';
export type { Member } from '@/domain/entities/Member';
export type { Attachment, Message } from '@/domain/entities/Message';
export type { Activity, ClientStatus, MemberPresence } from '@/domain/entities/Presence';
export type { Role } from '@/domain/entities/Role';
export type { OwnUser, User } from '@/domain/entities/User';
export type { VoiceState } from '@/domain/entities/VoiceState';
export {
  isSnowflake,
  parseOptionalSnowflake,
  parseSnowflake,
  snowflakeCreatedAt,
} from '@/domain/value-objects/Snowflake';
export type { Snowflake } from '@/domain/value-objects/Snowflake';

export { BoundedCache } from '@/infrastructure/cache/BoundedCache';
export { StatefulCache } from '@/infrastructure/cache/StatefulCache';
export type { CacheCapacities, StatefulCacheOptions } from '@/infrastructure/cache/StatefulCache';
export { GuildRecord } from '@/infrastructure/cache/stores/GuildRecordStore';
export * from '@/infrastructure/gateway/EntityFactory';
export type * from '@/infrastructure/gateway/payloads';

export { GatewayCacheError, isGatewayCacheError } from '@/shared/errors/base.error';
export {
  InvalidSnowflakeError,
  PayloadDecodeError,
  UnavailableGuildError,
  ValidationFailedError,
} from '@/shared/errors/domain.errors';
export { createChildLogger, logger } from '@/shared/logger/pino';
export type { UpdateResult } from '@/shared/types/cache';
