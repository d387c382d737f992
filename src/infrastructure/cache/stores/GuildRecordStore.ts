// ============================================================================
// RUTA: src/infrastructure/cache/stores/GuildRecordStore.ts
// ============================================================================

import { Collection } from 'discord.js';
import type { Logger } from 'pino';

import type { GuildChannel } from '@/domain/entities/Channel';
import type { Guild } from '@/domain/entities/Guild';
import type { MemberPresence } from '@/domain/entities/Presence';
import type { Role } from '@/domain/entities/Role';
import type { User } from '@/domain/entities/User';
import type { Snowflake } from '@/domain/value-objects/Snowflake';
import type { EmojiRecord } from '@/infrastructure/cache/records/EmojiRecord';
import type { MemberRecord } from '@/infrastructure/cache/records/MemberRecord';
import type { VoiceStateRecord } from '@/infrastructure/cache/records/VoiceStateRecord';
import type { UserStore } from '@/infrastructure/cache/stores/UserStore';
import { UnavailableGuildError } from '@/shared/errors/domain.errors';
import type { UpdateResult } from '@/shared/types/cache';

export class GuildRecord {
  public guild: Guild | undefined = undefined;

  /** `undefined` mientras no se sepa nada del servidor. */
  public isAvailable: boolean | undefined = undefined;

  public readonly members = new Map<Snowflake, MemberRecord>();

  public readonly roles = new Map<Snowflake, Role>();

  public readonly emojis = new Map<Snowflake, EmojiRecord>();

  public readonly channels = new Map<Snowflake, GuildChannel>();

  public readonly voiceStates = new Map<Snowflake, VoiceStateRecord>();

  public readonly presences = new Map<Snowflake, MemberPresence>();

  /** Referencias a usuarios compartidos que mantiene este registro. */
  public userReferences = 0;

  public hasOwnedEntries(): boolean {
    return (
      this.members.size > 0 ||
      this.roles.size > 0 ||
      this.emojis.size > 0 ||
      this.channels.size > 0 ||
      this.voiceStates.size > 0 ||
      this.presences.size > 0
    );
  }

  public isRemovable(): boolean {
    return (
      this.guild === undefined &&
      this.isAvailable === undefined &&
      this.userReferences === 0 &&
      !this.hasOwnedEntries()
    );
  }
}

type OwnedKind = 'roles' | 'emojis' | 'channels';

export class GuildRecordStore {
  private readonly records = new Map<Snowflake, GuildRecord>();

  // id de rol/emoji/canal -> id del servidor propietario
  private readonly owners: Record<OwnedKind, Map<Snowflake, Snowflake>> = {
    roles: new Map(),
    emojis: new Map(),
    channels: new Map(),
  };

  public constructor(
    private readonly users: UserStore,
    private readonly logger: Logger,
  ) {}

  public get size(): number {
    return this.records.size;
  }

  public getRecord(guildId: Snowflake): GuildRecord | undefined {
    return this.records.get(guildId);
  }

  public getOrCreateRecord(guildId: Snowflake): GuildRecord {
    let record = this.records.get(guildId);
    if (!record) {
      record = new GuildRecord();
      this.records.set(guildId, record);
    }

    return record;
  }

  public recordIds(): Snowflake[] {
    return Array.from(this.records.keys());
  }

  public get(guildId: Snowflake): Guild | undefined {
    const record = this.records.get(guildId);
    if (!record) {
      return undefined;
    }

    if (record.isAvailable === false) {
      throw new UnavailableGuildError(guildId);
    }

    return record.guild;
  }

  public set(guild: Guild): void {
    const record = this.getOrCreateRecord(guild.id);
    record.guild = Object.freeze({ ...guild, features: Object.freeze([...guild.features]) });
    record.isAvailable = true;
  }

  public delete(guildId: Snowflake): Guild | undefined {
    const record = this.records.get(guildId);
    if (!record?.guild) {
      return undefined;
    }

    const guild = record.guild;
    record.guild = undefined;
    record.isAvailable = undefined;
    this.prune(guildId);

    return guild;
  }

  /** No lanza aunque el servidor estuviera marcado como no disponible. */
  public update(guild: Guild): UpdateResult<Guild> {
    const old = this.records.get(guild.id)?.guild;
    this.set(guild);

    return [old, this.get(guild.id)];
  }

  public view(): Collection<Snowflake, Guild> {
    const guilds = new Collection<Snowflake, Guild>();
    for (const [guildId, record] of this.records) {
      if (record.guild && record.isAvailable !== false) {
        guilds.set(guildId, record.guild);
      }
    }

    return guilds;
  }

  public clear(): Collection<Snowflake, Guild> {
    const cleared = new Collection<Snowflake, Guild>();
    for (const guildId of this.recordIds()) {
      const guild = this.delete(guildId);
      if (guild) {
        cleared.set(guildId, guild);
      }
    }

    return cleared;
  }

  public setAvailability(guildId: Snowflake, isAvailable: boolean): void {
    this.getOrCreateRecord(guildId).isAvailable = isAvailable;
    this.logger.debug({ guildId: guildId.toString(), isAvailable }, 'Disponibilidad de servidor actualizada.');
  }

  public setInitialUnavailable(guildIds: Iterable<Snowflake>): void {
    for (const guildId of guildIds) {
      this.getOrCreateRecord(guildId).isAvailable = false;
    }
  }

  public isAvailable(guildId: Snowflake): boolean | undefined {
    return this.records.get(guildId)?.isAvailable;
  }

  public unavailableIds(): Snowflake[] {
    return Array.from(this.records)
      .filter(([, record]) => record.isAvailable === false)
      .map(([guildId]) => guildId);
  }

  /**
   * Elimina el servidor junto con todo lo que posee y libera las referencias
   * a usuarios del registro. Se usa cuando la sesion abandona el servidor.
   */
  public purge(guildId: Snowflake): Guild | undefined {
    const record = this.records.get(guildId);
    if (!record) {
      return undefined;
    }

    for (const member of record.members.values()) {
      this.releaseUser(record, member.id);
    }

    for (const voiceState of record.voiceStates.values()) {
      this.releaseUser(record, voiceState.member.id);
    }

    for (const emoji of record.emojis.values()) {
      if (emoji.userId !== null) {
        this.releaseUser(record, emoji.userId);
      }
    }

    for (const kind of ['roles', 'emojis', 'channels'] as const) {
      for (const ownedId of record[kind].keys()) {
        this.owners[kind].delete(ownedId);
      }
    }

    this.records.delete(guildId);
    this.logger.debug(
      { guildId: guildId.toString(), members: record.members.size, channels: record.channels.size },
      'Servidor purgado de la cache.',
    );

    return record.guild;
  }

  public acquireUser(record: GuildRecord, user: User): void {
    this.users.acquire(user);
    record.userReferences += 1;
  }

  public releaseUser(record: GuildRecord, userId: Snowflake): void {
    record.userReferences -= 1;
    this.users.release(userId);
  }

  public ownerOf(kind: OwnedKind, ownedId: Snowflake): Snowflake | undefined {
    return this.owners[kind].get(ownedId);
  }

  public indexOwned(kind: OwnedKind, ownedId: Snowflake, guildId: Snowflake): void {
    this.owners[kind].set(ownedId, guildId);
  }

  public unindexOwned(kind: OwnedKind, ownedId: Snowflake): void {
    this.owners[kind].delete(ownedId);
  }

  /** Borra el registro si ya no contiene nada. */
  public prune(guildId: Snowflake): boolean {
    const record = this.records.get(guildId);
    if (!record?.isRemovable()) {
      return false;
    }

    this.records.delete(guildId);
    return true;
  }
}
