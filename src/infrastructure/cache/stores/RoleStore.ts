// ============================================================================
// RUTA: src/infrastructure/cache/stores/RoleStore.ts
// ============================================================================

import type { Collection } from 'discord.js';

import type { Role } from '@/domain/entities/Role';
import type { Snowflake } from '@/domain/value-objects/Snowflake';
import type { GuildRecordStore } from '@/infrastructure/cache/stores/GuildRecordStore';
import type { UpdateResult } from '@/shared/types/cache';
import { snapshotOf } from '@/shared/utils/collections';

export class RoleStore {
  public constructor(private readonly guilds: GuildRecordStore) {}

  public get(roleId: Snowflake): Role | undefined {
    const guildId = this.guilds.ownerOf('roles', roleId);
    if (guildId === undefined) {
      return undefined;
    }

    return this.guilds.getRecord(guildId)?.roles.get(roleId);
  }

  public view(guildId: Snowflake): Collection<Snowflake, Role> {
    return snapshotOf(this.guilds.getRecord(guildId)?.roles);
  }

  public set(role: Role): void {
    const previousOwner = this.guilds.ownerOf('roles', role.id);
    if (previousOwner !== undefined && previousOwner !== role.guildId) {
      this.delete(role.id);
    }

    this.guilds.getOrCreateRecord(role.guildId).roles.set(role.id, Object.freeze({ ...role }));
    this.guilds.indexOwned('roles', role.id, role.guildId);
  }

  public delete(roleId: Snowflake): Role | undefined {
    const guildId = this.guilds.ownerOf('roles', roleId);
    if (guildId === undefined) {
      return undefined;
    }

    this.guilds.unindexOwned('roles', roleId);
    const record = this.guilds.getRecord(guildId);
    const role = record?.roles.get(roleId);
    record?.roles.delete(roleId);
    this.guilds.prune(guildId);

    return role;
  }

  public update(role: Role): UpdateResult<Role> {
    const old = this.get(role.id);
    this.set(role);

    return [old, this.get(role.id)];
  }

  public clear(guildId: Snowflake): Collection<Snowflake, Role> {
    const cleared = this.view(guildId);
    for (const roleId of cleared.keys()) {
      this.delete(roleId);
    }

    return cleared;
  }
}
