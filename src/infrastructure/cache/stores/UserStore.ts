// ============================================================================
// RUTA: src/infrastructure/cache/stores/UserStore.ts
// ============================================================================

import type { Collection } from 'discord.js';
import type { Logger } from 'pino';

import type { User } from '@/domain/entities/User';
import type { Snowflake } from '@/domain/value-objects/Snowflake';
import type { UpdateResult } from '@/shared/types/cache';
import { snapshotOf } from '@/shared/utils/collections';

/**
 * Usuarios compartidos entre servidores, canales directos y mensajes.
 *
 * `set` y `delete` no tocan los contadores; solo `acquire` y `release` lo
 * hacen, y un usuario se elimina cuando su contador llega a cero.
 */
export class UserStore {
  private readonly users = new Map<Snowflake, User>();

  private readonly references = new Map<Snowflake, number>();

  public constructor(private readonly logger: Logger) {}

  public get size(): number {
    return this.users.size;
  }

  public get(userId: Snowflake): User | undefined {
    return this.users.get(userId);
  }

  public set(user: User): void {
    this.users.set(user.id, user);
  }

  public delete(userId: Snowflake): User | undefined {
    const user = this.users.get(userId);
    this.users.delete(userId);

    return user;
  }

  public update(user: User): UpdateResult<User> {
    const old = this.get(user.id);
    this.set(user);

    return [old, this.get(user.id)];
  }

  public view(): Collection<Snowflake, User> {
    return snapshotOf(this.users);
  }

  public clear(): Collection<Snowflake, User> {
    const cleared = this.view();
    this.users.clear();

    return cleared;
  }

  public referenceCount(userId: Snowflake): number {
    return this.references.get(userId) ?? 0;
  }

  /** Guarda (o reemplaza) el usuario y suma una referencia. */
  public acquire(user: User): void {
    this.users.set(user.id, user);
    this.references.set(user.id, this.referenceCount(user.id) + 1);
  }

  /** Resta una referencia; devuelve el usuario si fue expulsado por quedarse sin referencias. */
  public release(userId: Snowflake): User | undefined {
    const count = this.references.get(userId);
    if (count === undefined) {
      return undefined;
    }

    if (count > 1) {
      this.references.set(userId, count - 1);
      return undefined;
    }

    this.references.delete(userId);
    const evicted = this.delete(userId);
    this.logger.trace({ userId: userId.toString() }, 'Usuario sin referencias eliminado de la cache.');

    return evicted;
  }
}
