// ============================================================================
// RUTA: src/infrastructure/cache/BoundedCache.ts
// ============================================================================

export type EvictionListener<K, V extends object> = (key: K, value: V) => void;

/**
 * Cache LRU de capacidad fija. El orden de insercion de `Map` marca la
 * antiguedad: leer o escribir una clave la mueve al final.
 */
export class BoundedCache<K, V extends object> {
  private readonly entries = new Map<K, V>();

  public constructor(
    public readonly capacity: number,
    private readonly onEvict?: EvictionListener<K, V>,
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`BoundedCache capacity must be a positive integer, got ${capacity}`);
    }
  }

  public get size(): number {
    return this.entries.size;
  }

  public has(key: K): boolean {
    return this.entries.has(key);
  }

  public get(key: K): V | undefined {
    const value = this.entries.get(key);
    if (value === undefined) {
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, value);

    return value;
  }

  public peek(key: K): V | undefined {
    return this.entries.get(key);
  }

  public set(key: K, value: V): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.capacity) {
      this.evictOldest();
    }

    this.entries.set(key, value);
  }

  public delete(key: K): V | undefined {
    const value = this.entries.get(key);
    if (value === undefined) {
      return undefined;
    }

    this.entries.delete(key);

    return value;
  }

  /** Vacia la cache sin avisar al listener; devuelve las entradas de la mas antigua a la mas reciente. */
  public clear(): Array<[K, V]> {
    const drained = Array.from(this.entries.entries());
    this.entries.clear();

    return drained;
  }

  public entriesSnapshot(): Array<[K, V]> {
    return Array.from(this.entries.entries());
  }

  private evictOldest(): void {
    const oldest = this.entries.entries().next();
    if (oldest.done) {
      return;
    }

    const [key, value] = oldest.value;
    this.entries.delete(key);
    this.onEvict?.(key, value);
  }
}
