// ============================================================================
// RUTA: src/shared/utils/collections.ts
// ============================================================================

import { Collection } from 'discord.js';

/** Copia puntual de un mapa; la coleccion no sigue los cambios posteriores. */
export const snapshotOf = <K, V>(entries: Iterable<readonly [K, V]> | undefined): Collection<K, V> => {
  const snapshot = new Collection<K, V>();
  if (!entries) {
    return snapshot;
  }

  for (const [key, value] of entries) {
    snapshot.set(key, value);
  }

  return snapshot;
};
