// ============================================================================
// RUTA: src/shared/types/cache.ts
// ============================================================================

/** Par `[antes, despues]` que devuelven las operaciones `update`. */
export type UpdateResult<T> = readonly [old: T | undefined, current: T | undefined];
