// ============================================================================
// RUTA: src/domain/entities/User.ts
// ============================================================================

import type { Snowflake } from '@/domain/value-objects/Snowflake';

export interface User {
  readonly id: Snowflake;
  readonly username: string;
  readonly discriminator: string;
  readonly globalName: string | null;
  readonly avatarHash: string | null;
  readonly isBot: boolean;
  readonly isSystem: boolean;
  readonly flags: number;
}

/** Usuario de la sesion actual (payload de READY / USER_UPDATE). */
export interface OwnUser extends User {
  readonly isMfaEnabled: boolean;
  readonly locale: string | null;
  readonly isVerified: boolean | null;
  readonly email: string | null;
  readonly premiumType: number | null;
}
