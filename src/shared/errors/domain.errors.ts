// ============================================================================
// RUTA: src/shared/errors/domain.errors.ts
// ============================================================================

import { GatewayCacheError } from '@/shared/errors/base.error';

export class UnavailableGuildError extends GatewayCacheError {
  public readonly guildId: bigint;

  public constructor(guildId: bigint) {
    super({
      code: 'GUILD_UNAVAILABLE',
      message: `El servidor ${guildId.toString()} no esta disponible en este momento.`,
      metadata: { guildId: guildId.toString() },
    });
    this.name = 'UnavailableGuildError';
    this.guildId = guildId;
  }
}

export class InvalidSnowflakeError extends GatewayCacheError {
  public constructor(value: unknown) {
    super({
      code: 'INVALID_SNOWFLAKE',
      message: 'El identificador de Discord proporcionado no es valido.',
      metadata: { value: typeof value === 'bigint' ? value.toString() : value },
    });
    this.name = 'InvalidSnowflakeError';
  }
}

export class ValidationFailedError extends GatewayCacheError {
  public constructor(details: Record<string, unknown>) {
    super({
      code: 'VALIDATION_FAILED',
      message: 'Los datos proporcionados no son validos.',
      metadata: details,
    });
    this.name = 'ValidationFailedError';
  }
}

export class PayloadDecodeError extends GatewayCacheError {
  public constructor(entity: string, reason: string, cause?: unknown) {
    super({
      code: 'PAYLOAD_DECODE_FAILED',
      message: `No se pudo decodificar ${entity}: ${reason}`,
      metadata: { entity, reason },
      cause,
    });
    this.name = 'PayloadDecodeError';
  }
}
