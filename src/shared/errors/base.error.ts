// ============================================================================
// RUTA: src/shared/errors/base.error.ts
// ============================================================================

export interface GatewayCacheErrorOptions {
  readonly code: string;
  readonly message: string;
  readonly cause?: unknown;
  readonly metadata?: Record<string, unknown>;
}

export class GatewayCacheError extends Error {
  public readonly code: string;

  public readonly metadata: Record<string, unknown>;

  public constructor(options: GatewayCacheErrorOptions) {
    super(options.message);
    this.name = 'GatewayCacheError';
    this.code = options.code;
    this.metadata = options.metadata ?? {};

    if (options.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace?.(this, GatewayCacheError);
  }
}

export const isGatewayCacheError = (value: unknown): value is GatewayCacheError =>
  value instanceof GatewayCacheError;
