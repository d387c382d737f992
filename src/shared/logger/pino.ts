// ============================================================================
// RUTA: src/shared/logger/pino.ts
// ============================================================================

import pinoLogger, { type Bindings, type Logger, type LoggerOptions } from 'pino';

import { env } from '@/shared/config/env';

const isDevelopment = env.NODE_ENV === 'development';

const options: LoggerOptions = {
  name: 'gateway-state-cache',
  level: env.LOG_LEVEL,
  base: {
    env: env.NODE_ENV,
  },
  // El usuario de la sesion trae el correo cuando el token tiene el scope.
  redact: {
    paths: ['email', '*.email'],
    censor: '[redactado]',
  },
};

if (isDevelopment) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
    },
  };
}

export const logger = pinoLogger(options);

export const createChildLogger = (bindings: Bindings): Logger => logger.child(bindings);
