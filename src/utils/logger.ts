import pino from 'pino';
import { envConfig } from '@/config/env';

export const logger = pino({
  level: envConfig.LOG_LEVEL,
  base: { service: 'agent-runtime' },
  redact: [
    'req.headers.authorization',
    '*.apiKey',
    '*.token',
    'err.config.url',
    'err.config.headers',
    'err.config.params',
  ],
});

export type Logger = typeof logger;
