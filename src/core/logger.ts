import pino from 'pino';

import { env } from './config.js';

export const logger = pino({
  name: 'life-garden-bot',
  level: env.LOG_LEVEL,
});

export type Logger = typeof logger;
