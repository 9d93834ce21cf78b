import pino from 'pino';

export const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
export const LOG_ENABLED = process.env.LOG_ENABLED !== 'false';

/** Shared by the core, the scripts and Fastify's request logging */
export const logger = pino({
  name: 'coldstore-billing',
  level: LOG_LEVEL,
  enabled: LOG_ENABLED,
});
