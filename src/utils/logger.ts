import { pino } from 'pino';

/** Shared logger; level comes from `LOG_LEVEL`. */
export const logger = pino({
  name: 'marketpay-client',
  level: process.env.LOG_LEVEL || 'info',
  redact: {
    paths: ['headers.authorization', 'headers.Authorization', '*.token'],
    censor: '[REDACTED]',
  },
});
