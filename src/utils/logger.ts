import pino from 'pino';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'mb-vehicle-exporter' },
  redact: {
    paths: ['accessToken', 'refreshToken', 'clientSecret', '*.accessToken', '*.refreshToken'],
    censor: '[redacted]',
  },
});
