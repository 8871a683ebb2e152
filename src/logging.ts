import { pino, DestinationStream, LoggerOptions } from 'pino';

const REDACTED_FIELDS = [
  'req.headers.authorization',
  'req.headers["x-authorization"]',
  'headers.authorization',
  'headers["x-authorization"]',
  'token',
  'password',
  'secret.password',
];

export const loggerOptions = (level: string): LoggerOptions => ({
  level,
  redact: { paths: REDACTED_FIELDS, censor: '[redacted]' },
});

export const createLogger = (level: string, destination?: DestinationStream) => {
  return pino(loggerOptions(level), destination);
};
