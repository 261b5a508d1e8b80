import pino from 'pino';
import type { FastifyBaseLogger } from 'fastify';
import type { LogLevel } from './config';

export type Logger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export function createLogger(level: LogLevel) {
  return pino({
    level,
    base: { service: 'notes-translate-api' },
    redact: ['req.headers.authorization', 'req.headers.cookie', 'res.headers["set-cookie"]']
  });
}
