import pino from 'pino';
import type { Logger } from 'pino';

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export function createLogger(name: string): Logger {
  return pino({
    name,
    level: resolveLevel(),
    transport:
      process.env.NODE_ENV === 'development'
        ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'HH:MM:ss' } }
        : undefined,
  });
}

export const logger = createLogger('helpdesk');
