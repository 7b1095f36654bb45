import winston from 'winston';
import { inspect } from 'node:util';

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message }) => `${timestamp} ${level}: ${message}`)
  ),
  transports: [new winston.transports.Console()],
});

function join(parts: unknown[]): string {
  return parts
    .map(p => (typeof p === 'string' ? p : p instanceof Error ? p.message : inspect(p, { depth: 3 })))
    .join(' ');
}

export const log = {
  debug: (...parts: unknown[]): void => { logger.debug(join(parts)); },
  info: (...parts: unknown[]): void => { logger.info(join(parts)); },
  warn: (...parts: unknown[]): void => { logger.warn(join(parts)); },
  error: (...parts: unknown[]): void => { logger.error(join(parts)); },
};
