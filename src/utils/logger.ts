import winston from 'winston';
import type { EnvConfig } from '../config/env';

const { combine, timestamp, errors, json, colorize, printf, splat } = winston.format;

const devFormat = printf(({ level, message, timestamp: ts, stack, ...meta }) => {
  const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${ts} ${level}: ${message}${stack ? `\n${stack}` : ''}${rest}`;
});

export const logger = winston.createLogger({
  level: 'info',
  silent: process.env.NODE_ENV === 'test',
  format: combine(errors({ stack: true }), splat(), timestamp(), json()),
  transports: [new winston.transports.Console()]
});

export function configureLogger(env: Pick<EnvConfig, 'LOG_LEVEL' | 'NODE_ENV'>): void {
  logger.level = env.LOG_LEVEL;

  if (env.NODE_ENV === 'development') {
    logger.format = combine(errors({ stack: true }), splat(), timestamp(), colorize(), devFormat);
  }
}
