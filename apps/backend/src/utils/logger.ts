import type { LoggerService } from '@nestjs/common';
import path from 'path';
import winston from 'winston';

type LogMeta = Record<string, unknown>;

const transports: Array<winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance> = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    )
  })
];

if (process.env.LOG_DIR) {
  transports.push(
    new winston.transports.File({ filename: path.join(process.env.LOG_DIR, 'error.log'), level: 'error' }),
    new winston.transports.File({ filename: path.join(process.env.LOG_DIR, 'combined.log') })
  );
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports
});

function toMeta(value: unknown): LogMeta | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value instanceof Error) {
    return { error: value.message, stack: value.stack };
  }
  if (typeof value === 'object' && value !== null) {
    return { ...value };
  }
  return { detail: value };
}

/**
 * Context-bound logger. Doubles as the Nest application logger so framework
 * output goes through the same winston pipeline.
 */
export class Logger implements LoggerService {
  constructor(private readonly context: string = 'App') {}

  info(message: string, meta?: unknown): void {
    logger.info(message, { context: this.context, ...toMeta(meta) });
  }

  log(message: unknown, context?: string): void {
    logger.info(String(message), { context: context ?? this.context });
  }

  warn(message: unknown, meta?: unknown): void {
    logger.warn(String(message), { context: this.context, ...toMeta(meta) });
  }

  error(message: unknown, meta?: unknown): void {
    logger.error(String(message), { context: this.context, ...toMeta(meta) });
  }

  debug(message: unknown, meta?: unknown): void {
    logger.debug(String(message), { context: this.context, ...toMeta(meta) });
  }

  verbose(message: unknown, meta?: unknown): void {
    logger.verbose(String(message), { context: this.context, ...toMeta(meta) });
  }
}

export default logger;
