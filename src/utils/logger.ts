// Structured logging shared by the engine, registry, poller and API

import { createLogger, format, transports, type Logger } from 'winston';

export function createEngineLogger(level: string = 'info'): Logger {
  return createLogger({
    level,
    format: format.combine(
      format.timestamp(),
      format.errors({ stack: true }),
      format.json()
    ),
    transports: [
      new transports.Console({
        format: format.combine(
          format.colorize(),
          format.printf(({ timestamp, level, message, ...meta }) => {
            const metaStr = Object.keys(meta).length > 0
              ? ` ${JSON.stringify(meta, bigintReplacer)}`
              : '';
            return `${timestamp} [${level}] ${message}${metaStr}`;
          })
        )
      })
    ]
  });
}

/**
 * JSON.stringify replacer rendering bigints as decimal strings
 */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

// Singleton instance
export const logger = createEngineLogger(process.env.LOG_LEVEL || 'info');
