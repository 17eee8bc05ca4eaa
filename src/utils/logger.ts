import { createLogger, format, transports } from 'winston';

function safeStringify(obj: unknown): string {
  try {
    return JSON.stringify(obj);
  } catch {
    return '[unserializable]';
  }
}

/**
 * Single-line structured logger: `<timestamp> [LEVEL]: message {meta}`.
 */
export const logger = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: format.combine(
    format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
    format.errors({ stack: true }),
    format.metadata({ fillExcept: ['message', 'level', 'timestamp'] }),
    format.printf(({ timestamp, level, message, metadata }) => {
      const meta =
        metadata && typeof metadata === 'object' && Object.keys(metadata).length
          ? ` ${safeStringify(metadata)}`
          : '';
      return `${timestamp} [${level.toUpperCase()}]: ${message}${meta}`;
    })
  ),
  transports: [new transports.Console()],
  exitOnError: false,
});

export function setLogLevel(level: string): void {
  logger.level = level;
}

export default logger;
