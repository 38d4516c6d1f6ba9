import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

/**
 * Known pino level names pass through; anything else is 'silent'.
 */
export function resolveLogLevel(value: string | undefined): string {
  return value && Object.hasOwn(pino.levels.values, value) ? value : 'silent';
}

/**
 * SDK logger. Silent unless SOLAPI_LOG_LEVEL names a pino level.
 */
export const logger: Logger = pino({
  name: 'solapi',
  level: resolveLogLevel(process.env.SOLAPI_LOG_LEVEL),
});

/**
 * Create a child logger with additional context
 *
 * @example
 * const log = createLogger({ resource: 'storage' })
 * log.debug('uploading file')
 */
export function createLogger(context: Record<string, unknown>, parent: Logger = logger): Logger {
  return parent.child(context);
}
