import pino, { type Logger, type LoggerOptions } from 'pino';

/**
 * Structured Logger using Pino
 *
 * Default sink for the notifier's operational messages (sync fallback,
 * delivery failures, shutdown). Hosts that already run pino can pass their
 * own instance through the `logger` option instead.
 *
 * **Configuration:**
 * - LOG_LEVEL: Set log level (error, warn, info, debug) - defaults to 'info'
 * - NODE_ENV: 'development' uses pretty-printing when pino-pretty is
 *   installed, anything else uses JSON
 *
 * **Usage:**
 * ```typescript
 * import { logger } from './shared/logger';
 *
 * logger.error({
 *   msg: 'Notice delivery failed',
 *   endpoint: 'https://errors.example.test/api/v3/projects/1/notices',
 *   error: error.message,
 * });
 * ```
 */

const PRETTY_TARGET = 'pino-pretty';

function isResolvable(moduleName: string): boolean {
  try {
    require.resolve(moduleName);
    return true;
  } catch {
    return false;
  }
}

/**
 * Options for the shared logger. Pretty-printing needs pino-pretty to be
 * installed next to the library; without it output stays JSON.
 */
export function createLoggerOptions(
  env: NodeJS.ProcessEnv = process.env,
  canResolve: (moduleName: string) => boolean = isResolvable
): LoggerOptions {
  const pretty = env.NODE_ENV === 'development' && canResolve(PRETTY_TARGET);

  return {
    name: 'faultline',
    level: env.LOG_LEVEL || 'info',
    transport: pretty
      ? {
          target: PRETTY_TARGET,
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

export const logger = pino(createLoggerOptions());

/**
 * The slice of a pino logger the notifier writes to.
 */
export type NotifierLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;
