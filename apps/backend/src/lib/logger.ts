import pino from 'pino';
import { env, type EnvConfig } from '../config/env.js';

/**
 * Logger utilities for the clusterview backend.
 *
 * **Usage:**
 *
 * ```typescript
 * import { logger } from './lib/logger.js';
 *
 * logger.info({ port }, 'Server listening');
 *
 * // Scope entries to a component
 * const registryLogger = logger.child({ component: 'module-registry' });
 * ```
 */

/**
 * Resolve the log level for a configuration.
 *
 * An explicit `LOG_LEVEL` always wins. Otherwise production logs `info` and
 * above, tests are silent and development logs everything from `debug`.
 */
export function resolveLogLevel(config: Pick<EnvConfig, 'NODE_ENV' | 'LOG_LEVEL'>): pino.LevelWithSilent {
    if (config.LOG_LEVEL) {
        return config.LOG_LEVEL;
    }

    switch (config.NODE_ENV) {
        case 'production':
            return 'info';
        case 'test':
            return 'silent';
        default:
            return 'debug';
    }
}

/**
 * Creates a Pino logger instance with the standard backend configuration.
 *
 * **Output:**
 *
 * - Development: `pino-pretty` to stdout with colorized, human-readable lines
 * - Production and test: newline-delimited JSON to stdout
 *
 * @param config - Environment to configure from, defaults to the process environment
 * @returns Configured Pino logger instance
 */
export function createLogger(config: Pick<EnvConfig, 'NODE_ENV' | 'LOG_LEVEL'> = env): pino.Logger {
    const level = resolveLogLevel(config);
    const options: pino.LoggerOptions = {
        level,
        base: {
            service: 'clusterview-backend'
        }
    };

    if (config.NODE_ENV !== 'development') {
        return pino(options);
    }

    const transport = pino.transport({
        target: 'pino-pretty',
        options: {
            colorize: true,
            singleLine: false,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname'
        }
    });

    return pino(options, transport);
}

/**
 * Application logger singleton.
 *
 * @example
 * import { logger } from './lib/logger.js';
 * logger.info('Server started');
 * logger.error({ error }, 'Failed to list namespaces');
 */
export const logger = createLogger();
