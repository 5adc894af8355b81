/**
 * Structured Logging with Pino
 */

import { pino, destination, type Logger } from 'pino';
import { config } from '../config/index.js';

const loggerOptions = {
    level: config.logging.level,
};

let logger: Logger;

if (config.logging.pretty) {
    logger = pino({
        ...loggerOptions,
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
                destination: 2,
            },
        },
    });
} else {
    // stdout carries command output
    logger = pino(loggerOptions, destination(2));
}

export { logger };

/**
 * Create a child logger scoped to one module of the model layer
 */
export function createModuleLogger(module: string): Logger {
    return logger.child({ module });
}
