import pino from 'pino';
import { getEnv } from './env';

/**
 * Logger Interface
 *
 * Defines the contract for logging operations across the application.
 */
export interface ILogger {
    info(data: object, message: string): void;
    error(message: string, error?: unknown): void;
    warn(message: string, data?: object): void;
    debug(data: object, message: string): void;
}

const env = getEnv();

/**
 * Logger Configuration
 *
 * Structured JSON logger for the matching service. Pretty-printed for local
 * runs unless LOG_PRETTY=false.
 */
const pinoLogger = pino({
    level: env.LOG_LEVEL,
    transport: env.LOG_PRETTY
        ? {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
                singleLine: false
            }
        }
        : undefined,
    serializers: {
        req: pino.stdSerializers.req,
        res: pino.stdSerializers.res,
        err: pino.stdSerializers.err
    }
});

/**
 * Process-wide logger behind the ILogger contract.
 */
export const logger: ILogger = {
    info: (data, message) => pinoLogger.info(data, message),
    error: (message, error) => pinoLogger.error({ err: error }, message),
    warn: (message, data) => pinoLogger.warn(data ?? {}, message),
    debug: (data, message) => pinoLogger.debug(data, message)
};
