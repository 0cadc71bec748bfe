import pino from 'pino';

/**
 * Logger Interface
 *
 * Contract every service receives through its constructor. Mirrors pino's
 * `(fields, message)` call shape so the shared pino instance satisfies it.
 */
export interface ILogger {
    info(data: Record<string, unknown>, message: string): void;
    error(data: Record<string, unknown>, message: string): void;
    warn(data: Record<string, unknown>, message: string): void;
    debug(data: Record<string, unknown>, message: string): void;
}

/**
 * Logger Configuration
 *
 * Structured JSON logger for the screening service: batch lifecycle,
 * stage execution, retries and HTTP activity.
 */
export const logger = pino({
    level: process.env.LOG_LEVEL || 'info',
    transport: {
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            singleLine: false
        }
    },
    serializers: {
        err: pino.stdSerializers.err
    }
});

/**
 * Error fields for structured log lines.
 */
export function errorFields(error: unknown): Record<string, unknown> {
    if (error instanceof Error) {
        return { error: error.message, errorName: error.name };
    }
    return { error: String(error) };
}
