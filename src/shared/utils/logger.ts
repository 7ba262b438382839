import pino from 'pino';

/**
 * Create a logger instance with appropriate configuration
 */
function createLogger() {
    const isDevelopment = process.env.NODE_ENV === 'development';
    const logLevel = process.env.LOG_LEVEL || 'info';

    const baseConfig = {
        level: logLevel,
        // Base fields for all logs
        base: {
            service: 'addresses-fr-client',
            env: process.env.NODE_ENV,
        },
        timestamp: pino.stdTimeFunctions.isoTime,
    };

    // Pretty output only in development
    if (isDevelopment) {
        return pino({
            ...baseConfig,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss Z',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    return pino(baseConfig);
}

/**
 * Global logger instance
 */
export const logger = createLogger();

/**
 * Log address lookup
 */
export function logAddressLookup(data: {
    endpoint: string;
    params: Record<string, unknown>;
    resultCount?: number;
    error?: string;
}) {
    if (data.error) {
        logger.error({
            event: 'address.lookup.failed',
            endpoint: data.endpoint,
            params: data.params,
            error: data.error,
        }, 'Failed to query address');
    } else {
        logger.debug({
            event: 'address.lookup.success',
            endpoint: data.endpoint,
            params: data.params,
            resultCount: data.resultCount,
        }, 'Address lookup completed');
    }
}
