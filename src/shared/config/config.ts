import { ZodError } from 'zod';
import { validateEnv } from '../utils/validators';
import { logger } from '../utils/logger';

/**
 * Address client configuration
 */
export interface AddressClientConfig {
    env: 'development' | 'production' | 'test';
    logging: {
        level: 'debug' | 'info' | 'warn' | 'error' | 'silent';
    };
    addressApi: {
        baseUrl: string;
        timeoutMs: number;
    };
}

/**
 * Load and validate configuration from environment variables
 *
 * @param env - Environment to read, defaults to process.env
 * @throws {Error} If a variable is set to an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AddressClientConfig {
    try {
        const validated = validateEnv(env);

        return {
            env: validated.NODE_ENV,
            logging: {
                level: validated.LOG_LEVEL,
            },
            addressApi: {
                baseUrl: validated.ADDRESS_API_BASE_URL,
                timeoutMs: validated.ADDRESS_API_TIMEOUT_MS,
            },
        };
    } catch (error) {
        logger.error({
            event: 'config.invalid',
            issues: error instanceof ZodError ? error.issues : undefined,
        }, 'Failed to validate environment variables');
        throw new Error('Invalid environment configuration. Check ADDRESS_API_* variables.', { cause: error });
    }
}
