import { z } from 'zod';

/**
 * Environment variables validation schema
 */
export const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

    // Géoplateforme geocoding service
    ADDRESS_API_BASE_URL: z.string().url('Invalid address API base URL').default('https://data.geopf.fr/geocodage'),
    ADDRESS_API_TIMEOUT_MS: z
        .string()
        .default('10000')
        .transform(Number)
        .pipe(z.number().int().positive()),
});

/**
 * Validate environment variables
 */
export function validateEnv(env: NodeJS.ProcessEnv) {
    return envSchema.parse(env);
}

/**
 * Type exports for validated data
 */
export type ValidatedEnv = z.infer<typeof envSchema>;
