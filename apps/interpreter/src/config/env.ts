import 'dotenv/config';
import { z } from 'zod';

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    // 'mongodb' tries the database first and falls back to memory; 'memory' never connects
    STORE_BACKEND: z.enum(['mongodb', 'memory']).default('mongodb'),
    MONGODB_URI: z.string().min(1, 'MONGODB_URI must not be empty').default('mongodb://localhost:27017/'),
    MONGODB_DATABASE: z.string().min(1, 'MONGODB_DATABASE must not be empty').default('blogdb'),
    MONGODB_SERVER_SELECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    LOG_FORMAT: z.enum(['pretty', 'json']).default('pretty')
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Thrown when the environment does not satisfy the schema.
 *
 * Carries zod's flattened field errors so the entry point can print them.
 */
export class EnvValidationError extends Error {
    constructor(public readonly fieldErrors: Record<string, string[] | undefined>) {
        super('Failed to parse environment variables');
        this.name = 'EnvValidationError';
    }
}

/**
 * Parse and validate interpreter configuration.
 *
 * @param source - Variables to read, `process.env` by default
 * @throws {EnvValidationError} When a variable has an invalid value
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
    const parsed = envSchema.safeParse(source);

    if (!parsed.success) {
        throw new EnvValidationError(parsed.error.flatten().fieldErrors);
    }

    return parsed.data;
}
