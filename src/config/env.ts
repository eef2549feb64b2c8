import { availableParallelism } from 'os';
import { config } from 'dotenv';
import { z } from 'zod';

config();

const booleanFlag = z.enum(['true', 'false']).transform((value) => value === 'true');

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    LOG_PRETTY: booleanFlag.default('true'),
    REDIS_URL: z.string().default('redis://localhost:6379'),

    // Matching engine
    ENGINE_CONFIG_DIR: z.string().default('./config'),
    ENGINE_PRESET: z.string().min(1).default('sectional-v2'),
    EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(768),

    // Screening worker pool
    SCREENING_CONCURRENCY: z.coerce.number().int().positive().default(availableParallelism()),
    SCREENING_CHUNK_SIZE: z.coerce.number().int().positive().default(500),
    SCREENING_TIMEOUT_MS: z.coerce.number().int().positive().default(30000)
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate environment variables.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const parsed = envSchema.safeParse(source);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid environment configuration: ${issues.join('; ')}`);
    }
    return parsed.data;
}

let env: Env | null = null;

export function getEnv(): Env {
    if (!env) {
        env = loadEnv();
    }
    return env;
}
