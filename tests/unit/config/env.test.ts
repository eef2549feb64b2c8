import { describe, it, expect } from 'vitest';
import { availableParallelism } from 'os';
import { loadEnv } from '../../../src/config/env';

describe('loadEnv', () => {
    it('should apply defaults for an empty environment', () => {
        const env = loadEnv({});

        expect(env).toEqual({
            NODE_ENV: 'development',
            PORT: 3000,
            LOG_LEVEL: 'info',
            LOG_PRETTY: true,
            REDIS_URL: 'redis://localhost:6379',
            ENGINE_CONFIG_DIR: './config',
            ENGINE_PRESET: 'sectional-v2',
            EMBEDDING_DIMENSION: 768,
            SCREENING_CONCURRENCY: availableParallelism(),
            SCREENING_CHUNK_SIZE: 500,
            SCREENING_TIMEOUT_MS: 30000
        });
    });

    it('should coerce numeric and boolean variables', () => {
        const env = loadEnv({
            PORT: '8080',
            LOG_PRETTY: 'false',
            EMBEDDING_DIMENSION: '1536',
            SCREENING_CHUNK_SIZE: '10'
        });

        expect(env.PORT).toBe(8080);
        expect(env.LOG_PRETTY).toBe(false);
        expect(env.EMBEDDING_DIMENSION).toBe(1536);
        expect(env.SCREENING_CHUNK_SIZE).toBe(10);
    });

    it('should reject invalid values with the offending variable', () => {
        expect(() => loadEnv({ LOG_LEVEL: 'loud' }))
            .toThrow(/^Invalid environment configuration: LOG_LEVEL: /);
        expect(() => loadEnv({ EMBEDDING_DIMENSION: '-4' }))
            .toThrow('Invalid environment configuration: EMBEDDING_DIMENSION: Number must be greater than 0');
    });
});
