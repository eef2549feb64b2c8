import { config } from 'dotenv';
import type { CandidateProfile, PositionProfile } from '../src/types/matching';

// Load test environment variables
config({ path: '.env.test' });

// Read once by the env module on first use, so set before any test imports it
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.LOG_PRETTY = 'false';
process.env.ENGINE_CONFIG_DIR = './config';
process.env.ENGINE_PRESET = 'sectional-v2';
process.env.EMBEDDING_DIMENSION = '4';
process.env.SCREENING_CHUNK_SIZE = '2';
process.env.SCREENING_TIMEOUT_MS = '1000';

// Global test utilities
declare global {
    var testUtils: {
        axis: (index: number, dimension?: number) => number[];
        similarTo: (similarity: number, dimension?: number) => number[];
        makeCandidate: (overrides?: Partial<CandidateProfile>) => CandidateProfile;
        makePosition: (overrides?: Partial<PositionProfile>) => PositionProfile;
    };
}

const DIMENSION = 4;

globalThis.testUtils = {
    axis: (index: number, dimension: number = DIMENSION) =>
        Array.from({ length: dimension }, (_, i) => (i === index ? 1 : 0)),

    // Unit vector whose cosine similarity to axis(0) is `similarity`
    similarTo: (similarity: number, dimension: number = DIMENSION) =>
        Array.from({ length: dimension }, (_, i) => {
            if (i === 0) return similarity;
            if (i === 1) return Math.sqrt(1 - similarity * similarity);
            return 0;
        }),

    makeCandidate: (overrides: Partial<CandidateProfile> = {}) => ({
        id: 'cand-1',
        vectors: {},
        sentences: [],
        skills: [],
        experienceYears: 5,
        domainTags: [],
        ...overrides
    }),

    makePosition: (overrides: Partial<PositionProfile> = {}) => ({
        id: 'pos-1',
        vectors: {},
        requirements: [],
        experience: { minYears: 0 },
        domainTags: [],
        ...overrides
    })
};
