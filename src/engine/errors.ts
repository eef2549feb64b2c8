import type { Category } from '../types/matching';

/**
 * Raised when two vectors of different length are compared.
 */
export class DimensionMismatchError extends Error {
    constructor(
        public readonly leftLength: number,
        public readonly rightLength: number
    ) {
        super(`Vector dimension mismatch: ${leftLength} vs ${rightLength}`);
        this.name = 'DimensionMismatchError';
    }
}

/**
 * Raised at configuration load; never surfaced per request.
 */
export class InvalidConfigurationError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid engine configuration: ${issues.join('; ')}`);
        this.name = 'InvalidConfigurationError';
    }
}

/**
 * Aborts a detailed evaluation when one category cannot be scored.
 */
export class CategoryEvaluationError extends Error {
    constructor(
        public readonly category: Category,
        public readonly original: Error
    ) {
        super(`Failed to evaluate '${category}' category: ${original.message}`);
        this.name = 'CategoryEvaluationError';
    }
}
