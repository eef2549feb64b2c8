import type { Vector } from '../types/matching';
import { DimensionMismatchError } from './errors';

/**
 * Cosine similarity in [-1, 1].
 *
 * A zero-magnitude vector (absent content) yields 0 instead of NaN.
 */
export function cosineSimilarity(a: Vector, b: Vector): number {
    if (a.length !== b.length) {
        throw new DimensionMismatchError(a.length, b.length);
    }

    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }

    if (normA === 0 || normB === 0) {
        return 0;
    }

    const similarity = dot / Math.sqrt(normA * normB);
    // rounding can push |similarity| a hair past 1
    return Math.max(-1, Math.min(1, similarity));
}

/**
 * A vector is usable when it is non-empty and every component is finite.
 */
export function isUsableVector(vector: Vector | undefined): vector is Vector {
    return vector !== undefined && vector.length > 0 && vector.every(Number.isFinite);
}
