import type { GradeThreshold } from '../types/config';

/**
 * First band, highest minimum first, whose minimum the percentage reaches.
 * Bands are validated contiguous and exhaustive at configuration load.
 */
export function classify(percentage: number, thresholds: readonly GradeThreshold[]): string {
    const score = percentage / 100;
    for (const band of thresholds) {
        if (score >= band.min) {
            return band.grade;
        }
    }
    return thresholds[thresholds.length - 1]?.grade ?? 'unknown';
}
