import type { Category, PenaltyMap } from '../types/matching';
import type { WeightConfig } from '../types/config';
import { totalPenalty } from './penalty-engine';

export const CATEGORY_ORDER: readonly Category[] = [
    'required',
    'preferred',
    'experience',
    'overall',
    'education',
    'certification'
];

export interface AggregateResult {
    weighted: number;
    penaltyTotal: number;
    overall: number;
    percentage: number;
}

export function toPercentage(overall: number): number {
    return Math.round(overall * 1000) / 10;
}

/**
 * Weighted sum over the categories in fixed order, minus penalties, clamped
 * to [0, 1] and reported as a one-decimal percentage.
 */
export function aggregate(
    scores: Readonly<Record<Category, number>>,
    weights: WeightConfig,
    penalties: PenaltyMap
): AggregateResult {
    let weighted = 0;
    for (const category of CATEGORY_ORDER) {
        weighted += weights[category] * scores[category];
    }

    const penaltyTotal = totalPenalty(penalties);
    const overall = Math.min(1, Math.max(0, weighted - penaltyTotal));

    return { weighted, penaltyTotal, overall, percentage: toPercentage(overall) };
}
