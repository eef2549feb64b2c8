import type { Category, ExperienceLevel, PenaltyKind } from './matching';

/**
 * Engine configuration types
 *
 * Every table here is loaded once, validated, frozen and then only read.
 */

export type SynonymTable = Readonly<Record<string, readonly string[]>>;

export interface ConflictGroupEntry {
    default?: number;
    members: readonly string[];
}

export interface ThresholdTable {
    version: string;
    default: number;
    tokens: Readonly<Record<string, number>>;
    groups: Readonly<Record<string, ConflictGroupEntry>>;
}

export type WeightConfig = Readonly<Record<Category, number>>;

export interface GradeThreshold {
    grade: string;
    min: number;
}

export interface PenaltyRules {
    penalties: Readonly<Record<PenaltyKind, number>>;
    experiencePenaltyCap: number;
}

export interface MatchingRules {
    criticalWeight: number;
    nearMissMargin: number;
}

export interface LevelRange {
    minYears: number;
    maxYears: number | null;
}

export interface ExperienceRules {
    lackingRatio: number;
    levelMismatchReduction: number;
    levelRanges: Readonly<Record<ExperienceLevel, LevelRange>>;
    narrativeWeights: {
        experience: number;
        projects: number;
    };
}

export interface ScreeningDefaults {
    limit: number;
    minSimilarity: number;
    nearMissMargin: number;
}
