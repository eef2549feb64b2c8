import type {
    CandidateProfile,
    ExperienceFlag,
    ExperienceLevel,
    ExperienceResult,
    PositionProfile,
    Vector
} from '../types/matching';
import type { ExperienceRules } from '../types/config';
import { cosineSimilarity, isUsableVector } from './similarity';

export const LEVEL_ORDER: readonly ExperienceLevel[] = ['junior', 'mid', 'senior'];

/**
 * Tier for a number of years, from the configured level ranges.
 */
export function levelForYears(years: number, rules: ExperienceRules): ExperienceLevel {
    for (const level of LEVEL_ORDER) {
        const range = rules.levelRanges[level];
        if (years >= range.minYears && (range.maxYears === null || years < range.maxYears)) {
            return level;
        }
    }
    return 'junior';
}

function narrativeSimilarity(
    description: Vector | undefined,
    candidate: CandidateProfile,
    rules: ExperienceRules
): number | null {
    if (!isUsableVector(description)) {
        return null;
    }

    const { experience, projects } = candidate.vectors;
    const experienceSimilarity = isUsableVector(experience) ? cosineSimilarity(description, experience) : null;
    const projectsSimilarity = isUsableVector(projects) ? cosineSimilarity(description, projects) : null;

    if (experienceSimilarity !== null && projectsSimilarity !== null) {
        return experienceSimilarity * rules.narrativeWeights.experience
            + projectsSimilarity * rules.narrativeWeights.projects;
    }
    return experienceSimilarity ?? projectsSimilarity;
}

/**
 * Experience Matcher
 *
 * Scores years against the position minimum and checks the seniority tier.
 * Years above the maximum never reduce the score.
 */
export function matchExperience(
    required: PositionProfile['experience'],
    candidate: CandidateProfile,
    rules: ExperienceRules,
    descriptionVector?: Vector
): ExperienceResult {
    const years = Number.isFinite(candidate.experienceYears) ? Math.max(0, candidate.experienceYears) : 0;
    const minYears = Math.max(0, required.minYears);
    const flags: ExperienceFlag[] = [];
    let score = 1;

    if (minYears > 0 && years < minYears) {
        const shortfall = minYears - years;
        score = Math.max(0, score - shortfall / minYears);
        if (shortfall > rules.lackingRatio * minYears) {
            flags.push('significantly_lacking');
        }
    }

    const candidateLevel = candidate.level ?? levelForYears(years, rules);
    const requiredLevel = required.level ?? null;
    let levelDistance: number | null = null;

    if (requiredLevel !== null) {
        levelDistance = Math.abs(LEVEL_ORDER.indexOf(candidateLevel) - LEVEL_ORDER.indexOf(requiredLevel));
        if (levelDistance > 1) {
            flags.push('level_mismatch');
            score = Math.max(0, score - rules.levelMismatchReduction);
        }
    }

    return {
        score,
        flags,
        requiredMinYears: minYears,
        requiredMaxYears: required.maxYears ?? null,
        candidateYears: years,
        requiredLevel,
        candidateLevel,
        levelDistance,
        narrativeSimilarity: narrativeSimilarity(descriptionVector, candidate, rules)
    };
}
