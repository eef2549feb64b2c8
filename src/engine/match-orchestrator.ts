import { logger, type ILogger } from '../config/logger';
import type { EngineConfig } from '../config/engine-config';
import type {
    CandidateProfile,
    Category,
    CategoryScores,
    MatchFlag,
    MatchResult,
    PositionProfile,
    ScreeningCandidate,
    ScreeningError,
    ScreeningOptions,
    ScreeningResult,
    ScreeningScore,
    Vector
} from '../types/matching';
import type { ScreeningDefaults } from '../types/config';
import { getMonotonicClock, type Clock } from '../utils/monotonic-clock';
import { CategoryEvaluationError, DimensionMismatchError } from './errors';
import { cosineSimilarity, isUsableVector } from './similarity';
import { matchSection } from './sectional-matcher';
import { matchExperience } from './experience-matcher';
import { matchCertifications, matchEducation } from './qualification-matcher';
import { calculatePenalties } from './penalty-engine';
import { aggregate } from './score-aggregator';
import { classify } from './grade-classifier';

export interface ScoredBatch {
    scores: ScreeningScore[];
    errors: ScreeningError[];
}

function compareIds(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Whole-profile similarity shared by both stages; null when either side has
 * no usable vector.
 */
export function profileSimilarity(position: Vector | undefined, candidate: Vector | undefined): number | null {
    if (!isUsableVector(position) || !isUsableVector(candidate)) {
        return null;
    }
    return cosineSimilarity(position, candidate);
}

/**
 * Score a slice of candidates against one position vector. Candidates whose
 * vector has the wrong dimension are reported instead of scored.
 */
export function scoreCandidates(positionVector: Vector | undefined, candidates: readonly ScreeningCandidate[]): ScoredBatch {
    const batch: ScoredBatch = { scores: [], errors: [] };

    for (const candidate of candidates) {
        try {
            batch.scores.push({
                candidateId: candidate.id,
                score: profileSimilarity(positionVector, candidate.vector) ?? 0
            });
        } catch (error) {
            if (!(error instanceof DimensionMismatchError)) {
                throw error;
            }
            batch.errors.push({
                candidateId: candidate.id,
                reason: 'dimension_mismatch',
                message: error.message
            });
        }
    }

    return batch;
}

/**
 * Merge scored batches into a ranked shortlist: score descending, then
 * candidate id ascending.
 */
export function rankScreening(
    positionId: string,
    batches: readonly ScoredBatch[],
    options: ScreeningOptions,
    defaults: ScreeningDefaults
): ScreeningResult {
    const limit = options.limit ?? defaults.limit;
    const minSimilarity = options.minSimilarity ?? defaults.minSimilarity;
    const nearMissMargin = options.nearMissMargin ?? defaults.nearMissMargin;

    const scores = batches
        .flatMap((batch) => batch.scores)
        .sort((a, b) => b.score - a.score || compareIds(a.candidateId, b.candidateId));
    const errors = batches
        .flatMap((batch) => batch.errors)
        .sort((a, b) => compareIds(a.candidateId, b.candidateId));

    return {
        positionId,
        shortlist: scores.filter((entry) => entry.score >= minSimilarity).slice(0, limit),
        nearMisses: scores
            .filter((entry) => entry.score < minSimilarity && entry.score >= minSimilarity - nearMissMargin)
            .slice(0, limit),
        errors,
        totalCandidates: scores.length + errors.length
    };
}

function evaluateCategory<T>(category: Category, evaluate: () => T): T {
    try {
        return evaluate();
    } catch (error) {
        if (error instanceof DimensionMismatchError) {
            throw new CategoryEvaluationError(category, error);
        }
        throw error;
    }
}

/**
 * Match Orchestrator
 *
 * Two independent entry points over the same primitives:
 * - screen: one whole-profile similarity per candidate, ranked
 * - evaluate: full sectional breakdown for one pair
 *
 * Neither keeps state between calls; the configuration snapshot is passed in.
 */
export class MatchOrchestrator {
    constructor(
        private logger: ILogger,
        private clock: Clock
    ) { }

    /**
     * Factory method for production use
     */
    static create(): MatchOrchestrator {
        return new MatchOrchestrator(logger, getMonotonicClock());
    }

    /**
     * Fast stage: rank candidates by whole-profile similarity.
     */
    screen(
        position: PositionProfile,
        candidates: readonly ScreeningCandidate[],
        config: EngineConfig,
        options: ScreeningOptions = {}
    ): ScreeningResult {
        const batch = scoreCandidates(position.vectors.overall, candidates);
        const result = rankScreening(position.id, [batch], options, config.screening);

        this.logger.info({
            positionId: position.id,
            totalCandidates: result.totalCandidates,
            shortlisted: result.shortlist.length,
            nearMisses: result.nearMisses.length,
            errors: result.errors.length,
            configVersion: config.version
        }, 'Screening completed');

        return result;
    }

    /**
     * Detailed stage: explainable match result for one candidate/position pair.
     */
    evaluate(candidate: CandidateProfile, position: PositionProfile, config: EngineConfig): MatchResult {
        const { expander, resolver } = config;
        const sectionItems = (section: 'required' | 'preferred') =>
            position.requirements.filter((item) => item.priority === section);

        const required = evaluateCategory('required', () => matchSection('required', sectionItems('required'), candidate, {
            expander,
            resolver,
            rules: config.matching,
            sectionVector: position.vectors.required
        }));
        const preferred = evaluateCategory('preferred', () => matchSection('preferred', sectionItems('preferred'), candidate, {
            expander,
            resolver,
            rules: config.matching,
            sectionVector: position.vectors.preferred
        }));
        const experience = evaluateCategory('experience', () =>
            matchExperience(position.experience, candidate, config.experience, position.vectors.description));
        const overall = evaluateCategory('overall', () =>
            profileSimilarity(position.vectors.overall, candidate.vectors.overall));
        const education = matchEducation(position, candidate);
        const certification = matchCertifications(position, candidate, expander);

        const flags: MatchFlag[] = [];
        if (required.missingSection) {
            flags.push('required_section_missing');
        }
        if (preferred.missingSection) {
            flags.push('preferred_section_missing');
        }
        if (overall === null) {
            flags.push('overall_vector_missing');
        }
        if (education.requiredLevel !== null && education.requiredLevel !== 'none' && education.candidateLevel === null) {
            flags.push('education_missing');
        }
        if ([...required.items, ...preferred.items].some((item) => item.error === 'malformed_item')) {
            flags.push('malformed_items');
        }

        const penalties = calculatePenalties({
            experienceFlags: experience.flags,
            requiredItems: required.items,
            positionDomainTags: position.domainTags,
            candidateDomainTags: candidate.domainTags,
            positionRole: position.role,
            candidateRoles: candidate.roles
        }, config.penalties);

        const scores: Record<Category, number> = {
            required: required.score,
            preferred: preferred.score,
            experience: experience.score,
            overall: overall ?? 0,
            education: education.score,
            certification: certification.score
        };
        const { weights } = config;
        const categoryScores: CategoryScores = {
            required: { score: scores.required, weight: weights.required },
            preferred: { score: scores.preferred, weight: weights.preferred },
            experience: { score: scores.experience, weight: weights.experience },
            overall: { score: scores.overall, weight: weights.overall },
            education: { score: scores.education, weight: weights.education },
            certification: { score: scores.certification, weight: weights.certification }
        };

        const { percentage } = aggregate(scores, weights, penalties);
        const grade = classify(percentage, config.grades);

        this.logger.debug({
            candidateId: candidate.id,
            positionId: position.id,
            overallScore: percentage,
            grade,
            penalties: Object.keys(penalties),
            flags
        }, 'Match evaluated');

        return {
            candidateId: candidate.id,
            positionId: position.id,
            overallScore: percentage,
            grade,
            categoryScores,
            sections: { required, preferred },
            experience,
            education,
            certification,
            penalties,
            flags,
            configVersion: config.version,
            calculatedAt: this.clock.now()
        };
    }
}
