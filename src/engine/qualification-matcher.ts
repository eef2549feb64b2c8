import type {
    CandidateProfile,
    CertificationResult,
    EducationLevel,
    EducationResult,
    PositionProfile
} from '../types/matching';
import type { SynonymExpander } from './synonym-expander';

const EDUCATION_RANK: Readonly<Record<EducationLevel, number>> = {
    none: 0,
    high_school: 1,
    associate: 2,
    bachelor: 3,
    master: 4,
    doctorate: 5
};

/**
 * Ordinal comparison of education levels. No requirement scores 1; an
 * unknown candidate level scores 0.
 */
export function matchEducation(position: PositionProfile, candidate: CandidateProfile): EducationResult {
    const requiredLevel = position.education?.minimumLevel ?? null;
    const candidateLevel = candidate.educationLevel ?? null;

    if (requiredLevel === null || EDUCATION_RANK[requiredLevel] === 0) {
        return { score: 1, requiredLevel, candidateLevel };
    }
    if (candidateLevel === null) {
        return { score: 0, requiredLevel, candidateLevel };
    }

    const score = Math.min(1, EDUCATION_RANK[candidateLevel] / EDUCATION_RANK[requiredLevel]);
    return { score, requiredLevel, candidateLevel };
}

/**
 * Share of required certifications the candidate holds, compared by
 * canonical token.
 */
export function matchCertifications(
    position: PositionProfile,
    candidate: CandidateProfile,
    expander: SynonymExpander
): CertificationResult {
    const required = (position.certifications ?? []).filter((name) => name.trim().length > 0);
    if (required.length === 0) {
        return { score: 1, matched: [], missing: [] };
    }

    const held = new Set((candidate.certifications ?? []).map((name) => expander.expand(name).canonical));
    const matched = required.filter((name) => held.has(expander.expand(name).canonical));
    const missing = required.filter((name) => !held.has(expander.expand(name).canonical));

    return { score: matched.length / required.length, matched, missing };
}
