import type { ExperienceFlag, ItemMatch, PenaltyMap } from '../types/matching';
import type { PenaltyRules } from '../types/config';
import { normalizeToken } from './synonym-expander';

export interface PenaltyInput {
    experienceFlags: readonly ExperienceFlag[];
    requiredItems: readonly ItemMatch[];
    positionDomainTags: readonly string[];
    candidateDomainTags: readonly string[];
    positionRole?: string;
    candidateRoles?: readonly string[];
}

function normalizedSet(values: readonly string[]): Set<string> {
    return new Set(values.map(normalizeToken).filter((value) => value.length > 0));
}

/**
 * Penalty Engine
 *
 * Turns rule violations into score deductions. Experience-origin penalties
 * share a cap and are scaled down together when they exceed it.
 */
export function calculatePenalties(input: PenaltyInput, rules: PenaltyRules): PenaltyMap {
    const { penalties } = rules;
    const applied: PenaltyMap = {};

    if (input.experienceFlags.includes('level_mismatch')) {
        applied.experience_level_mismatch = penalties.experience_level_mismatch;
    }
    if (input.experienceFlags.includes('significantly_lacking')) {
        applied.experience_significantly_lacking = penalties.experience_significantly_lacking;
    }

    const experienceTotal = (applied.experience_level_mismatch ?? 0)
        + (applied.experience_significantly_lacking ?? 0);
    if (experienceTotal > rules.experiencePenaltyCap) {
        const factor = rules.experiencePenaltyCap / experienceTotal;
        if (applied.experience_level_mismatch !== undefined) {
            applied.experience_level_mismatch *= factor;
        }
        if (applied.experience_significantly_lacking !== undefined) {
            applied.experience_significantly_lacking *= factor;
        }
    }

    const positionDomains = normalizedSet(input.positionDomainTags);
    const candidateDomains = normalizedSet(input.candidateDomainTags);
    if (positionDomains.size > 0 && candidateDomains.size > 0
        && ![...positionDomains].some((tag) => candidateDomains.has(tag))) {
        applied.domain_mismatch = penalties.domain_mismatch;
    }

    if (input.positionRole !== undefined && input.candidateRoles !== undefined) {
        const role = normalizeToken(input.positionRole);
        const candidateRoles = normalizedSet(input.candidateRoles);
        if (role.length > 0 && candidateRoles.size > 0 && !candidateRoles.has(role)) {
            applied.role_mismatch = penalties.role_mismatch;
        }
    }

    const missing = input.requiredItems.filter((item) => !item.matched);
    if (missing.some((item) => !item.critical)) {
        applied.required_skill_missing = penalties.required_skill_missing;
    }
    if (missing.some((item) => item.critical)) {
        applied.required_skill_critical_missing = penalties.required_skill_critical_missing;
    }

    return applied;
}

export function totalPenalty(penalties: PenaltyMap): number {
    return Object.values(penalties).reduce((sum, value) => sum + (value ?? 0), 0);
}
