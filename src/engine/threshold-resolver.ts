import type { SkillToken } from '../types/matching';
import type { ThresholdTable } from '../types/config';
import { normalizeToken, type SynonymExpander } from './synonym-expander';

export type ThresholdSource = 'token' | 'group' | 'default';

export interface ResolvedThreshold {
    readonly threshold: number;
    readonly conflictGroup: string | null;
    readonly source: ThresholdSource;
}

export interface Conflict {
    token: string;
    group: string;
}

/**
 * Threshold Resolver
 *
 * Per-token similarity thresholds and conflict-group membership, kept as a
 * single lookup table of tagged entries. Resolution order: token entry,
 * then group default, then the global default.
 */
export class ThresholdResolver {
    private readonly entries = new Map<string, ResolvedThreshold>();
    private readonly fallback: ResolvedThreshold;

    constructor(table: ThresholdTable) {
        this.fallback = { threshold: table.default, conflictGroup: null, source: 'default' };

        const membership = new Map<string, string>();
        for (const [group, entry] of Object.entries(table.groups)) {
            for (const member of entry.members) {
                membership.set(normalizeToken(member), group);
            }
        }

        for (const [rawToken, threshold] of Object.entries(table.tokens)) {
            const token = normalizeToken(rawToken);
            this.entries.set(token, {
                threshold,
                conflictGroup: membership.get(token) ?? null,
                source: 'token'
            });
        }

        for (const [token, group] of membership) {
            if (this.entries.has(token)) {
                continue;
            }
            const groupDefault = table.groups[group]?.default;
            this.entries.set(token, {
                threshold: groupDefault ?? table.default,
                conflictGroup: group,
                source: groupDefault === undefined ? 'default' : 'group'
            });
        }
    }

    get defaultThreshold(): number {
        return this.fallback.threshold;
    }

    resolve(canonical: string): ResolvedThreshold {
        return this.entries.get(normalizeToken(canonical)) ?? this.fallback;
    }

    /**
     * Conflict veto check for a requirement token against one candidate item.
     *
     * Returns the conflicting token when the item's dominant token sits in a
     * different conflict group and the item never names the requirement.
     * A candidate skill's own token, when it belongs to a group, is its
     * dominant token; otherwise the dominant token is detected in the text.
     */
    findConflict(
        requirement: SkillToken,
        candidateText: string,
        expander: SynonymExpander,
        candidateToken: string | null = null
    ): Conflict | null {
        const requirementGroup = this.resolve(requirement.canonical).conflictGroup;
        if (requirementGroup === null) {
            return null;
        }

        const ownGroup = candidateToken === null ? null : this.resolve(candidateToken).conflictGroup;
        const dominant = candidateToken !== null && ownGroup !== null
            ? normalizeToken(candidateToken)
            : expander.dominantToken(candidateText);
        if (dominant === null) {
            return null;
        }

        const candidateGroup = this.resolve(dominant).conflictGroup;
        if (candidateGroup === null || candidateGroup === requirementGroup) {
            return null;
        }

        if (expander.mentions(requirement, candidateText)) {
            return null;
        }

        return { token: dominant, group: candidateGroup };
    }
}
