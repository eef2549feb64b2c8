import type {
    CandidateProfile,
    CandidateSkill,
    ItemMatch,
    RequirementItem,
    RequirementPriority,
    SectionResult,
    SkillToken,
    Vector,
    VetoRecord
} from '../types/matching';
import type { MatchingRules } from '../types/config';
import { cosineSimilarity, isUsableVector } from './similarity';
import type { SynonymExpander } from './synonym-expander';
import type { ThresholdResolver } from './threshold-resolver';

export interface SectionContext {
    expander: SynonymExpander;
    resolver: ThresholdResolver;
    rules: MatchingRules;
    /** Position-side section vector, compared with the candidate's skills vector. */
    sectionVector?: Vector;
}

interface PoolEntry {
    id: string;
    text: string;
    vector: Vector;
    /** Canonical token of a candidate skill; null for sentences. */
    token: string | null;
}

interface Alignment {
    match: (PoolEntry & { similarity: number }) | null;
    bestSimilarity: number | null;
    vetoed: VetoRecord[];
}

function compareIds(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

function isBlank(value: string | undefined): boolean {
    return value === undefined || value.trim().length === 0;
}

function isMalformed(item: RequirementItem): boolean {
    if (!isUsableVector(item.vector)) {
        return true;
    }
    return item.kind === 'skill' ? isBlank(item.token) : isBlank(item.text);
}

/**
 * Walk the pool in descending similarity, vetoing conflicting items, until
 * one clears the threshold or the pool drops below it.
 */
function align(
    vector: Vector,
    pool: PoolEntry[],
    token: SkillToken | null,
    threshold: number,
    context: SectionContext
): Alignment {
    const ranked = pool
        .map((entry) => ({ ...entry, similarity: cosineSimilarity(vector, entry.vector) }))
        .sort((a, b) => b.similarity - a.similarity || compareIds(a.id, b.id));

    const vetoed: VetoRecord[] = [];
    for (const entry of ranked) {
        if (entry.similarity < threshold) {
            return { match: null, bestSimilarity: entry.similarity, vetoed };
        }

        const conflict = token === null
            ? null
            : context.resolver.findConflict(token, entry.text, context.expander, entry.token);
        if (conflict !== null) {
            vetoed.push({
                candidateItemId: entry.id,
                candidateToken: conflict.token,
                candidateGroup: conflict.group,
                similarity: entry.similarity
            });
            continue;
        }

        return { match: entry, bestSimilarity: entry.similarity, vetoed };
    }

    return { match: null, bestSimilarity: null, vetoed };
}

function usableSkills(candidate: CandidateProfile): CandidateSkill[] {
    return candidate.skills.filter((skill) => !isBlank(skill.token) && isUsableVector(skill.vector));
}

function sentencePool(candidate: CandidateProfile): PoolEntry[] {
    return candidate.sentences
        .filter((sentence) => !isBlank(sentence.text) && isUsableVector(sentence.vector))
        .map((sentence) => ({ id: sentence.id, text: sentence.text, vector: sentence.vector, token: null }));
}

/**
 * Sectional Matcher
 *
 * Scores one requirement section (required or preferred) against a
 * candidate's skills and narrative sentences.
 *
 * - Skill items match lexically first, then semantically against the
 *   context vector of each candidate skill.
 * - Sentence items align to the best candidate sentence.
 * - Both use the resolved per-token threshold and the conflict veto.
 */
export function matchSection(
    section: RequirementPriority,
    items: RequirementItem[],
    candidate: CandidateProfile,
    context: SectionContext
): SectionResult {
    const { expander, resolver, rules } = context;
    const skills = usableSkills(candidate);
    const skillEntries: PoolEntry[] = skills.map((skill) => ({
        id: skill.id,
        text: isBlank(skill.text) ? skill.token : skill.text,
        vector: skill.vector,
        token: expander.expand(skill.token).canonical
    }));
    const sentences = sentencePool(candidate);
    const poolFor = (item: RequirementItem): PoolEntry[] => (item.kind === 'skill' ? skillEntries : sentences);
    // skill items draw only on skills and sentence items only on sentences
    const missingSection = items.some((item) => !isMalformed(item) && poolFor(item).length === 0);

    const results = items.map((item): ItemMatch => {
        const critical = section === 'required' && item.critical === true;
        const base = {
            itemId: item.id,
            kind: item.kind,
            label: item.kind === 'skill' ? item.token : item.text,
            critical,
            weight: critical ? rules.criticalWeight : 1
        };

        if (isMalformed(item)) {
            return {
                ...base,
                status: 'unmatched',
                matched: false,
                matchType: 'none',
                similarity: 0,
                threshold: resolver.defaultThreshold,
                token: null,
                conflictGroup: null,
                matchedCandidateItemId: null,
                vetoed: [],
                error: 'malformed_item'
            };
        }

        let token: SkillToken | null;
        if (item.kind === 'skill') {
            token = expander.expand(item.token);
        } else {
            const dominant = expander.dominantToken(item.text);
            token = dominant === null ? null : expander.expand(dominant);
        }
        const resolved = token === null ? null : resolver.resolve(token.canonical);
        const threshold = resolved?.threshold ?? resolver.defaultThreshold;
        const conflictGroup = resolved?.conflictGroup ?? null;

        if (token !== null && item.kind === 'skill') {
            const canonical = token.canonical;
            const lexical = skills.find((skill) => expander.expand(skill.token).canonical === canonical);
            if (lexical !== undefined) {
                return {
                    ...base,
                    status: 'matched',
                    matched: true,
                    matchType: 'lexical',
                    similarity: 1,
                    threshold,
                    token: canonical,
                    conflictGroup,
                    matchedCandidateItemId: lexical.id,
                    vetoed: []
                };
            }
        }

        const alignment = align(item.vector, poolFor(item), token, threshold, context);
        const similarity = alignment.match?.similarity ?? alignment.bestSimilarity ?? 0;

        if (alignment.match !== null) {
            return {
                ...base,
                status: 'matched',
                matched: true,
                matchType: 'semantic',
                similarity,
                threshold,
                token: token?.canonical ?? null,
                conflictGroup,
                matchedCandidateItemId: alignment.match.id,
                vetoed: alignment.vetoed
            };
        }

        const nearMiss = alignment.bestSimilarity !== null
            && alignment.bestSimilarity >= threshold - rules.nearMissMargin;

        return {
            ...base,
            status: nearMiss ? 'near_miss' : 'unmatched',
            matched: false,
            matchType: 'none',
            similarity,
            threshold,
            token: token?.canonical ?? null,
            conflictGroup,
            matchedCandidateItemId: null,
            vetoed: alignment.vetoed
        };
    });

    const totalWeight = results.reduce((sum, item) => sum + item.weight, 0);
    const matchedWeight = results
        .filter((item) => item.matched)
        .reduce((sum, item) => sum + item.weight, 0);

    const score = totalWeight === 0 ? 1 : matchedWeight / totalWeight;

    const skillsVector = candidate.vectors.skills;
    const narrativeSimilarity = isUsableVector(context.sectionVector) && isUsableVector(skillsVector)
        ? cosineSimilarity(context.sectionVector, skillsVector)
        : null;

    return {
        section,
        score,
        items: results,
        matched: results.filter((item) => item.status === 'matched').map((item) => item.label),
        missing: results.filter((item) => !item.matched).map((item) => item.label),
        nearMisses: results.filter((item) => item.status === 'near_miss').map((item) => item.label),
        missingSection,
        narrativeSimilarity
    };
}
