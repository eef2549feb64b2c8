import type { SkillToken } from '../types/matching';
import type { SynonymTable } from '../types/config';

export interface TokenOccurrence {
    canonical: string;
    count: number;
    firstIndex: number;
}

interface TokenPattern {
    canonical: string;
    pattern: RegExp;
}

/**
 * Canonical identity of a token: trimmed, lower-cased, inner whitespace collapsed.
 */
export function normalizeToken(raw: string): string {
    return raw.trim().toLowerCase().replace(/\s+/g, ' ');
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Two-letter forms such as "go" or "js" read as ordinary words or file
 * suffixes in prose. They still expand, but free text is searched only for
 * the longer forms.
 */
function isTextForm(form: string): boolean {
    return !/^[a-z]{1,2}$/.test(form);
}

/**
 * Whole-token pattern over the text forms of a token, or null when it has
 * none. Longer forms come first so "node.js" wins over "node" at the same
 * position; a preceding dot does not start a token, so "node.js" never
 * mentions "js".
 */
function formsPattern(forms: readonly string[]): RegExp | null {
    const alternation = forms
        .filter(isTextForm)
        .sort((a, b) => b.length - a.length)
        .map(escapeRegExp)
        .join('|');
    if (alternation.length === 0) {
        return null;
    }
    return new RegExp(`(?<![a-z0-9.])(?:${alternation})(?![a-z0-9])`, 'g');
}

/**
 * Synonym Expander
 *
 * Maps raw skill mentions onto canonical tokens using a static
 * canonical → aliases table. Unknown tokens pass through unchanged.
 */
export class SynonymExpander {
    private readonly tokens = new Map<string, SkillToken>();
    private readonly aliasIndex = new Map<string, string>();
    private readonly patterns: TokenPattern[] = [];

    constructor(table: SynonymTable) {
        for (const [rawCanonical, rawAliases] of Object.entries(table)) {
            const canonical = normalizeToken(rawCanonical);
            const aliases = [...new Set(rawAliases.map(normalizeToken))]
                .filter((alias) => alias.length > 0 && alias !== canonical);

            this.tokens.set(canonical, Object.freeze({ canonical, aliases: Object.freeze(aliases) }));
            this.aliasIndex.set(canonical, canonical);
            const pattern = formsPattern([canonical, ...aliases]);
            if (pattern !== null) {
                this.patterns.push({ canonical, pattern });
            }
        }

        // canonical names take precedence over aliases
        for (const token of this.tokens.values()) {
            for (const alias of token.aliases) {
                if (!this.aliasIndex.has(alias)) {
                    this.aliasIndex.set(alias, token.canonical);
                }
            }
        }
    }

    get size(): number {
        return this.tokens.size;
    }

    isKnown(raw: string): boolean {
        return this.aliasIndex.has(normalizeToken(raw));
    }

    /**
     * Resolve a raw mention (canonical or alias, any case) to its SkillToken.
     */
    expand(raw: string): SkillToken {
        const normalized = normalizeToken(raw);
        const canonical = this.aliasIndex.get(normalized);
        const known = canonical === undefined ? undefined : this.tokens.get(canonical);
        return known ?? { canonical: normalized, aliases: [] };
    }

    /**
     * Known tokens mentioned in a text, ordered by first appearance.
     */
    detectTokens(text: string): TokenOccurrence[] {
        const haystack = text.toLowerCase();
        const occurrences: TokenOccurrence[] = [];

        for (const { canonical, pattern } of this.patterns) {
            let count = 0;
            let firstIndex = -1;
            for (const match of haystack.matchAll(pattern)) {
                if (firstIndex < 0) {
                    firstIndex = match.index ?? 0;
                }
                count++;
            }
            if (count > 0) {
                occurrences.push({ canonical, count, firstIndex });
            }
        }

        return occurrences.sort((a, b) => a.firstIndex - b.firstIndex);
    }

    /**
     * The token mentioned most often; ties go to the earliest mention.
     */
    dominantToken(text: string): string | null {
        let dominant: TokenOccurrence | null = null;
        for (const occurrence of this.detectTokens(text)) {
            if (dominant === null || occurrence.count > dominant.count) {
                dominant = occurrence;
            }
        }
        return dominant?.canonical ?? null;
    }

    /**
     * Whether a text mentions the token by its canonical name or any alias.
     */
    mentions(token: SkillToken, text: string): boolean {
        if (token.canonical.length === 0) {
            return false;
        }
        const pattern = formsPattern([token.canonical, ...token.aliases]);
        return pattern !== null && pattern.test(text.toLowerCase());
    }
}
