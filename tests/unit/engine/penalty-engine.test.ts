import { describe, it, expect, vi } from 'vitest';
import { calculatePenalties, totalPenalty, type PenaltyInput } from '../../../src/engine/penalty-engine';
import type { ItemMatch } from '../../../src/types/matching';
import type { PenaltyRules } from '../../../src/types/config';
import { testConfig } from '../../fixtures/engine-config';

// Mock the logger
vi.mock('../../../src/config/logger', () => ({
    logger: {
        info: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        debug: vi.fn()
    }
}));

const rules = testConfig().penalties;

function item(matched: boolean, critical = false): ItemMatch {
    return {
        itemId: 'r1',
        kind: 'skill',
        label: 'docker',
        critical,
        weight: critical ? 2 : 1,
        status: matched ? 'matched' : 'unmatched',
        matched,
        matchType: matched ? 'lexical' : 'none',
        similarity: matched ? 1 : 0,
        threshold: 0.6,
        token: 'docker',
        conflictGroup: null,
        matchedCandidateItemId: matched ? 's1' : null,
        vetoed: []
    };
}

function input(overrides: Partial<PenaltyInput> = {}): PenaltyInput {
    return {
        experienceFlags: [],
        requiredItems: [],
        positionDomainTags: [],
        candidateDomainTags: [],
        ...overrides
    };
}

describe('calculatePenalties', () => {
    it('should apply nothing when no rule is violated', () => {
        expect(calculatePenalties(input({ requiredItems: [item(true)] }), rules)).toEqual({});
    });

    describe('experience cap', () => {
        it('should scale both experience penalties down to the cap together', () => {
            const penalties = calculatePenalties(input({
                experienceFlags: ['level_mismatch', 'significantly_lacking']
            }), rules);

            const levelMismatch = penalties.experience_level_mismatch ?? 0;
            const lacking = penalties.experience_significantly_lacking ?? 0;
            expect(levelMismatch + lacking).toBeCloseTo(0.15, 10);
            expect(levelMismatch / lacking).toBeCloseTo(0.25 / 0.2, 10);
        });

        it('should cap a single experience penalty', () => {
            const penalties = calculatePenalties(input({ experienceFlags: ['level_mismatch'] }), rules);

            expect(penalties.experience_level_mismatch).toBeCloseTo(0.15, 10);
            expect(penalties.experience_significantly_lacking).toBeUndefined();
        });

        it('should leave penalties under the cap untouched', () => {
            const lenient: PenaltyRules = {
                ...rules,
                penalties: { ...rules.penalties, experience_level_mismatch: 0.05, experience_significantly_lacking: 0.04 }
            };

            const penalties = calculatePenalties(input({
                experienceFlags: ['level_mismatch', 'significantly_lacking']
            }), lenient);

            expect(penalties).toEqual({
                experience_level_mismatch: 0.05,
                experience_significantly_lacking: 0.04
            });
        });
    });

    describe('domain mismatch', () => {
        it('should apply when both sides have tags and share none', () => {
            const penalties = calculatePenalties(input({
                positionDomainTags: ['fintech'],
                candidateDomainTags: ['Healthcare']
            }), rules);

            expect(penalties).toEqual({ domain_mismatch: 0.2 });
        });

        it('should compare tags case-insensitively', () => {
            expect(calculatePenalties(input({
                positionDomainTags: ['FinTech'],
                candidateDomainTags: ['fintech', 'retail']
            }), rules)).toEqual({});
        });

        it('should not apply when the candidate has no tags', () => {
            expect(calculatePenalties(input({ positionDomainTags: ['fintech'] }), rules)).toEqual({});
        });
    });

    describe('role mismatch', () => {
        it('should apply when the candidate roles are known and exclude the position role', () => {
            expect(calculatePenalties(input({
                positionRole: 'Backend Engineer',
                candidateRoles: ['frontend engineer']
            }), rules)).toEqual({ role_mismatch: 0.15 });
        });

        it('should match roles by normalised name', () => {
            expect(calculatePenalties(input({
                positionRole: 'Backend Engineer',
                candidateRoles: ['backend  engineer']
            }), rules)).toEqual({});
        });

        it('should not apply when candidate roles are unknown', () => {
            expect(calculatePenalties(input({ positionRole: 'Backend Engineer' }), rules)).toEqual({});
        });
    });

    describe('required items', () => {
        it('should distinguish missing critical and non-critical items', () => {
            expect(calculatePenalties(input({ requiredItems: [item(true), item(false)] }), rules))
                .toEqual({ required_skill_missing: 0.15 });
            expect(calculatePenalties(input({ requiredItems: [item(true), item(false, true)] }), rules))
                .toEqual({ required_skill_critical_missing: 0.25 });
            expect(calculatePenalties(input({ requiredItems: [item(false), item(false, true)] }), rules))
                .toEqual({ required_skill_missing: 0.15, required_skill_critical_missing: 0.25 });
        });
    });
});

describe('totalPenalty', () => {
    it('should sum applied penalties', () => {
        expect(totalPenalty({ domain_mismatch: 0.2, role_mismatch: 0.15 })).toBeCloseTo(0.35, 10);
        expect(totalPenalty({})).toBe(0);
    });
});
