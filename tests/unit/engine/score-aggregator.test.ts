import { describe, it, expect, vi } from 'vitest';
import { aggregate, toPercentage, CATEGORY_ORDER } from '../../../src/engine/score-aggregator';
import type { Category } from '../../../src/types/matching';
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

function scores(values: Partial<Record<Category, number>>): Record<Category, number> {
    return {
        required: 0,
        preferred: 0,
        experience: 0,
        overall: 0,
        education: 0,
        certification: 0,
        ...values
    };
}

describe('aggregate', () => {
    const even = testConfig('even').weights;
    const standard = testConfig('standard').weights;

    it('should combine category scores by weight', () => {
        const result = aggregate(
            scores({ required: 0.9, preferred: 0.5, experience: 0.8, overall: 0.7, education: 1, certification: 1 }),
            even,
            {}
        );

        expect(result.weighted).toBeCloseTo(0.79, 10);
        expect(result.overall).toBeCloseTo(0.79, 10);
        expect(result.percentage).toBe(79);
    });

    it('should subtract penalties from the weighted score', () => {
        const result = aggregate(
            scores({ required: 0.9, preferred: 0.5, experience: 0.8, overall: 0.7 }),
            even,
            { domain_mismatch: 0.2 }
        );

        expect(result.penaltyTotal).toBeCloseTo(0.2, 10);
        expect(result.percentage).toBe(59);
    });

    it('should clamp at 0 when penalties exceed the weighted score', () => {
        const result = aggregate(
            scores({ required: 0.2 }),
            even,
            { required_skill_critical_missing: 0.25, domain_mismatch: 0.2 }
        );

        expect(result.overall).toBe(0);
        expect(result.percentage).toBe(0);
    });

    it('should clamp a negative overall similarity', () => {
        const result = aggregate(scores({ overall: -0.5 }), even, {});

        expect(result.overall).toBe(0);
    });

    it('should report 100 when every category is perfect', () => {
        const perfect = scores({ required: 1, preferred: 1, experience: 1, overall: 1, education: 1, certification: 1 });

        expect(aggregate(perfect, standard, {}).percentage).toBe(100);
    });

    it('should move monotonically toward the category that gains weight', () => {
        const values = scores({ required: 0.9, preferred: 0.5, experience: 0.8, overall: 0.7 });
        const shifts = [0, 0.05, 0.1, 0.15, 0.2];

        const towardRequired = shifts.map((shift) =>
            aggregate(values, { ...even, required: even.required + shift, preferred: even.preferred - shift }, {}).overall);
        const towardPreferred = shifts.map((shift) =>
            aggregate(values, { ...even, required: even.required - shift, preferred: even.preferred + shift }, {}).overall);

        for (let i = 1; i < shifts.length; i++) {
            expect(towardRequired[i]).toBeGreaterThan(towardRequired[i - 1]);
            expect(Math.abs(0.9 - towardRequired[i])).toBeLessThan(Math.abs(0.9 - towardRequired[i - 1]));
            expect(towardPreferred[i]).toBeLessThan(towardPreferred[i - 1]);
            expect(Math.abs(0.5 - towardPreferred[i])).toBeLessThan(Math.abs(0.5 - towardPreferred[i - 1]));
        }
        expect(towardRequired[shifts.length - 1]).toBeCloseTo(0.87, 10);
        expect(towardPreferred[shifts.length - 1]).toBeCloseTo(0.71, 10);
    });

    it('should stay between the lowest and highest category score without penalties', () => {
        const cases = [
            scores({ required: 0.2, preferred: 0.9, experience: 0.4, overall: 0.6, education: 0.3, certification: 0.7 }),
            scores({ required: 0.55, preferred: 0.55, experience: 0.55, overall: 0.55, education: 0.55, certification: 0.55 }),
            scores({ required: 1, preferred: 0.1, experience: 0.75, overall: 0.35, education: 0.5, certification: 0.25 })
        ];

        for (const values of cases) {
            const all = CATEGORY_ORDER.map((category) => values[category]);
            const { overall } = aggregate(values, standard, {});
            expect(overall).toBeGreaterThanOrEqual(Math.min(...all) - 1e-12);
            expect(overall).toBeLessThanOrEqual(Math.max(...all) + 1e-12);
        }
    });
});

describe('toPercentage', () => {
    it('should round to one decimal', () => {
        expect(toPercentage(0.81449)).toBe(81.4);
        expect(toPercentage(0.8156)).toBe(81.6);
        expect(toPercentage(0)).toBe(0);
    });
});
