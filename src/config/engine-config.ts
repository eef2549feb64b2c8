import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { logger, type ILogger } from './logger';
import { getEnv } from './env';
import { InvalidConfigurationError } from '../engine/errors';
import { SynonymExpander, normalizeToken } from '../engine/synonym-expander';
import { ThresholdResolver } from '../engine/threshold-resolver';
import type {
    ExperienceRules,
    GradeThreshold,
    MatchingRules,
    PenaltyRules,
    ScreeningDefaults,
    ThresholdTable,
    WeightConfig
} from '../types/config';

const unit = z.number().min(0).max(1);

const synonymsSchema = z.object({
    version: z.string().min(1),
    tokens: z.record(z.string(), z.array(z.string()))
});

const thresholdsSchema = z.object({
    version: z.string().min(1),
    default: unit,
    tokens: z.record(z.string(), unit),
    groups: z.record(z.string(), z.object({
        default: unit.optional(),
        members: z.array(z.string().min(1))
    }))
});

const levelRangeSchema = z.object({
    minYears: z.number().min(0),
    maxYears: z.number().positive().nullable()
});

const presetSchema = z.object({
    weights: z.object({
        required: z.number().min(0),
        preferred: z.number().min(0),
        experience: z.number().min(0),
        overall: z.number().min(0),
        education: z.number().min(0),
        certification: z.number().min(0)
    }),
    grades: z.array(z.object({ grade: z.string().min(1), min: unit })).min(1),
    penalties: z.object({
        experience_level_mismatch: unit,
        experience_significantly_lacking: unit,
        domain_mismatch: unit,
        role_mismatch: unit,
        required_skill_missing: unit,
        required_skill_critical_missing: unit
    }),
    experiencePenaltyCap: unit.default(0.15),
    matching: z.object({
        criticalWeight: z.number().positive().default(2),
        nearMissMargin: unit.default(0.05)
    }),
    experience: z.object({
        lackingRatio: unit.default(0.3),
        levelMismatchReduction: unit.default(0.3),
        levelRanges: z.object({
            junior: levelRangeSchema,
            mid: levelRangeSchema,
            senior: levelRangeSchema
        }),
        narrativeWeights: z.object({ experience: unit, projects: unit })
    }),
    screening: z.object({
        limit: z.number().int().positive().default(50),
        minSimilarity: z.number().min(-1).max(1).default(0.3),
        nearMissMargin: unit.default(0.05)
    })
});

const presetsSchema = z.object({
    version: z.string().min(1),
    presets: z.record(z.string(), presetSchema)
});

const WEIGHT_TOLERANCE = 1e-6;

export interface EngineConfigSources {
    synonyms: unknown;
    thresholds: unknown;
    presets: unknown;
}

/**
 * Immutable engine configuration snapshot.
 */
export interface EngineConfig {
    readonly version: string;
    readonly preset: string;
    readonly weights: WeightConfig;
    readonly grades: readonly GradeThreshold[];
    readonly penalties: PenaltyRules;
    readonly matching: MatchingRules;
    readonly experience: ExperienceRules;
    readonly screening: ScreeningDefaults;
    readonly thresholds: ThresholdTable;
    readonly expander: SynonymExpander;
    readonly resolver: ThresholdResolver;
}

function parseSource<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string): T {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
        throw new InvalidConfigurationError(
            parsed.error.issues.map((issue) => `${label}.${issue.path.join('.')}: ${issue.message}`)
        );
    }
    return parsed.data;
}

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        const children: unknown[] = Object.values(value);
        children.forEach(deepFreeze);
    }
    return value;
}

function checkWeights(weights: WeightConfig, issues: string[]): void {
    const sum = Object.values(weights).reduce((total, weight) => total + weight, 0);
    if (Math.abs(sum - 1) > WEIGHT_TOLERANCE) {
        issues.push(`weights must sum to 1, got ${sum}`);
    }
}

function checkGrades(grades: readonly GradeThreshold[], issues: string[]): void {
    for (let i = 1; i < grades.length; i++) {
        if (grades[i].min >= grades[i - 1].min) {
            issues.push(`grade '${grades[i].grade}' must have a lower minimum than '${grades[i - 1].grade}'`);
        }
    }
    const last = grades[grades.length - 1];
    if (last !== undefined && last.min !== 0) {
        issues.push(`lowest grade '${last.grade}' must have minimum 0`);
    }
}

function checkGroups(table: ThresholdTable, issues: string[]): void {
    const owner = new Map<string, string>();
    for (const [group, entry] of Object.entries(table.groups)) {
        for (const member of entry.members) {
            const token = normalizeToken(member);
            const existing = owner.get(token);
            if (existing !== undefined && existing !== group) {
                issues.push(`token '${token}' belongs to conflict groups '${existing}' and '${group}'`);
            }
            owner.set(token, group);
        }
    }
}

function checkSynonyms(tokens: Record<string, string[]>, issues: string[]): void {
    const canonicals = new Set(Object.keys(tokens).map(normalizeToken));
    const owner = new Map<string, string>();
    for (const [rawCanonical, aliases] of Object.entries(tokens)) {
        const canonical = normalizeToken(rawCanonical);
        for (const alias of aliases.map(normalizeToken)) {
            if (alias === canonical) {
                continue;
            }
            if (canonicals.has(alias)) {
                issues.push(`alias '${alias}' of '${canonical}' is itself a canonical token`);
            }
            const existing = owner.get(alias);
            if (existing !== undefined && existing !== canonical) {
                issues.push(`alias '${alias}' is claimed by '${existing}' and '${canonical}'`);
            }
            owner.set(alias, canonical);
        }
    }
}

function checkLevelRanges(rules: ExperienceRules, issues: string[]): void {
    for (const [level, range] of Object.entries(rules.levelRanges)) {
        if (range.maxYears !== null && range.maxYears <= range.minYears) {
            issues.push(`level '${level}' range must have maxYears above minYears`);
        }
    }
}

/**
 * Validate raw configuration tables and build a frozen snapshot for one preset.
 */
export function buildEngineConfig(sources: EngineConfigSources, preset: string): EngineConfig {
    const synonyms = parseSource(synonymsSchema, sources.synonyms, 'synonyms');
    const thresholds = parseSource(thresholdsSchema, sources.thresholds, 'thresholds');
    const presets = parseSource(presetsSchema, sources.presets, 'presets');

    const selected = presets.presets[preset];
    if (selected === undefined) {
        throw new InvalidConfigurationError([
            `unknown preset '${preset}', expected one of: ${Object.keys(presets.presets).join(', ')}`
        ]);
    }

    const issues: string[] = [];
    checkWeights(selected.weights, issues);
    checkGrades(selected.grades, issues);
    checkGroups(thresholds, issues);
    checkSynonyms(synonyms.tokens, issues);
    checkLevelRanges(selected.experience, issues);
    if (issues.length > 0) {
        throw new InvalidConfigurationError(issues);
    }

    const table = deepFreeze(thresholds);
    return Object.freeze({
        version: `${presets.version}/${preset}+${thresholds.version}+${synonyms.version}`,
        preset,
        weights: deepFreeze(selected.weights),
        grades: deepFreeze(selected.grades),
        penalties: deepFreeze({
            penalties: selected.penalties,
            experiencePenaltyCap: selected.experiencePenaltyCap
        }),
        matching: deepFreeze(selected.matching),
        experience: deepFreeze(selected.experience),
        screening: deepFreeze(selected.screening),
        thresholds: table,
        expander: new SynonymExpander(deepFreeze(synonyms.tokens)),
        resolver: new ThresholdResolver(table)
    });
}

function readJson(directory: string, file: string): unknown {
    const filePath = path.resolve(directory, file);
    try {
        const content: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
        return content;
    } catch (error) {
        throw new InvalidConfigurationError([
            `${file}: ${error instanceof Error ? error.message : 'unreadable'}`
        ]);
    }
}

/**
 * Load and validate the engine tables from a configuration directory.
 */
export function loadEngineConfig(directory: string, preset: string): EngineConfig {
    return buildEngineConfig({
        synonyms: readJson(directory, 'synonyms.json'),
        thresholds: readJson(directory, 'thresholds.json'),
        presets: readJson(directory, 'engine.presets.json')
    }, preset);
}

/**
 * Config Store
 *
 * Holds the current configuration snapshot. Reload builds a new snapshot and
 * swaps the reference; in-flight evaluations keep the one they started with.
 * A failed reload leaves the previous snapshot in place.
 */
export class ConfigStore {
    private current: EngineConfig;

    constructor(
        private readonly loader: () => EngineConfig,
        private readonly logger: ILogger
    ) {
        this.current = loader();
        this.logger.info({ version: this.current.version }, 'Engine configuration loaded');
    }

    /**
     * Factory method for production use
     */
    static create(): ConfigStore {
        const env = getEnv();
        return new ConfigStore(() => loadEngineConfig(env.ENGINE_CONFIG_DIR, env.ENGINE_PRESET), logger);
    }

    get(): EngineConfig {
        return this.current;
    }

    reload(): EngineConfig {
        try {
            const next = this.loader();
            this.current = next;
            this.logger.info({ version: next.version }, 'Engine configuration reloaded');
            return next;
        } catch (error) {
            this.logger.warn('Engine configuration reload rejected, keeping previous snapshot', {
                version: this.current.version,
                error: error instanceof Error ? error.message : 'Unknown error'
            });
            throw error;
        }
    }
}

// Singleton instance
let configStore: ConfigStore | null = null;

export function getConfigStore(): ConfigStore {
    if (!configStore) {
        configStore = ConfigStore.create();
    }
    return configStore;
}
