import { Router, Request, Response } from "express";
import { z } from "zod";
import { logger } from "../config/logger";
import { getEnv } from "../config/env";
import { getConfigStore } from "../config/engine-config";
import { CategoryEvaluationError } from "../engine/errors";
import { MatchOrchestrator } from "../engine/match-orchestrator";
import { getScreeningDispatcher } from "../services/screening-dispatcher";
import type { PositionProfile } from "../types/matching";

const router = Router();

const vectorSchema = z.array(z.number());
const experienceLevelSchema = z.enum(["junior", "mid", "senior"]);
const educationLevelSchema = z.enum(["none", "high_school", "associate", "bachelor", "master", "doctorate"]);
const prioritySchema = z.enum(["required", "preferred"]);

// Blank tokens and empty vectors are accepted here; the engine reports them as malformed items
const requirementSchema = z.discriminatedUnion("kind", [
    z.object({
        kind: z.literal("skill"),
        id: z.string().min(1, "Requirement ID is required"),
        token: z.string(),
        vector: vectorSchema,
        priority: prioritySchema,
        critical: z.boolean().optional()
    }),
    z.object({
        kind: z.literal("sentence"),
        id: z.string().min(1, "Requirement ID is required"),
        text: z.string(),
        vector: vectorSchema,
        priority: prioritySchema,
        critical: z.boolean().optional()
    })
]);

const positionSchema = z.object({
    id: z.string().min(1, "Position ID is required"),
    vectors: z.object({
        overall: vectorSchema.optional(),
        required: vectorSchema.optional(),
        preferred: vectorSchema.optional(),
        description: vectorSchema.optional()
    }).default({}),
    requirements: z.array(requirementSchema).default([]),
    experience: z.object({
        minYears: z.number().min(0),
        maxYears: z.number().min(0).optional(),
        level: experienceLevelSchema.optional()
    }).default({ minYears: 0 }),
    domainTags: z.array(z.string()).default([]),
    role: z.string().optional(),
    education: z.object({ minimumLevel: educationLevelSchema }).optional(),
    certifications: z.array(z.string()).optional()
});

const candidateSchema = z.object({
    id: z.string().min(1, "Candidate ID is required"),
    vectors: z.object({
        overall: vectorSchema.optional(),
        skills: vectorSchema.optional(),
        experience: vectorSchema.optional(),
        projects: vectorSchema.optional()
    }).default({}),
    sentences: z.array(z.object({
        id: z.string().min(1),
        text: z.string(),
        vector: vectorSchema
    })).default([]),
    skills: z.array(z.object({
        id: z.string().min(1),
        token: z.string(),
        text: z.string().default(""),
        vector: vectorSchema
    })).default([]),
    experienceYears: z.number().min(0).default(0),
    level: experienceLevelSchema.optional(),
    domainTags: z.array(z.string()).default([]),
    roles: z.array(z.string()).optional(),
    educationLevel: educationLevelSchema.optional(),
    certifications: z.array(z.string()).optional()
});

const detailSchema = z.object({
    candidate: candidateSchema,
    position: positionSchema
});

const screenSchema = z.object({
    position: positionSchema,
    candidates: z.array(z.object({
        id: z.string().min(1, "Candidate ID is required"),
        vector: vectorSchema.optional()
    })),
    options: z.object({
        limit: z.number().int().positive().optional(),
        minSimilarity: z.number().min(-1).max(1).optional(),
        nearMissMargin: z.number().min(0).max(1).optional()
    }).default({})
});

/**
 * Position vectors define the embedding space for a request; each one that is
 * present must have the configured dimension.
 */
function positionVectorIssues(position: PositionProfile, dimension: number): string[] {
    const issues: string[] = [];
    for (const [name, vector] of Object.entries(position.vectors)) {
        if (vector !== undefined && vector.length > 0 && vector.length !== dimension) {
            issues.push(`position.vectors.${name} must have ${dimension} dimensions, got ${vector.length}`);
        }
    }
    for (const item of position.requirements) {
        if (item.vector.length > 0 && item.vector.length !== dimension) {
            issues.push(`requirement '${item.id}' vector must have ${dimension} dimensions, got ${item.vector.length}`);
        }
    }
    return issues;
}

function handleFailure(res: Response, error: unknown, action: string) {
    if (error instanceof z.ZodError) {
        return res.status(400).json({
            error: 'Validation failed',
            details: error.errors
        });
    }

    if (error instanceof CategoryEvaluationError) {
        return res.status(422).json({
            error: 'Evaluation failed',
            category: error.category,
            message: error.message
        });
    }

    logger.error(`${action} failed:`, error);
    return res.status(500).json({
        error: `${action} failed`,
        message: error instanceof Error ? error.message : 'Unknown error'
    });
}

/**
 * POST /match/detail
 *
 * Detailed stage for one candidate/position pair.
 *
 * Body: { candidate: CandidateProfile, position: PositionProfile }
 * Returns: MatchResult
 */
router.post('/detail', (req: Request, res: Response) => {
    try {
        const { candidate, position } = detailSchema.parse(req.body);

        const issues = positionVectorIssues(position, getEnv().EMBEDDING_DIMENSION);
        if (issues.length > 0) {
            return res.status(400).json({ error: 'Validation failed', details: issues });
        }

        const result = MatchOrchestrator.create().evaluate(candidate, position, getConfigStore().get());
        res.json(result);

    } catch (error) {
        return handleFailure(res, error, 'Match evaluation');
    }
});

/**
 * POST /match/screen
 *
 * Fast stage in-process: rank candidates by whole-profile similarity.
 *
 * Body: { position, candidates: [{ id, vector }], options?: { limit, minSimilarity, nearMissMargin } }
 * Returns: ScreeningResult
 */
router.post('/screen', (req: Request, res: Response) => {
    try {
        const { position, candidates, options } = screenSchema.parse(req.body);

        const issues = positionVectorIssues(position, getEnv().EMBEDDING_DIMENSION);
        if (issues.length > 0) {
            return res.status(400).json({ error: 'Validation failed', details: issues });
        }

        const result = MatchOrchestrator.create().screen(position, candidates, getConfigStore().get(), options);
        res.json(result);

    } catch (error) {
        return handleFailure(res, error, 'Screening');
    }
});

/**
 * POST /match/screen/batch
 *
 * Fast stage on the worker pool, for candidate sets too large for one request cycle.
 *
 * Body: same as POST /match/screen
 * Returns: ScreeningResult
 */
router.post('/screen/batch', async (req: Request, res: Response) => {
    try {
        const { position, candidates, options } = screenSchema.parse(req.body);

        const issues = positionVectorIssues(position, getEnv().EMBEDDING_DIMENSION);
        if (issues.length > 0) {
            return res.status(400).json({ error: 'Validation failed', details: issues });
        }

        const result = await getScreeningDispatcher().dispatch(position, candidates, getConfigStore().get(), options);
        res.json(result);

    } catch (error) {
        return handleFailure(res, error, 'Batch screening');
    }
});

export { router as matchRoutes };
