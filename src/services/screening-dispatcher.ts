import { z } from 'zod';
import { logger, type ILogger } from '../config/logger';
import { getEnv } from '../config/env';
import type { EngineConfig } from '../config/engine-config';
import { rankScreening, type ScoredBatch } from '../engine/match-orchestrator';
import { getQueueConfig, type IScreeningQueue, type ScreeningJobData } from '../queue/queue-config';
import type {
    PositionProfile,
    ScreeningCandidate,
    ScreeningError,
    ScreeningOptions,
    ScreeningResult
} from '../types/matching';

// Chunk results come back through Redis as plain JSON
const scoredBatchSchema = z.object({
    scores: z.array(z.object({
        candidateId: z.string(),
        score: z.number()
    })),
    errors: z.array(z.object({
        candidateId: z.string(),
        reason: z.literal('dimension_mismatch'),
        message: z.string()
    }))
});

export interface DispatchOptions {
    chunkSize: number;
    timeoutMs: number;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
    const chunks: T[][] = [];
    for (let start = 0; start < items.length; start += size) {
        chunks.push(items.slice(start, start + size));
    }
    return chunks;
}

/**
 * Screening Dispatcher
 *
 * Fans a screening run out over the worker pool in fixed-size chunks,
 * waits for every chunk, then merges and ranks the scores. Candidates of a
 * chunk that fails or times out are reported in `errors`.
 */
export class ScreeningDispatcher {
    constructor(
        private queue: IScreeningQueue,
        private logger: ILogger,
        private options: DispatchOptions
    ) { }

    /**
     * Factory method for production use
     */
    static create(): ScreeningDispatcher {
        const env = getEnv();
        return new ScreeningDispatcher(getQueueConfig(), logger, {
            chunkSize: env.SCREENING_CHUNK_SIZE,
            timeoutMs: env.SCREENING_TIMEOUT_MS
        });
    }

    async dispatch(
        position: PositionProfile,
        candidates: readonly ScreeningCandidate[],
        config: EngineConfig,
        options: ScreeningOptions = {}
    ): Promise<ScreeningResult> {
        const chunks = chunk(candidates, this.options.chunkSize);
        const positionVector = position.vectors.overall === undefined ? undefined : [...position.vectors.overall];

        this.logger.info({
            positionId: position.id,
            candidates: candidates.length,
            chunks: chunks.length,
            configVersion: config.version
        }, 'Dispatching screening run');

        const settled = await Promise.allSettled(chunks.map(async (candidatesChunk, chunkIndex) => {
            const data: ScreeningJobData = {
                positionId: position.id,
                positionVector,
                candidates: candidatesChunk,
                chunkIndex
            };
            const raw = await this.queue.runScreeningJob(data, this.options.timeoutMs);
            return scoredBatchSchema.parse(raw);
        }));

        // A failed chunk costs only its own candidates
        const batches = settled.map((outcome, chunkIndex): ScoredBatch => {
            if (outcome.status === 'fulfilled') {
                return outcome.value;
            }
            const message = outcome.reason instanceof Error ? outcome.reason.message : 'Unknown error';
            this.logger.error('Screening chunk failed', {
                positionId: position.id,
                chunkIndex,
                candidates: chunks[chunkIndex].length,
                error: message
            });
            return {
                scores: [],
                errors: chunks[chunkIndex].map((candidate): ScreeningError => ({
                    candidateId: candidate.id,
                    reason: 'chunk_failed',
                    message
                }))
            };
        });

        const result = rankScreening(position.id, batches, options, config.screening);

        this.logger.info({
            positionId: position.id,
            totalCandidates: result.totalCandidates,
            shortlisted: result.shortlist.length,
            nearMisses: result.nearMisses.length,
            errors: result.errors.length
        }, 'Screening run completed');

        return result;
    }
}

// Singleton instance
let screeningDispatcher: ScreeningDispatcher | null = null;

export function getScreeningDispatcher(): ScreeningDispatcher {
    if (!screeningDispatcher) {
        screeningDispatcher = ScreeningDispatcher.create();
    }
    return screeningDispatcher;
}
