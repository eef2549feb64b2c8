import { logger, type ILogger } from '../config/logger';
import { scoreCandidates, type ScoredBatch } from '../engine/match-orchestrator';
import type { ScreeningJob, ScreeningJobLike } from '../queue/queue-config';

export interface IScreeningWorker {
    processScreening(job: ScreeningJobLike): Promise<ScoredBatch>;
}

/**
 * Screening Worker
 *
 * Scores one chunk of candidates against a position vector. Ranking happens
 * after all chunks are gathered.
 */
export class ScreeningWorker implements IScreeningWorker {
    constructor(private logger: ILogger) { }

    /**
     * Factory method for production use
     */
    static create(): ScreeningWorker {
        return new ScreeningWorker(logger);
    }

    /**
     * Process screening job
     */
    async processScreening(job: ScreeningJobLike): Promise<ScoredBatch> {
        const { positionId, positionVector, candidates, chunkIndex } = job.data;

        this.logger.debug({
            positionId,
            chunkIndex,
            candidates: candidates.length,
            workerJobId: job.id
        }, 'Scoring screening chunk');

        const batch = scoreCandidates(positionVector, candidates);

        if (batch.errors.length > 0) {
            this.logger.warn('Candidates skipped for dimension mismatch', {
                positionId,
                chunkIndex,
                candidateIds: batch.errors.map((entry) => entry.candidateId)
            });
        }

        return batch;
    }
}

/**
 * Processor function for the BullMQ worker
 */
export async function screeningProcessor(job: ScreeningJob): Promise<ScoredBatch> {
    const worker = ScreeningWorker.create();
    return await worker.processScreening(job);
}
