import { Queue, Worker, QueueEvents, type Job } from 'bullmq';
import { Redis } from 'ioredis';
import { logger } from '../config/logger';
import { getEnv } from '../config/env';
import type { ScreeningCandidate } from '../types/matching';
import type { ScoredBatch } from '../engine/match-orchestrator';

export const SCREENING_QUEUE = 'screening';

export interface ScreeningJobData {
    positionId: string;
    positionVector?: number[];
    candidates: ScreeningCandidate[];
    chunkIndex: number;
}

export type ScreeningJob = Job<ScreeningJobData, ScoredBatch, string>;

/** The parts of a screening job a processor reads. */
export type ScreeningJobLike = Pick<ScreeningJob, 'id' | 'data'>;

/**
 * Runs one screening chunk on the worker pool and resolves with its raw result.
 */
export interface IScreeningQueue {
    runScreeningJob(data: ScreeningJobData, timeoutMs: number): Promise<unknown>;
}

/**
 * Queue Configuration
 *
 * BullMQ setup for the screening worker pool. Large candidate sets are split
 * into chunks, each scored by a worker and awaited through queue events.
 */
export class QueueConfig implements IScreeningQueue {
    private redis: Redis;
    private screeningQueue: Queue<ScreeningJobData, ScoredBatch, string>;
    private screeningWorker: Worker<ScreeningJobData, ScoredBatch, string> | null = null;
    private queueEvents: QueueEvents;

    constructor(redisUrl: string = getEnv().REDIS_URL) {
        // Redis connection
        this.redis = new Redis(redisUrl, {
            enableReadyCheck: false,
            maxRetriesPerRequest: null,
        });

        // Screening queue
        this.screeningQueue = new Queue<ScreeningJobData, ScoredBatch, string>(SCREENING_QUEUE, {
            connection: this.redis,
            defaultJobOptions: {
                removeOnComplete: 100,
                removeOnFail: 50,
                attempts: 1,
            },
        });

        // Queue events for awaiting chunk results
        this.queueEvents = new QueueEvents(SCREENING_QUEUE, {
            connection: this.redis,
        });

        this.setupEventListeners();
    }

    /**
     * Get the screening queue instance
     */
    getScreeningQueue(): Queue<ScreeningJobData, ScoredBatch, string> {
        return this.screeningQueue;
    }

    /**
     * Get the screening worker instance, once started
     */
    getScreeningWorker(): Worker<ScreeningJobData, ScoredBatch, string> | null {
        return this.screeningWorker;
    }

    /**
     * Start the screening worker
     */
    startWorker(processor: (job: ScreeningJob) => Promise<ScoredBatch>, concurrency: number = getEnv().SCREENING_CONCURRENCY) {
        this.screeningWorker = new Worker<ScreeningJobData, ScoredBatch, string>(SCREENING_QUEUE, processor, {
            connection: this.redis,
            concurrency,
        });

        this.screeningWorker.on('completed', (job) => {
            logger.debug({
                jobId: job.id,
                positionId: job.data.positionId,
                chunkIndex: job.data.chunkIndex,
                duration: job.processedOn === undefined ? null : Date.now() - job.processedOn
            }, 'Screening chunk completed');
        });

        this.screeningWorker.on('failed', (job, err) => {
            logger.error('Screening chunk failed', {
                jobId: job?.id,
                positionId: job?.data.positionId,
                chunkIndex: job?.data.chunkIndex,
                error: err.message
            });
        });

        this.screeningWorker.on('stalled', (jobId) => {
            logger.warn('Screening chunk stalled', { jobId });
        });

        logger.info({ queue: SCREENING_QUEUE, concurrency }, 'Screening worker started');
    }

    /**
     * Enqueue one chunk and wait for the worker's result
     */
    async runScreeningJob(data: ScreeningJobData, timeoutMs: number): Promise<unknown> {
        const job = await this.screeningQueue.add('screen', data);
        return job.waitUntilFinished(this.queueEvents, timeoutMs);
    }

    /**
     * Setup queue event listeners
     */
    private setupEventListeners() {
        this.queueEvents.on('failed', ({ jobId, failedReason }) => {
            logger.error('Screening job failed', { jobId, failedReason });
        });
    }

    /**
     * Close all connections
     */
    async close() {
        await this.screeningWorker?.close();
        await this.screeningQueue.close();
        await this.queueEvents.close();
        await this.redis.quit();
    }
}

// Singleton instance
let queueConfig: QueueConfig | null = null;

export function getQueueConfig(): QueueConfig {
    if (!queueConfig) {
        queueConfig = new QueueConfig();
    }
    return queueConfig;
}
