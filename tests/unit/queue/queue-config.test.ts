import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Queue, Worker, QueueEvents } from 'bullmq';
import { Redis } from 'ioredis';
import { QueueConfig, SCREENING_QUEUE, type ScreeningJobData } from '../../../src/queue/queue-config';

// Mock the logger
vi.mock('../../../src/config/logger', () => ({
    logger: {
        info: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        debug: vi.fn()
    }
}));

const mocks = vi.hoisted(() => ({
    add: vi.fn(),
    queueClose: vi.fn(),
    eventsOn: vi.fn(),
    eventsClose: vi.fn(),
    workerOn: vi.fn(),
    workerClose: vi.fn(),
    redisQuit: vi.fn()
}));

// No Redis in unit tests
vi.mock('bullmq', () => ({
    Queue: vi.fn(function () {
        return { add: mocks.add, close: mocks.queueClose };
    }),
    QueueEvents: vi.fn(function () {
        return { on: mocks.eventsOn, close: mocks.eventsClose };
    }),
    Worker: vi.fn(function () {
        return { on: mocks.workerOn, close: mocks.workerClose };
    })
}));

vi.mock('ioredis', () => ({
    Redis: vi.fn(function () {
        return { quit: mocks.redisQuit };
    })
}));

describe('QueueConfig', () => {
    let queueConfig: QueueConfig;

    beforeEach(() => {
        vi.clearAllMocks();
        queueConfig = new QueueConfig('redis://test-host:6379');
    });

    it('should create the screening queue on one Redis connection', () => {
        expect(Redis).toHaveBeenCalledWith('redis://test-host:6379', {
            enableReadyCheck: false,
            maxRetriesPerRequest: null
        });
        expect(Queue).toHaveBeenCalledWith(SCREENING_QUEUE, expect.objectContaining({
            defaultJobOptions: { removeOnComplete: 100, removeOnFail: 50, attempts: 1 }
        }));
        expect(QueueEvents).toHaveBeenCalledWith(SCREENING_QUEUE, expect.anything());
        expect(mocks.eventsOn).toHaveBeenCalledWith('failed', expect.any(Function));
    });

    it('should enqueue a chunk and wait for its result', async () => {
        const batch = { scores: [{ candidateId: 'a', score: 0.9 }], errors: [] };
        const waitUntilFinished = vi.fn().mockResolvedValue(batch);
        mocks.add.mockResolvedValue({ waitUntilFinished });
        const data: ScreeningJobData = {
            positionId: 'pos-1',
            positionVector: [1, 0, 0, 0],
            candidates: [{ id: 'a', vector: [0.9, 0.1, 0, 0] }],
            chunkIndex: 0
        };

        const result = await queueConfig.runScreeningJob(data, 500);

        expect(result).toEqual(batch);
        expect(mocks.add).toHaveBeenCalledWith('screen', data);
        expect(waitUntilFinished).toHaveBeenCalledWith(expect.objectContaining({ on: mocks.eventsOn }), 500);
    });

    it('should start the worker with the given concurrency', () => {
        const processor = vi.fn();

        queueConfig.startWorker(processor, 3);

        expect(Worker).toHaveBeenCalledWith(SCREENING_QUEUE, processor, expect.objectContaining({ concurrency: 3 }));
        expect(mocks.workerOn.mock.calls.map((call) => call[0])).toEqual(['completed', 'failed', 'stalled']);
        expect(queueConfig.getScreeningWorker()).not.toBeNull();
    });

    it('should close every connection', async () => {
        queueConfig.startWorker(vi.fn(), 1);

        await queueConfig.close();

        expect(mocks.workerClose).toHaveBeenCalled();
        expect(mocks.queueClose).toHaveBeenCalled();
        expect(mocks.eventsClose).toHaveBeenCalled();
        expect(mocks.redisQuit).toHaveBeenCalled();
    });
});
