import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ScreeningWorker } from '../../../src/workers/screening-worker';
import type { ILogger } from '../../../src/config/logger';

// Mock the logger
vi.mock('../../../src/config/logger', () => ({
    logger: {
        info: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        debug: vi.fn()
    }
}));

const { axis, similarTo } = globalThis.testUtils;

describe('ScreeningWorker', () => {
    let mockLogger: ILogger;
    let worker: ScreeningWorker;

    beforeEach(() => {
        vi.clearAllMocks();

        mockLogger = {
            info: vi.fn(),
            error: vi.fn(),
            warn: vi.fn(),
            debug: vi.fn()
        };
        worker = new ScreeningWorker(mockLogger);
    });

    it('should score every candidate in the chunk', async () => {
        const batch = await worker.processScreening({
            id: 'job-1',
            data: {
                positionId: 'pos-1',
                positionVector: axis(0),
                candidates: [{ id: 'a', vector: axis(0) }, { id: 'b', vector: axis(1) }],
                chunkIndex: 0
            }
        });

        expect(batch).toEqual({
            scores: [{ candidateId: 'a', score: 1 }, { candidateId: 'b', score: 0 }],
            errors: []
        });
        expect(mockLogger.debug).toHaveBeenCalledWith(
            { positionId: 'pos-1', chunkIndex: 0, candidates: 2, workerJobId: 'job-1' },
            'Scoring screening chunk'
        );
        expect(mockLogger.warn).not.toHaveBeenCalled();
    });

    it('should report dimension mismatches without failing the chunk', async () => {
        const batch = await worker.processScreening({
            id: 'job-2',
            data: {
                positionId: 'pos-1',
                positionVector: axis(0),
                candidates: [{ id: 'a', vector: [1, 0] }, { id: 'b', vector: similarTo(0.5) }],
                chunkIndex: 3
            }
        });

        expect(batch.scores).toHaveLength(1);
        expect(batch.scores[0].candidateId).toBe('b');
        expect(batch.scores[0].score).toBeCloseTo(0.5, 10);
        expect(batch.errors).toEqual([{
            candidateId: 'a',
            reason: 'dimension_mismatch',
            message: 'Vector dimension mismatch: 4 vs 2'
        }]);
        expect(mockLogger.warn).toHaveBeenCalledWith('Candidates skipped for dimension mismatch', {
            positionId: 'pos-1',
            chunkIndex: 3,
            candidateIds: ['a']
        });
    });
});
