import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ProgressChannel, ProgressEvent } from '../../../src/queue/progress-channel';
import { createMockLogger } from '../../helpers/logger-mock';

// Mock the logger
vi.mock('../../../src/config/logger', () => import('../../helpers/logger-mock'));

function event(candidateId: number): ProgressEvent {
    return {
        batchId: 'batch-1',
        candidateId,
        source: `resume-${candidateId}.pdf`,
        from: 'pending',
        to: 'extracting',
        counts: { total: 3, pending: 2, inProgress: 1, completed: 0, failed: 0, cancelled: 0 }
    };
}

describe('ProgressChannel', () => {
    let mockLogger: ReturnType<typeof createMockLogger>;
    let channel: ProgressChannel;

    beforeEach(() => {
        vi.clearAllMocks();
        mockLogger = createMockLogger();
        channel = new ProgressChannel(mockLogger);
    });

    it('should deliver events asynchronously and in publish order', async () => {
        const received: number[] = [];
        channel.subscribe(e => received.push(e.candidateId));

        channel.publish(event(0));
        channel.publish(event(1));
        channel.publish(event(2));

        expect(received).toEqual([]);
        await channel.drain();
        expect(received).toEqual([0, 1, 2]);
    });

    it('should keep delivering to other observers when one throws', async () => {
        const received: number[] = [];
        channel.subscribe(() => {
            throw new Error('observer failed');
        });
        channel.subscribe(e => received.push(e.candidateId));

        channel.publish(event(0));
        channel.publish(event(1));
        await channel.drain();

        expect(received).toEqual([0, 1]);
        expect(mockLogger.warn).toHaveBeenCalledTimes(2);
        expect(mockLogger.warn).toHaveBeenCalledWith(
            { batchId: 'batch-1', candidateId: 0, error: 'observer failed' },
            'Progress observer threw; event dropped for that observer'
        );
    });

    it('should stop delivering after unsubscribe', async () => {
        const received: number[] = [];
        const unsubscribe = channel.subscribe(e => received.push(e.candidateId));

        channel.publish(event(0));
        await channel.drain();
        unsubscribe();
        channel.publish(event(1));
        await channel.drain();

        expect(received).toEqual([0]);
    });

    it('should keep the full history for late subscribers', async () => {
        channel.publish(event(0));
        channel.publish(event(1));
        await channel.drain();

        expect(channel.events().map(e => e.candidateId)).toEqual([0, 1]);
    });
});
