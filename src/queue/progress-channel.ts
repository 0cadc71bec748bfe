import type { ILogger } from '../config/logger';
import { errorFields } from '../config/logger';
import type { CandidateState } from '../models/candidate-record';

export interface BatchCounts {
    total: number;
    pending: number;
    inProgress: number;
    completed: number;
    failed: number;
    cancelled: number;
}

export interface ProgressEvent {
    batchId: string;
    candidateId: number;
    source: string;
    from: CandidateState;
    to: CandidateState;
    counts: BatchCounts;
}

export type ProgressListener = (event: ProgressEvent) => void;

/**
 * Progress Channel
 *
 * Carries state-transition events from the scheduler to observers.
 * `publish` only buffers; delivery happens on a later turn of the event
 * loop, so a slow or throwing observer never holds up scheduling.
 */
export class ProgressChannel {
    private listeners = new Set<ProgressListener>();
    private buffer: ProgressEvent[] = [];
    private flushScheduled = false;
    private history: ProgressEvent[] = [];

    constructor(private logger: ILogger) { }

    publish(event: ProgressEvent): void {
        this.history.push(event);
        this.buffer.push(event);
        if (!this.flushScheduled) {
            this.flushScheduled = true;
            setImmediate(() => this.flush());
        }
    }

    /**
     * Returns an unsubscribe function.
     */
    subscribe(listener: ProgressListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /**
     * Every event published so far, for late subscribers.
     */
    events(): readonly ProgressEvent[] {
        return this.history;
    }

    /**
     * Resolves once everything published before the call has been delivered.
     */
    drain(): Promise<void> {
        return new Promise(resolve => setImmediate(resolve));
    }

    private flush(): void {
        this.flushScheduled = false;
        const pending = this.buffer;
        this.buffer = [];

        for (const event of pending) {
            for (const listener of this.listeners) {
                try {
                    listener(event);
                } catch (error) {
                    this.logger.warn({
                        batchId: event.batchId,
                        candidateId: event.candidateId,
                        ...errorFields(error)
                    }, 'Progress observer threw; event dropped for that observer');
                }
            }
        }
    }
}
