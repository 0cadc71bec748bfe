import type { PipelineConfig } from '../config/settings';
import type { PipelineFailure } from '../types/errors';
import type { BatchCounts, ProgressChannel } from '../queue/progress-channel';
import {
    CandidatePatch,
    CandidateRecord,
    CandidateState,
    DocumentHandle,
    assertTransition,
    createCandidateRecord,
    isTerminal
} from './candidate-record';

/**
 * Batch Job
 *
 * One screening run: the job description, the records in input order,
 * the pipeline configuration, the running counters and the cancellation
 * signal. Every state change goes through `transition`, which keeps the
 * counters consistent and publishes the progress event.
 */
export class BatchJob {
    readonly records: readonly CandidateRecord[];
    private counts: BatchCounts;
    private controller = new AbortController();

    constructor(
        readonly id: string,
        readonly jobDescription: string,
        documents: readonly DocumentHandle[],
        readonly config: PipelineConfig,
        private progress: ProgressChannel
    ) {
        this.records = documents.map((document, index) => createCandidateRecord(index, document));
        this.counts = {
            total: this.records.length,
            pending: this.records.length,
            inProgress: 0,
            completed: 0,
            failed: 0,
            cancelled: 0
        };
    }

    get(candidateId: number): CandidateRecord {
        const record = this.records[candidateId];
        if (!record) {
            throw new RangeError(`Unknown candidate ${candidateId} in batch ${this.id}`);
        }
        return record;
    }

    get signal(): AbortSignal {
        return this.controller.signal;
    }

    isCancelled(): boolean {
        return this.controller.signal.aborted;
    }

    /**
     * Stop dispatching new stages. Returns false when already cancelled.
     */
    cancel(): boolean {
        if (this.controller.signal.aborted) {
            return false;
        }
        this.controller.abort();
        return true;
    }

    snapshotCounts(): BatchCounts {
        return { ...this.counts };
    }

    isSettled(): boolean {
        return this.records.every(record => isTerminal(record.state));
    }

    transition(record: CandidateRecord, to: CandidateState, error?: PipelineFailure): void {
        const from = record.state;
        assertTransition(from, to);

        this.decrement(from);
        this.increment(to);
        record.state = to;
        if (to === CandidateState.Failed && error) {
            record.error = error;
        }

        this.progress.publish({
            batchId: this.id,
            candidateId: record.id,
            source: record.sourceRef.name,
            from,
            to,
            counts: this.snapshotCounts()
        });
    }

    apply(record: CandidateRecord, patch: CandidatePatch): void {
        Object.assign(record, patch);
    }

    private increment(state: CandidateState): void {
        this.adjust(state, 1);
    }

    private decrement(state: CandidateState): void {
        this.adjust(state, -1);
    }

    private adjust(state: CandidateState, delta: number): void {
        switch (state) {
            case CandidateState.Pending:
                this.counts.pending += delta;
                break;
            case CandidateState.Completed:
                this.counts.completed += delta;
                break;
            case CandidateState.Failed:
                this.counts.failed += delta;
                break;
            case CandidateState.Cancelled:
                this.counts.cancelled += delta;
                break;
            default:
                this.counts.inProgress += delta;
        }
    }
}
