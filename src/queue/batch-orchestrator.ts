import { randomUUID } from 'crypto';
import { logger, ILogger, errorFields } from '../config/logger';
import { getSettings, PipelineConfig, validatePipelineConfig } from '../config/settings';
import { BatchJob } from '../models/batch-job';
import {
    CandidateState,
    DocumentHandle,
    Stage,
    STAGE_SEQUENCE,
    isTerminal,
    nextStage,
    stateForStage
} from '../models/candidate-record';
import { getModelClient, IModelClient } from '../services/model-client.service';
import { ReportAggregator, BatchReport } from '../services/report-aggregator';
import { ConfigurationError } from '../types/errors';
import { IStageExecutor, StageExecutor, StageOutcome } from '../workers/stage-executor';
import { ProgressChannel, ProgressListener } from './progress-channel';

interface WorkUnit {
    candidateId: number;
    stage: Stage;
}

export interface StartOptions {
    batchId?: string;
    signal?: AbortSignal;
    onProgress?: ProgressListener;
}

/**
 * Handle on a running batch.
 */
export interface BatchRun {
    readonly id: string;
    readonly job: BatchJob;
    readonly progress: ProgressChannel;
    readonly done: Promise<BatchReport>;
    cancel(): void;
    isCancelled(): boolean;
}

export interface OrchestratorOptions {
    verifyEndpoint?: boolean;
    now?: () => Date;
}

/**
 * Batch Orchestrator
 *
 * Owns a fixed pool of async workers draining a FIFO queue of
 * (candidate, stage) units. A candidate has at most one unit queued or in
 * flight, so its stages never overlap; units of different candidates run
 * in any order. Queue and counters are only touched synchronously between
 * awaits, which makes the event loop their single synchronization point.
 */
export class BatchOrchestrator {
    private aggregator: ReportAggregator;

    constructor(
        private executor: IStageExecutor,
        private modelClient: IModelClient,
        private config: PipelineConfig,
        private logger: ILogger,
        private options: OrchestratorOptions = {}
    ) {
        this.aggregator = new ReportAggregator(options.now);
    }

    /**
     * Factory method for production use
     */
    static create(config: PipelineConfig = getSettings().pipeline): BatchOrchestrator {
        return new BatchOrchestrator(
            StageExecutor.create(),
            getModelClient(),
            config,
            logger
        );
    }

    /**
     * Validate configuration and the model endpoint, then start scheduling.
     * Rejects with ConfigurationError before any work is dispatched.
     */
    async start(jobDescription: string, documents: readonly DocumentHandle[], options: StartOptions = {}): Promise<BatchRun> {
        const config = validatePipelineConfig(this.config);
        const batchId = options.batchId ?? randomUUID();

        if (this.options.verifyEndpoint ?? true) {
            const available = await this.modelClient.checkAvailability(config.timeoutMs);
            if (!available.ok) {
                throw new ConfigurationError(`Inference service not usable: ${available.error.message}`, {
                    kind: available.error.kind,
                    model: this.modelClient.model
                });
            }
        }

        const progress = new ProgressChannel(this.logger);
        if (options.onProgress) {
            progress.subscribe(options.onProgress);
        }

        const job = new BatchJob(batchId, jobDescription, documents, config, progress);
        const external = options.signal;
        if (external) {
            if (external.aborted) {
                job.cancel();
            } else {
                external.addEventListener('abort', () => job.cancel(), { once: true });
            }
        }

        this.logger.info({
            batchId,
            candidates: documents.length,
            maxConcurrent: config.maxConcurrent,
            retryAttempts: config.retryAttempts,
            timeoutMs: config.timeoutMs,
            model: this.modelClient.model
        }, 'Starting screening batch');

        const done = this.schedule(job);

        return {
            id: batchId,
            job,
            progress,
            done,
            cancel: () => {
                if (job.cancel()) {
                    this.logger.info({ batchId }, 'Cancellation requested');
                }
            },
            isCancelled: () => job.isCancelled()
        };
    }

    /**
     * Start a batch and wait for its report.
     */
    async run(jobDescription: string, documents: readonly DocumentHandle[], options: StartOptions = {}): Promise<BatchReport> {
        const batch = await this.start(jobDescription, documents, options);
        return batch.done;
    }

    private async schedule(job: BatchJob): Promise<BatchReport> {
        const signal = job.signal;
        const queue: WorkUnit[] = job.records.map(record => ({ candidateId: record.id, stage: STAGE_SEQUENCE[0] }));
        const poolSize = Math.min(job.config.maxConcurrent, Math.max(queue.length, 1));

        const workers = Array.from({ length: poolSize }, (_, workerId) => this.worker(job, queue, signal, workerId));
        await Promise.all(workers);

        // Anything still queued or pending was never dispatched
        for (const record of job.records) {
            if (!isTerminal(record.state)) {
                job.transition(record, CandidateState.Cancelled);
            }
        }

        const report = this.aggregator.buildReport(job, this.modelClient.model, signal.aborted);

        this.logger.info({
            batchId: job.id,
            ...report.metadata.counts,
            cancelled: signal.aborted
        }, 'Screening batch finished');

        return report;
    }

    private async worker(job: BatchJob, queue: WorkUnit[], signal: AbortSignal, workerId: number): Promise<void> {
        for (;;) {
            if (signal.aborted) {
                return;
            }
            const unit = queue.shift();
            if (!unit) {
                return;
            }
            this.logger.debug({ batchId: job.id, workerId, ...unit }, 'Worker picked up unit');
            await this.process(job, queue, unit, signal);
        }
    }

    private async process(job: BatchJob, queue: WorkUnit[], unit: WorkUnit, signal: AbortSignal): Promise<void> {
        const record = job.get(unit.candidateId);

        job.transition(record, stateForStage(unit.stage));
        record.attempts = 0;

        const outcome = await this.executor.execute(record, unit.stage, {
            batchId: job.id,
            jobDescription: job.jobDescription,
            config: job.config,
            signal
        }).catch((error: unknown): StageOutcome => {
            // Executors report failures as values; a throw here is a defect
            this.logger.error({ batchId: job.id, candidateId: record.id, ...errorFields(error) }, 'Stage executor threw');
            return {
                status: 'failed',
                error: { kind: 'IOError', message: error instanceof Error ? error.message : String(error) },
                attempts: record.attempts
            };
        });

        record.attempts = outcome.attempts;

        if (outcome.status === 'failed') {
            job.transition(record, CandidateState.Failed, outcome.error);
            return;
        }

        if (outcome.status === 'cancelled' || signal.aborted) {
            job.transition(record, CandidateState.Cancelled);
            return;
        }

        job.apply(record, outcome.patch);

        const following = nextStage(unit.stage);
        if (following) {
            queue.push({ candidateId: record.id, stage: following });
        } else {
            job.transition(record, CandidateState.Completed);
        }
    }
}
