import fs from 'fs';
import { logger, ILogger, errorFields } from '../config/logger';
import { getSettings } from '../config/settings';
import type { BatchJob } from '../models/batch-job';
import type { DocumentHandle } from '../models/candidate-record';
import { BatchOrchestrator, BatchRun } from '../queue/batch-orchestrator';
import type { BatchCounts, ProgressListener } from '../queue/progress-channel';
import type { BatchReport } from './report-aggregator';
import { ReportExporterService } from './report-exporter.service';

export type BatchStatus = 'running' | 'completed' | 'cancelled' | 'error';

export interface CandidateSummary {
    id: number;
    source: string;
    state: string;
}

export interface BatchSummary {
    id: string;
    status: BatchStatus;
    counts: BatchCounts;
    candidates: CandidateSummary[];
    report: BatchReport | null;
    exportPath: string | null;
    error: string | null;
}

export interface IFileRemover {
    rm(filePath: string, options: { force: boolean }): Promise<void>;
}

export interface RegistryOptions {
    reportDir?: string;
    /** Finished batches kept for polling; the earliest finished go first. */
    maxRetained?: number;
    fileRemover?: IFileRemover;
}

export interface StartBatchOptions {
    /** Files deleted once the batch has finished. */
    uploads?: readonly string[];
}

interface TrackedBatch {
    id: string;
    // Dropped when the run finishes; only the fields below outlive it
    run: BatchRun | null;
    status: BatchStatus;
    counts: BatchCounts;
    candidates: CandidateSummary[];
    report: BatchReport | null;
    exportPath: string | null;
    failure: string | null;
    finished: Promise<void>;
}

function describeCandidates(job: BatchJob): CandidateSummary[] {
    return job.records.map(record => ({
        id: record.id,
        source: record.sourceRef.name,
        state: record.state
    }));
}

/**
 * Batch Registry
 *
 * Keeps the runs of this process in memory so the HTTP layer can poll,
 * stream and cancel them. A finished run is reduced to its summary and
 * report, and only the most recent finished runs are kept. Nothing
 * survives a restart.
 */
export class BatchRegistryService {
    private batches = new Map<string, TrackedBatch>();
    private finishedOrder: string[] = [];
    private reportDir?: string;
    private maxRetained: number;
    private fileRemover: IFileRemover;

    constructor(
        private orchestrator: BatchOrchestrator,
        private exporter: ReportExporterService,
        private logger: ILogger,
        options: RegistryOptions = {}
    ) {
        this.reportDir = options.reportDir;
        this.maxRetained = options.maxRetained ?? 100;
        this.fileRemover = options.fileRemover ?? fs.promises;
    }

    static create(): BatchRegistryService {
        const settings = getSettings();
        return new BatchRegistryService(
            BatchOrchestrator.create(settings.pipeline),
            ReportExporterService.create(),
            logger,
            {
                reportDir: settings.reportDir,
                maxRetained: settings.maxRetainedBatches
            }
        );
    }

    /**
     * Start a batch. Rejects with ConfigurationError when the pre-flight
     * check fails; nothing is registered in that case.
     */
    async start(
        jobDescription: string,
        documents: readonly DocumentHandle[],
        options: StartBatchOptions = {}
    ): Promise<BatchSummary> {
        const run = await this.orchestrator.start(jobDescription, documents);

        const tracked: TrackedBatch = {
            id: run.id,
            run,
            status: 'running',
            counts: run.job.snapshotCounts(),
            candidates: [],
            report: null,
            exportPath: null,
            failure: null,
            finished: Promise.resolve()
        };
        tracked.finished = run.done
            .then(
                report => this.onFinished(tracked, report),
                (error: unknown) => {
                    this.release(tracked, 'error');
                    tracked.failure = error instanceof Error ? error.message : String(error);
                    this.logger.error({ batchId: tracked.id, ...errorFields(error) }, 'Batch run crashed');
                }
            )
            .then(() => this.removeUploads(tracked.id, options.uploads ?? []))
            .then(() => this.retire(tracked.id));

        this.batches.set(run.id, tracked);
        return this.summarize(tracked);
    }

    get(batchId: string): BatchSummary | null {
        const tracked = this.batches.get(batchId);
        return tracked ? this.summarize(tracked) : null;
    }

    cancel(batchId: string): BatchSummary | null {
        const tracked = this.batches.get(batchId);
        if (!tracked) {
            return null;
        }
        tracked.run?.cancel();
        return this.summarize(tracked);
    }

    /**
     * Replays past events of a running batch, then follows live ones.
     * `onEnd` fires once the report is available (or the run crashed); a
     * batch that already finished gets only `onEnd`.
     */
    subscribe(
        batchId: string,
        listener: ProgressListener,
        onEnd: (summary: BatchSummary) => void
    ): (() => void) | null {
        const tracked = this.batches.get(batchId);
        if (!tracked) {
            return null;
        }

        let active = true;
        let unsubscribe = () => { };
        const progress = tracked.run?.progress;

        if (progress) {
            const replayed = new Set(progress.events());
            for (const event of replayed) {
                listener(event);
            }
            unsubscribe = progress.subscribe(event => {
                // Published before subscribing but not yet delivered
                if (!replayed.has(event)) {
                    listener(event);
                }
            });
        }

        tracked.finished
            .then(() => progress?.drain())
            .then(() => {
                if (active) {
                    onEnd(this.summarize(tracked));
                }
            })
            .catch((error: unknown) => this.logger.error({ batchId, ...errorFields(error) }, 'Progress subscriber failed'));

        return () => {
            active = false;
            unsubscribe();
        };
    }

    /**
     * Resolves when the batch has finished, its export (if any) is written
     * and its uploads are removed.
     */
    async waitFor(batchId: string): Promise<BatchSummary | null> {
        const tracked = this.batches.get(batchId);
        if (!tracked) {
            return null;
        }
        await tracked.finished;
        return this.summarize(tracked);
    }

    private async onFinished(tracked: TrackedBatch, report: BatchReport): Promise<void> {
        this.release(tracked, report.metadata.cancelled ? 'cancelled' : 'completed');
        tracked.report = report;

        if (!this.reportDir) {
            return;
        }
        try {
            tracked.exportPath = await this.exporter.export(report, this.reportDir);
        } catch (error) {
            this.logger.error({
                batchId: tracked.id,
                reportDir: this.reportDir,
                ...errorFields(error)
            }, 'Report export failed');
        }
    }

    /**
     * Freeze the summary fields and let go of the job, its records and
     * the progress history.
     */
    private release(tracked: TrackedBatch, status: BatchStatus): void {
        if (tracked.run) {
            tracked.counts = tracked.run.job.snapshotCounts();
            tracked.candidates = describeCandidates(tracked.run.job);
            tracked.run = null;
        }
        tracked.status = status;
    }

    private async removeUploads(batchId: string, uploads: readonly string[]): Promise<void> {
        for (const filePath of uploads) {
            try {
                await this.fileRemover.rm(filePath, { force: true });
            } catch (error) {
                this.logger.warn({ batchId, path: filePath, ...errorFields(error) }, 'Could not remove uploaded file');
            }
        }
    }

    private retire(batchId: string): void {
        this.finishedOrder.push(batchId);
        while (this.finishedOrder.length > this.maxRetained) {
            const evicted = this.finishedOrder.shift();
            if (evicted !== undefined) {
                this.batches.delete(evicted);
                this.logger.debug({ batchId: evicted }, 'Finished batch evicted');
            }
        }
    }

    private summarize(tracked: TrackedBatch): BatchSummary {
        const job = tracked.run?.job;
        return {
            id: tracked.id,
            status: tracked.status,
            counts: job ? job.snapshotCounts() : { ...tracked.counts },
            candidates: job ? describeCandidates(job) : tracked.candidates.map(candidate => ({ ...candidate })),
            report: tracked.report,
            exportPath: tracked.exportPath,
            error: tracked.failure
        };
    }
}

// Singleton instance
let batchRegistry: BatchRegistryService | null = null;

export function getBatchRegistry(): BatchRegistryService {
    if (!batchRegistry) {
        batchRegistry = BatchRegistryService.create();
    }
    return batchRegistry;
}
