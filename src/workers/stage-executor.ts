import { logger, ILogger } from '../config/logger';
import type { PipelineConfig } from '../config/settings';
import type { CandidatePatch, CandidateRecord, Stage } from '../models/candidate-record';
import { getDocumentExtractor, IDocumentExtractor } from '../services/document-extractor.service';
import { getModelClient, IModelClient } from '../services/model-client.service';
import type { ModelFailure, PipelineFailure, Result } from '../types/errors';
import { IRetryUtil, RetryUtil } from '../utils/retry.util';

export interface StageContext {
    batchId: string;
    jobDescription: string;
    config: PipelineConfig;
    signal: AbortSignal;
}

export type StageOutcome =
    | { status: 'succeeded'; patch: CandidatePatch; attempts: number }
    | { status: 'failed'; error: PipelineFailure; attempts: number }
    | { status: 'cancelled'; attempts: number };

export interface IStageExecutor {
    execute(record: Readonly<CandidateRecord>, stage: Stage, context: StageContext): Promise<StageOutcome>;
}

/**
 * Retries a failure kind may consume. Transport failures get the
 * configured budget, a malformed response gets one more try, extraction
 * failures are deterministic and get none.
 */
export function retryBudget(failure: PipelineFailure, retryAttempts: number): number {
    switch (failure.kind) {
        case 'Unreachable':
        case 'Timeout':
            return retryAttempts;
        case 'InvalidResponse':
            return 1;
        default:
            return 0;
    }
}

/**
 * Transport failures share one budget whichever way the call failed.
 */
export function retryGroup(failure: PipelineFailure): string {
    return failure.kind === 'Unreachable' || failure.kind === 'Timeout' ? 'transport' : failure.kind;
}

/**
 * Stage Executor
 *
 * Runs one pipeline stage for one candidate:
 * extract: document text via the extractor (no inference call)
 * parse: structured profile from the text
 * score: fit score against the job description
 * questions: six interview questions for the role
 *
 * The result is always an outcome value; nothing is thrown to the caller.
 */
export class StageExecutor implements IStageExecutor {
    constructor(
        private modelClient: IModelClient,
        private extractor: IDocumentExtractor,
        private logger: ILogger,
        private retryUtil: IRetryUtil = RetryUtil
    ) { }

    /**
     * Factory method for production use
     */
    static create(): StageExecutor {
        return new StageExecutor(getModelClient(), getDocumentExtractor(), logger, RetryUtil);
    }

    async execute(record: Readonly<CandidateRecord>, stage: Stage, context: StageContext): Promise<StageOutcome> {
        this.logger.info({
            batchId: context.batchId,
            candidateId: record.id,
            source: record.sourceRef.name,
            stage
        }, `Running ${stage} stage`);

        const outcome = await this.retryUtil.executeWithRetry<CandidatePatch>(
            () => this.runOnce(record, stage, context),
            {
                retriesFor: failure => retryBudget(failure, context.config.retryAttempts),
                retryGroup,
                baseDelay: context.config.retryBaseDelayMs,
                maxDelay: context.config.retryMaxDelayMs,
                backoffMultiplier: context.config.backoffMultiplier,
                operationName: `${stage} stage for candidate ${record.id}`,
                signal: context.signal,
                logger: this.logger
            }
        );

        if (outcome.ok) {
            return { status: 'succeeded', patch: outcome.value, attempts: outcome.attempts };
        }
        if (outcome.error.kind === 'JobCancelled') {
            return { status: 'cancelled', attempts: outcome.attempts };
        }

        this.logger.warn({
            batchId: context.batchId,
            candidateId: record.id,
            stage,
            kind: outcome.error.kind,
            attempts: outcome.attempts
        }, `${stage} stage failed permanently`);

        return { status: 'failed', error: outcome.error, attempts: outcome.attempts };
    }

    private async runOnce(record: Readonly<CandidateRecord>, stage: Stage, context: StageContext): Promise<Result<CandidatePatch>> {
        switch (stage) {
            case 'extract':
                return this.extractText(record);
            case 'parse':
                return this.parseProfile(record, context);
            case 'score':
                return this.scoreCandidate(record, context);
            case 'questions':
                return this.generateQuestions(context);
        }
    }

    private async extractText(record: Readonly<CandidateRecord>): Promise<Result<CandidatePatch>> {
        try {
            const extracted = await this.extractor.extract(record.sourceRef);
            if (!extracted.ok) {
                return extracted;
            }
            return { ok: true, value: { rawText: extracted.value } };
        } catch (error) {
            return {
                ok: false,
                error: { kind: 'IOError', message: error instanceof Error ? error.message : String(error) }
            };
        }
    }

    private async parseProfile(record: Readonly<CandidateRecord>, context: StageContext): Promise<Result<CandidatePatch>> {
        const parsed = await this.callModel(() => this.modelClient.invoke(
            'profile-extraction',
            { candidateText: record.rawText },
            context.config.timeoutMs
        ));
        if (!parsed.ok) {
            return parsed;
        }
        return { ok: true, value: { profile: parsed.value } };
    }

    private async scoreCandidate(record: Readonly<CandidateRecord>, context: StageContext): Promise<Result<CandidatePatch>> {
        const candidateProfile = record.profile ? JSON.stringify(record.profile, null, 2) : record.rawText;

        const scored = await this.callModel(() => this.modelClient.invoke(
            'scoring',
            { jobDescription: context.jobDescription, candidateProfile },
            context.config.timeoutMs
        ));
        if (!scored.ok) {
            return scored;
        }

        const { score, recommendation, reasoning, strengths, concerns } = scored.value;
        return { ok: true, value: { score, recommendation, reasoning, strengths, concerns } };
    }

    private async generateQuestions(context: StageContext): Promise<Result<CandidatePatch>> {
        const generated = await this.callModel(() => this.modelClient.invoke(
            'question-generation',
            { jobDescription: context.jobDescription },
            context.config.timeoutMs
        ));
        if (!generated.ok) {
            return generated;
        }
        return { ok: true, value: { questions: generated.value } };
    }

    /**
     * A client that throws instead of returning a failure is treated as
     * an unreachable service.
     */
    private async callModel<T>(call: () => Promise<Result<T, ModelFailure>>): Promise<Result<T, ModelFailure>> {
        try {
            return await call();
        } catch (error) {
            return {
                ok: false,
                error: { kind: 'Unreachable', message: error instanceof Error ? error.message : String(error) }
            };
        }
    }
}
