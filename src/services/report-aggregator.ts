import type { BatchJob } from '../models/batch-job';
import { CandidateRecord, CandidateState, TerminalState } from '../models/candidate-record';
import type { CandidateProfile, InterviewQuestion, Recommendation } from '../types/evaluation';
import type { PipelineErrorKind } from '../types/errors';

/**
 * Report shape handed to the presentation and export collaborators.
 * Keys are part of the output contract: absent values are null, never
 * omitted.
 */
export interface ReportEntry {
    id: number;
    source: string;
    state: TerminalState;
    score: number | null;
    recommendation: Recommendation | null;
    reasoning: string;
    strengths: string[];
    concerns: string[];
    profile: CandidateProfile | null;
    questions: InterviewQuestion[];
    attempts: number;
    error: { kind: PipelineErrorKind; message: string } | null;
}

export interface ReportMetadata {
    batch_id: string;
    total_candidates: number;
    counts: {
        completed: number;
        failed: number;
        cancelled: number;
    };
    model_used: string;
    timestamp: string;
    cancelled: boolean;
}

export interface BatchReport {
    metadata: ReportMetadata;
    results: ReportEntry[];
}

/**
 * Report Aggregator
 *
 * Ranks terminal records: completed candidates by score descending, then
 * failed and cancelled candidates. Input order breaks every tie.
 */
export class ReportAggregator {
    constructor(private now: () => Date = () => new Date()) { }

    buildReport(job: BatchJob, model: string, cancelled: boolean): BatchReport {
        const entries = job.records.map(record => this.toEntry(record));
        const ranked = ReportAggregator.rank(entries);

        return {
            metadata: {
                batch_id: job.id,
                total_candidates: entries.length,
                counts: {
                    completed: entries.filter(entry => entry.state === CandidateState.Completed).length,
                    failed: entries.filter(entry => entry.state === CandidateState.Failed).length,
                    cancelled: entries.filter(entry => entry.state === CandidateState.Cancelled).length
                },
                model_used: model,
                timestamp: this.now().toISOString(),
                cancelled
            },
            results: ranked
        };
    }

    /**
     * Stable ranking; `entries` must be in input order.
     */
    static rank(entries: readonly ReportEntry[]): ReportEntry[] {
        const scored = entries.filter(entry => entry.state === CandidateState.Completed && entry.score !== null);
        const unscored = entries.filter(entry => !(entry.state === CandidateState.Completed && entry.score !== null));

        const byScore = scored
            .map((entry, position) => ({ entry, position }))
            .sort((a, b) => (b.entry.score ?? 0) - (a.entry.score ?? 0) || a.position - b.position)
            .map(({ entry }) => entry);

        return [...byScore, ...unscored];
    }

    private toEntry(record: CandidateRecord): ReportEntry {
        return {
            id: record.id,
            source: record.sourceRef.name,
            state: ReportAggregator.terminalState(record),
            score: record.score,
            recommendation: record.recommendation,
            reasoning: record.reasoning,
            strengths: [...record.strengths],
            concerns: [...record.concerns],
            profile: record.profile,
            questions: record.state === CandidateState.Completed ? [...record.questions] : [],
            attempts: record.attempts,
            error: record.error ? { kind: record.error.kind, message: record.error.message } : null
        };
    }

    private static terminalState(record: CandidateRecord): TerminalState {
        switch (record.state) {
            case CandidateState.Completed:
            case CandidateState.Failed:
            case CandidateState.Cancelled:
                return record.state;
            default:
                // Only reachable if called before the batch drained
                return CandidateState.Cancelled;
        }
    }
}
