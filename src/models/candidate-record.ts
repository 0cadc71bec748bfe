import type { CandidateProfile, InterviewQuestion, Recommendation } from '../types/evaluation';
import type { PipelineFailure } from '../types/errors';
import { InvalidTransitionError } from '../types/errors';

/**
 * Candidate lifecycle.
 *
 * pending → extracting → parsing → scoring → generating_questions → completed
 * failed and cancelled are reachable from every non-terminal state.
 */
export const CandidateState = {
    Pending: 'pending',
    Extracting: 'extracting',
    Parsing: 'parsing',
    Scoring: 'scoring',
    GeneratingQuestions: 'generating_questions',
    Completed: 'completed',
    Failed: 'failed',
    Cancelled: 'cancelled'
} as const;

export type CandidateState = (typeof CandidateState)[keyof typeof CandidateState];

export type TerminalState = typeof CandidateState.Completed | typeof CandidateState.Failed | typeof CandidateState.Cancelled;

export type Stage = 'extract' | 'parse' | 'score' | 'questions';

export const STAGE_SEQUENCE: readonly Stage[] = ['extract', 'parse', 'score', 'questions'];

const STAGE_STATES: Record<Stage, CandidateState> = {
    extract: CandidateState.Extracting,
    parse: CandidateState.Parsing,
    score: CandidateState.Scoring,
    questions: CandidateState.GeneratingQuestions
};

// Forward order of the non-terminal states plus completed
const PROGRESSION: readonly CandidateState[] = [
    CandidateState.Pending,
    CandidateState.Extracting,
    CandidateState.Parsing,
    CandidateState.Scoring,
    CandidateState.GeneratingQuestions,
    CandidateState.Completed
];

/**
 * Opaque reference to an uploaded document. Only the extractor opens `path`.
 */
export interface DocumentHandle {
    path: string;
    name: string;
}

export interface CandidateRecord {
    readonly id: number;
    readonly sourceRef: DocumentHandle;
    rawText: string;
    profile: CandidateProfile | null;
    score: number | null;
    recommendation: Recommendation | null;
    reasoning: string;
    strengths: string[];
    concerns: string[];
    questions: InterviewQuestion[];
    state: CandidateState;
    error: PipelineFailure | null;
    attempts: number;
}

/**
 * Fields a successful stage may write.
 */
export type CandidatePatch = Partial<Pick<CandidateRecord,
    'rawText' | 'profile' | 'score' | 'recommendation' | 'reasoning' | 'strengths' | 'concerns' | 'questions'>>;

export function createCandidateRecord(id: number, sourceRef: DocumentHandle): CandidateRecord {
    return {
        id,
        sourceRef,
        rawText: '',
        profile: null,
        score: null,
        recommendation: null,
        reasoning: '',
        strengths: [],
        concerns: [],
        questions: [],
        state: CandidateState.Pending,
        error: null,
        attempts: 0
    };
}

export function isTerminal(state: CandidateState): state is TerminalState {
    return state === CandidateState.Completed
        || state === CandidateState.Failed
        || state === CandidateState.Cancelled;
}

export function stateForStage(stage: Stage): CandidateState {
    return STAGE_STATES[stage];
}

export function nextStage(stage: Stage): Stage | null {
    const index = STAGE_SEQUENCE.indexOf(stage);
    return STAGE_SEQUENCE[index + 1] ?? null;
}

/**
 * Only single forward steps, or a move to failed/cancelled from a
 * non-terminal state, are legal.
 */
export function canTransition(from: CandidateState, to: CandidateState): boolean {
    if (isTerminal(from)) {
        return false;
    }
    if (to === CandidateState.Failed || to === CandidateState.Cancelled) {
        return true;
    }
    return PROGRESSION.indexOf(to) === PROGRESSION.indexOf(from) + 1;
}

export function assertTransition(from: CandidateState, to: CandidateState): void {
    if (!canTransition(from, to)) {
        throw new InvalidTransitionError(from, to);
    }
}
