/**
 * Error taxonomy for the screening pipeline.
 *
 * Per-candidate failures are values, not exceptions: they travel inside
 * `Result` objects and end up on the candidate record. Only configuration
 * problems detected before a batch starts are thrown.
 */

// Extraction-time, never retried
export type ExtractionErrorKind = 'UnsupportedFormat' | 'CorruptFile' | 'IOError';

// Inference transport and schema failures
export type ModelErrorKind = 'Unreachable' | 'Timeout' | 'InvalidResponse';

export type PipelineErrorKind = ExtractionErrorKind | ModelErrorKind | 'JobCancelled';

export interface PipelineFailure<K extends PipelineErrorKind = PipelineErrorKind> {
    kind: K;
    message: string;
}

export type ExtractionFailure = PipelineFailure<ExtractionErrorKind>;
export type ModelFailure = PipelineFailure<ModelErrorKind>;

export type Result<T, E = PipelineFailure> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function fail<K extends PipelineErrorKind>(kind: K, message: string): { ok: false; error: PipelineFailure<K> } {
    return { ok: false, error: { kind, message } };
}

/**
 * Raised when a batch cannot start: invalid settings, an unreachable
 * inference endpoint, or a model the service does not offer.
 */
export class ConfigurationError extends Error {
    constructor(message: string, public readonly details?: Record<string, unknown>) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Raised on an illegal candidate state change. Indicates a scheduling bug,
 * never an inference or extraction problem.
 */
export class InvalidTransitionError extends Error {
    constructor(public readonly from: string, public readonly to: string) {
        super(`Invalid candidate state transition: ${from} -> ${to}`);
        this.name = 'InvalidTransitionError';
    }
}
