import { logger as defaultLogger, ILogger } from '../config/logger';
import type { PipelineFailure, Result } from '../types/errors';

export interface RetryOptions {
    /** Retries allowed after a failure of this kind (0 = give up). */
    retriesFor: (failure: PipelineFailure) => number;
    /** Failures sharing a group draw on one budget; defaults to the kind. */
    retryGroup?: (failure: PipelineFailure) => string;
    baseDelay?: number;
    maxDelay?: number;
    backoffMultiplier?: number;
    operationName?: string;
    signal?: AbortSignal;
    logger?: ILogger;
}

export type RetryOutcome<T> =
    | { ok: true; value: T; attempts: number }
    | { ok: false; error: PipelineFailure; attempts: number };

export interface IRetryUtil {
    executeWithRetry<T>(
        operation: (attempt: number) => Promise<Result<T>>,
        options: RetryOptions
    ): Promise<RetryOutcome<T>>;
}

/**
 * Retry Utility
 *
 * Runs an operation that reports failure as a value, retrying with
 * exponential backoff while the failure kind still has retry budget.
 * Retries are counted per group, so spending retries on one kind of
 * failure leaves the budget of another untouched. Cancellation is checked before every retry; a cancelled loop
 * reports a `JobCancelled` failure.
 */
export class RetryUtil {
    static async executeWithRetry<T>(
        operation: (attempt: number) => Promise<Result<T>>,
        options: RetryOptions
    ): Promise<RetryOutcome<T>> {
        const {
            retriesFor,
            retryGroup = failure => failure.kind,
            baseDelay = 1000,
            maxDelay = 10000,
            backoffMultiplier = 2,
            operationName = 'operation',
            signal,
            logger = defaultLogger
        } = options;

        const spent = new Map<string, number>();

        for (let attempt = 1; ; attempt++) {
            logger.debug({
                operation: operationName,
                attempt
            }, `Executing ${operationName} (attempt ${attempt})`);

            const result = await operation(attempt);

            if (result.ok) {
                if (attempt > 1) {
                    logger.info({
                        operation: operationName,
                        attempt
                    }, `${operationName} succeeded on attempt ${attempt}`);
                }
                return { ok: true, value: result.value, attempts: attempt };
            }

            const failure = result.error;
            const group = retryGroup(failure);
            const retriesUsed = spent.get(group) ?? 0;
            const allowed = retriesFor(failure);

            logger.warn({
                operation: operationName,
                attempt,
                kind: failure.kind,
                error: failure.message,
                isRetryable: allowed > 0
            }, `${operationName} failed on attempt ${attempt}`);

            if (retriesUsed >= allowed) {
                logger.error({
                    operation: operationName,
                    attempts: attempt,
                    kind: failure.kind,
                    error: failure.message
                }, `${operationName} failed after ${attempt} attempt(s)`);
                return { ok: false, error: failure, attempts: attempt };
            }

            if (signal?.aborted) {
                return RetryUtil.cancelled(operationName, attempt);
            }

            spent.set(group, retriesUsed + 1);
            const delay = RetryUtil.backoffDelay(attempt, baseDelay, maxDelay, backoffMultiplier);

            logger.info({
                operation: operationName,
                attempt,
                delay
            }, `Retrying ${operationName} in ${delay}ms`);

            await RetryUtil.sleep(delay, signal);

            if (signal?.aborted) {
                return RetryUtil.cancelled(operationName, attempt);
            }
        }
    }

    /**
     * Delay before the retry that follows `attempt`.
     */
    static backoffDelay(attempt: number, baseDelay: number, maxDelay: number, backoffMultiplier: number): number {
        return Math.min(baseDelay * Math.pow(backoffMultiplier, attempt - 1), maxDelay);
    }

    private static cancelled(operationName: string, attempts: number): RetryOutcome<never> {
        return {
            ok: false,
            error: { kind: 'JobCancelled', message: `${operationName} cancelled before retry` },
            attempts
        };
    }

    /**
     * Sleep for specified milliseconds, waking early on abort
     */
    private static sleep(ms: number, signal?: AbortSignal): Promise<void> {
        return new Promise(resolve => {
            const timer = setTimeout(done, ms);
            signal?.addEventListener('abort', done, { once: true });

            function done(): void {
                clearTimeout(timer);
                signal?.removeEventListener('abort', done);
                resolve();
            }
        });
    }
}
