import { setTimeout as sleepFor } from 'timers/promises';
import { OperationCancelled, errorMessage, logger } from '@docqa/service-template';
import { RetryableStoreFailure } from '../errors';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryPolicyOptions {
    maxAttempts?: number;
    baseDelayMs?: number;
    /** Delay before attempt `attempt + 1`. Linear by default. */
    backoff?: (attempt: number, baseDelayMs: number) => number;
    isRetryable?: (err: unknown) => boolean;
    /** Per-attempt budget; exceeding it counts as a retryable timeout. */
    attemptTimeoutMs?: number;
    sleep?: Sleep;
}

export interface ExecuteOptions {
    signal?: AbortSignal;
    /** Used in log lines. */
    operation?: string;
    isRetryable?: (err: unknown) => boolean;
}

const defaultSleep: Sleep = async (ms, signal) => {
    await sleepFor(ms, undefined, { signal });
};

const cancelled = (signal: AbortSignal): OperationCancelled => {
    return new OperationCancelled('Operation cancelled', { cause: signal.reason });
};

export class RetryPolicy {
    readonly maxAttempts: number;
    readonly baseDelayMs: number;
    readonly attemptTimeoutMs: number;
    private readonly backoff: (attempt: number, baseDelayMs: number) => number;
    private readonly isRetryable: (err: unknown) => boolean;
    private readonly sleep: Sleep;

    constructor(options: RetryPolicyOptions = {}) {
        this.maxAttempts = options.maxAttempts ?? 3;
        this.baseDelayMs = options.baseDelayMs ?? 2000;
        this.attemptTimeoutMs = options.attemptTimeoutMs ?? 30000;
        this.backoff = options.backoff ?? ((attempt, base) => base * attempt);
        this.isRetryable = options.isRetryable ?? (err => err instanceof RetryableStoreFailure);
        this.sleep = options.sleep ?? defaultSleep;

        if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
            throw new RangeError(`maxAttempts must be a positive integer, got ${this.maxAttempts}`);
        }
    }

    delayFor(attempt: number): number {
        return this.backoff(attempt, this.baseDelayMs);
    }

    async execute<T>(fn: (attempt: number) => Promise<T>, options: ExecuteOptions = {}): Promise<T> {
        const { signal, operation = 'store operation' } = options;
        const isRetryable = options.isRetryable ?? this.isRetryable;

        for (let attempt = 1; ; attempt++) {
            if (signal?.aborted) throw cancelled(signal);

            try {
                return await this.withTimeout(fn(attempt), operation);
            } catch (err) {
                if (signal?.aborted) throw cancelled(signal);
                if (!isRetryable(err) || attempt >= this.maxAttempts) throw err;

                const delay = this.delayFor(attempt);
                logger.warn(`${operation} failed, retrying`, {
                    attempt,
                    max_attempts: this.maxAttempts,
                    delay_ms: delay,
                    error: errorMessage(err)
                });

                try {
                    await this.sleep(delay, signal);
                } catch (sleepErr) {
                    if (signal?.aborted) throw cancelled(signal);
                    throw sleepErr;
                }
            }
        }
    }

    private withTimeout<T>(work: Promise<T>, operation: string): Promise<T> {
        if (this.attemptTimeoutMs <= 0) return work;

        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                reject(new RetryableStoreFailure(`${operation} timed out after ${this.attemptTimeoutMs}ms`));
            }, this.attemptTimeoutMs);
        });

        return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
    }
}
