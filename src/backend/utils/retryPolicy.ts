/**
 * Retry Policy
 *
 * A single reusable backoff policy shared by the embedding and answer
 * wrappers: bounded attempts, exponential delay with jitter, a cap on the
 * time spent before starting another attempt, and a predicate that decides which errors are worth
 * another attempt.
 *
 * The delay before attempt n+1 is
 *   min(baseDelayMs * 2^(n-1), maxDelayMs) * (1 - jitter * random())
 * so jitter only ever shortens a delay.
 */

export interface RetryPolicyConfig {
    /** Total attempts including the first one */
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    /** Fraction (0-1) of each delay that is randomized */
    jitter: number;
    /**
     * No wait begins, and so no new attempt starts, once this much time
     * would have elapsed. An attempt already running is bounded only by the
     * provider's own request timeout.
     */
    maxElapsedMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryPolicyConfig = {
    maxAttempts: 4,
    baseDelayMs: 500,
    maxDelayMs: 8000,
    jitter: 0.2,
    maxElapsedMs: 30000,
};

export type RetryPredicate = (error: unknown) => boolean;

/**
 * Called before sleeping ahead of the next attempt.
 */
export type RetryListener = (info: { attempt: number; delayMs: number; error: unknown }) => void;

/**
 * Clock and randomness are injectable so tests don't have to wait.
 */
export interface RetryRuntime {
    sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
    now: () => number;
    random: () => number;
}

export interface RetryRunOptions {
    signal?: AbortSignal;
    onRetry?: RetryListener;
}

/**
 * Raised when the caller's signal aborts a pending retry.
 */
export class RetryAbortedError extends Error {
    constructor(public readonly reason?: unknown) {
        super('Operation cancelled');
        this.name = 'RetryAbortedError';
    }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new RetryAbortedError(signal.reason));
            return;
        }

        const onAbort = (): void => {
            clearTimeout(timer);
            reject(new RetryAbortedError(signal?.reason));
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

const DEFAULT_RUNTIME: RetryRuntime = {
    sleep,
    now: () => Date.now(),
    random: () => Math.random(),
};

export class RetryPolicy {
    private readonly config: RetryPolicyConfig;

    constructor(
        config: Partial<RetryPolicyConfig> = {},
        private readonly isRetryable: RetryPredicate = () => true,
        private readonly runtime: RetryRuntime = DEFAULT_RUNTIME
    ) {
        this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
        if (!Number.isInteger(this.config.maxAttempts) || this.config.maxAttempts < 1) {
            throw new Error(`maxAttempts must be a positive integer, got ${this.config.maxAttempts}`);
        }
        if (this.config.jitter < 0 || this.config.jitter > 1) {
            throw new Error(`jitter must be between 0 and 1, got ${this.config.jitter}`);
        }
    }

    getConfig(): RetryPolicyConfig {
        return { ...this.config };
    }

    /**
     * Delay to wait after a failed attempt (1-based).
     */
    delayFor(attempt: number): number {
        const exponential = this.config.baseDelayMs * Math.pow(2, attempt - 1);
        const capped = Math.min(exponential, this.config.maxDelayMs);
        return Math.round(capped * (1 - this.config.jitter * this.runtime.random()));
    }

    /**
     * Runs the operation until it succeeds, the error isn't retryable, the
     * attempts run out or waiting for the next attempt would pass the
     * elapsed-time cap. The last error is rethrown as is. A result that
     * arrives after the cap is still returned.
     */
    async execute<T>(
        operation: (attempt: number) => Promise<T>,
        options: RetryRunOptions = {}
    ): Promise<T> {
        const { signal, onRetry } = options;
        const startedAt = this.runtime.now();

        for (let attempt = 1; ; attempt++) {
            if (signal?.aborted) {
                throw new RetryAbortedError(signal.reason);
            }

            try {
                return await operation(attempt);
            } catch (error) {
                if (signal?.aborted || attempt >= this.config.maxAttempts || !this.isRetryable(error)) {
                    throw error;
                }

                const delayMs = this.delayFor(attempt);
                const elapsed = this.runtime.now() - startedAt;
                if (elapsed + delayMs > this.config.maxElapsedMs) {
                    throw error;
                }

                onRetry?.({ attempt, delayMs, error });
                await this.runtime.sleep(delayMs, signal);
            }
        }
    }

    /**
     * Same policy with a different retryable-error predicate.
     */
    withPredicate(isRetryable: RetryPredicate): RetryPolicy {
        return new RetryPolicy(this.config, isRetryable, this.runtime);
    }
}
