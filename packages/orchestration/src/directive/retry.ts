import { errorMessage } from '@baton/core';
import type { Logger, RetryConfig } from '@baton/core';

export interface RetryOptions extends RetryConfig {
    shouldRetry: (error: unknown) => boolean;
    logger: Logger;
    /** Server-requested minimum wait for this error, if any */
    retryAfterMs?: (error: unknown) => number | undefined;
    label?: string;
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

type BackoffPolicy = Pick<RetryConfig, 'baseDelayMs' | 'maxDelayMs'>;

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Exponential backoff with up to 10% jitter, capped at `maxDelayMs`.
 * `attempt` is zero-based: the delay before the first retry uses attempt 0.
 */
export function computeBackoffDelay(
    attempt: number,
    policy: BackoffPolicy,
    random: () => number = Math.random
): number {
    const exponential = policy.baseDelayMs * 2 ** attempt;
    const jitter = random() * 0.1 * exponential;
    return Math.min(Math.round(exponential + jitter), policy.maxDelayMs);
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error, or
 * `maxAttempts` calls have been made. The last error is rethrown.
 */
export async function withRetry<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions
): Promise<T> {
    const wait = options.sleep ?? sleep;
    const random = options.random ?? Math.random;
    const label = options.label ?? 'Operation';

    for (let attempt = 0; ; attempt++) {
        try {
            return await operation(attempt);
        } catch (error) {
            if (!options.shouldRetry(error) || attempt + 1 >= options.maxAttempts) {
                throw error;
            }

            const backoff = computeBackoffDelay(attempt, options, random);
            const requested = options.retryAfterMs?.(error);
            const delay =
                requested !== undefined
                    ? Math.min(Math.max(backoff, requested), options.maxDelayMs)
                    : backoff;

            options.logger.warn(
                `${label} failed (attempt ${attempt + 1}/${options.maxAttempts}), retrying in ${delay}ms: ${errorMessage(error)}`
            );
            await wait(delay);
        }
    }
}
