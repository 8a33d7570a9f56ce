/**
 * src/utils/backoff.ts
 *
 * One retry policy shared by every call site that retries: the hierarchy
 * crawler's fetches and the orchestrator's transport-failure path.
 *
 * Backoff formula:
 *   delay(attempt) = min(baseDelayMs × multiplier^(attempt - 1), maxDelayMs)
 *
 * `attempt` is 1-indexed and refers to the attempt that just failed, so the
 * default policy waits 1s, 2s before the second and third attempts.
 */

import { log } from 'crawlee';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface BackoffPolicy {
    maxAttempts: number;
    baseDelayMs: number;
    multiplier: number;
    maxDelayMs: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
    maxAttempts: 3,
    baseDelayMs: 1_000,
    multiplier: 2,
    maxDelayMs: 60_000,
};

export interface RetryOptions {
    /** Used in log lines, e.g. "talukas of district 12". */
    label: string;
    signal?: AbortSignal;
}

export class RetriesExhausted extends Error {
    override readonly name = 'RetriesExhausted';

    constructor(readonly label: string, readonly attempts: number, readonly lastError: unknown) {
        super(
            `${label}: failed after ${attempts} attempt(s): ` +
            (lastError instanceof Error ? lastError.message : String(lastError)),
            { cause: lastError }
        );
    }
}

// ─── Backoff Calculation ──────────────────────────────────────────────────────

export function getBackoffDelay(policy: BackoffPolicy, attempt: number): number {
    const exponential = policy.baseDelayMs * Math.pow(policy.multiplier, Math.max(0, attempt - 1));
    return Math.round(Math.min(exponential, policy.maxDelayMs));
}

// ─── Sleep ────────────────────────────────────────────────────────────────────

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve();
    return new Promise((resolve) => {
        const onAbort = (): void => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

// ─── Retry Loop ───────────────────────────────────────────────────────────────

/**
 * Runs `fn` until it resolves or the policy's attempts are spent.
 * Throws RetriesExhausted carrying the last error once they are.
 */
export async function retryWithBackoff<T>(
    fn: (attempt: number) => Promise<T>,
    policy: BackoffPolicy,
    options: RetryOptions
): Promise<T> {
    const maxAttempts = Math.max(1, policy.maxAttempts);
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            return await fn(attempt);
        } catch (err) {
            lastError = err;
            if (attempt === maxAttempts || options.signal?.aborted) break;

            const delayMs = getBackoffDelay(policy, attempt);
            log.warning(
                `[Backoff] ${options.label}: attempt ${attempt}/${maxAttempts} failed ` +
                `(${err instanceof Error ? err.message : String(err)}) | retrying in ${(delayMs / 1000).toFixed(1)}s`
            );
            await sleep(delayMs, options.signal);
        }
    }

    throw new RetriesExhausted(options.label, maxAttempts, lastError);
}
