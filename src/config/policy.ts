/**
 * src/config/policy.ts
 *
 * Timing and retry policy for crawls and search runs. Built once from the
 * validated environment and handed to components through RunContext.
 */

import type { BackoffPolicy } from '../utils/backoff.js';
import type { Env } from './envSchema.js';

export interface RunPolicy {
    crawlBackoff: BackoffPolicy;
    /** Hierarchy requests in flight at once. */
    crawlConcurrency: number;
    /** Pause after each village-list request (the portal's implicit rate limit). */
    villageDelayMs: number;
    /** Pause between search targets. */
    searchDelayMs: number;
    /** Applied to search calls that fail in transport (no response at all). */
    searchBackoff: BackoffPolicy;
    reuseCaptcha: boolean;
    sessionTtlMs: number;
    captchaPollIntervalMs: number;
    captchaTimeoutMs: number;
    requestTimeoutMs: number;
}

export const DEFAULT_POLICY: RunPolicy = {
    crawlBackoff: { maxAttempts: 3, baseDelayMs: 1_000, multiplier: 2, maxDelayMs: 60_000 },
    crawlConcurrency: 4,
    villageDelayMs: 200,
    searchDelayMs: 1_500,
    searchBackoff: { maxAttempts: 1, baseDelayMs: 2_000, multiplier: 2, maxDelayMs: 30_000 },
    reuseCaptcha: false,
    sessionTtlMs: 60 * 60_000,
    captchaPollIntervalMs: 5_000,
    captchaTimeoutMs: 120_000,
    requestTimeoutMs: 30_000,
};

export function policyFromEnv(env: Env): RunPolicy {
    return {
        crawlBackoff: {
            ...DEFAULT_POLICY.crawlBackoff,
            maxAttempts: env.CRAWL_MAX_ATTEMPTS,
            baseDelayMs: env.CRAWL_BASE_DELAY_MS,
            multiplier: env.CRAWL_BACKOFF_MULTIPLIER,
        },
        crawlConcurrency: env.CRAWL_CONCURRENCY,
        villageDelayMs: env.CRAWL_VILLAGE_DELAY_MS,
        searchDelayMs: env.SEARCH_DELAY_MS,
        searchBackoff: { ...DEFAULT_POLICY.searchBackoff, maxAttempts: env.SEARCH_MAX_ATTEMPTS },
        reuseCaptcha: env.SEARCH_REUSE_CAPTCHA,
        sessionTtlMs: env.SESSION_TTL_MINUTES * 60_000,
        captchaPollIntervalMs: env.CAPTCHA_POLL_INTERVAL_MS,
        captchaTimeoutMs: env.CAPTCHA_TIMEOUT_MS,
        requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    };
}
