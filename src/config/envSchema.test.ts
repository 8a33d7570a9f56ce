import { describe, it, expect } from 'vitest';
import { envSchema, formatEnvIssues } from './envSchema.js';
import { DEFAULT_POLICY, policyFromEnv } from './policy.js';

describe('envSchema', () => {
    it('fills defaults for an empty environment', () => {
        const env = envSchema.parse({});

        expect(env).toMatchObject({
            PGHOST: 'localhost',
            PGPORT: 5432,
            PGDATABASE: 'ec_search',
            PGSSL: false,
            CRAWL_MAX_ATTEMPTS: 3,
            CRAWL_CONCURRENCY: 4,
            SEARCH_REUSE_CAPTCHA: false,
            CAPTCHA_SERVICE: 'manual',
            RESULT_SINK: 'postgres',
        });
        expect(env.DATABASE_URL).toBeUndefined();
    });

    it('parses the string forms env files use', () => {
        const env = envSchema.parse({
            PGPORT: '6543',
            PGSSL: 'TRUE',
            SEARCH_REUSE_CAPTCHA: ' true ',
            CRAWL_VILLAGE_DELAY_MS: '250',
            DATABASE_URL: '   ',
        });

        expect(env.PGPORT).toBe(6543);
        expect(env.PGSSL).toBe(true);
        expect(env.SEARCH_REUSE_CAPTCHA).toBe(true);
        expect(env.CRAWL_VILLAGE_DELAY_MS).toBe(250);
        expect(env.DATABASE_URL).toBeUndefined();
    });

    it('requires an API key for a service CAPTCHA backend', () => {
        const parsed = envSchema.safeParse({ CAPTCHA_SERVICE: '2captcha' });

        expect(parsed.success).toBe(false);
        if (!parsed.success) {
            expect(formatEnvIssues(parsed.error)).toBe(
                'Invalid environment variables:\n- CAPTCHA_API_KEY: Required when CAPTCHA_SERVICE is "2captcha"'
            );
        }
        expect(envSchema.safeParse({ CAPTCHA_SERVICE: '2captcha', CAPTCHA_API_KEY: 'test-key' }).success).toBe(true);
    });

    it('rejects a zero worker count', () => {
        const parsed = envSchema.safeParse({ CRAWL_CONCURRENCY: '0' });

        expect(parsed.success).toBe(false);
        if (!parsed.success) {
            expect(parsed.error.issues.map((i) => i.path.join('.'))).toEqual(['CRAWL_CONCURRENCY']);
        }
    });
});

describe('policyFromEnv', () => {
    it('maps the numeric keys onto one policy', () => {
        const policy = policyFromEnv(envSchema.parse({
            CRAWL_MAX_ATTEMPTS: '5',
            SEARCH_MAX_ATTEMPTS: '2',
            SESSION_TTL_MINUTES: '30',
            SEARCH_DELAY_MS: '0',
        }));

        expect(policy.crawlBackoff).toEqual({ maxAttempts: 5, baseDelayMs: 1_000, multiplier: 2, maxDelayMs: 60_000 });
        expect(policy.searchBackoff).toEqual({ ...DEFAULT_POLICY.searchBackoff, maxAttempts: 2 });
        expect(policy.sessionTtlMs).toBe(30 * 60_000);
        expect(policy.searchDelayMs).toBe(0);
    });

    it('matches the defaults when nothing is set', () => {
        expect(policyFromEnv(envSchema.parse({}))).toEqual(DEFAULT_POLICY);
    });
});
