import { z, type ZodError } from 'zod';
import * as path from 'path';

const boolStrictTrue = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() === 'true';
    return v;
}, z.boolean());

const numFromEnv = z.preprocess((v) => {
    if (v === undefined || v === '') return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().finite());

const positiveInt = z.preprocess((v) => {
    if (v === undefined || v === '') return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().int().min(1));

const emptyAsUndefined = z.preprocess(
    (v) => (typeof v === 'string' && v.trim() === '' ? undefined : v),
    z.string().optional()
);

export const envSchema = z.object({
    DATABASE_URL: emptyAsUndefined,
    PGHOST: z.string().default('localhost'),
    PGPORT: z.coerce.number().int().min(1).max(65535).default(5432),
    PGUSER: emptyAsUndefined,
    PGPASSWORD: emptyAsUndefined,
    PGDATABASE: z.string().default('ec_search'),
    PGSSL: boolStrictTrue.default(false),
    PG_POOL_MAX: positiveInt.default(10),

    PORTAL_BASE_URL: z.string().url().default('https://kaveri.karnataka.gov.in'),
    PORTAL_PROXY_URL: emptyAsUndefined,
    REQUEST_TIMEOUT_MS: numFromEnv.default(30_000),

    CRAWL_MAX_ATTEMPTS: positiveInt.default(3),
    CRAWL_BASE_DELAY_MS: numFromEnv.default(1_000),
    CRAWL_BACKOFF_MULTIPLIER: numFromEnv.default(2),
    CRAWL_CONCURRENCY: positiveInt.default(4),
    CRAWL_VILLAGE_DELAY_MS: numFromEnv.default(200),

    SEARCH_DELAY_MS: numFromEnv.default(1_500),
    SEARCH_MAX_ATTEMPTS: positiveInt.default(1),
    SEARCH_REUSE_CAPTCHA: boolStrictTrue.default(false),

    SESSION_FILE: z.string().default(path.join(process.cwd(), 'storage', 'session.json')),
    SESSION_TTL_MINUTES: numFromEnv.default(60),

    CAPTCHA_SERVICE: z.enum(['manual', '2captcha', 'anticaptcha']).default('manual'),
    CAPTCHA_API_KEY: emptyAsUndefined,
    CAPTCHA_POLL_INTERVAL_MS: numFromEnv.default(5_000),
    CAPTCHA_TIMEOUT_MS: numFromEnv.default(120_000),
    CAPTCHA_COST_PER_SOLVE: numFromEnv.default(0),

    RESULT_SINK: z.enum(['postgres', 'dataset']).default('postgres'),
    CRAWLEE_STORAGE_DIR: z.string().default(path.join(process.cwd(), 'storage')),
    CRAWLEE_LOG_LEVEL: z.string().default(''),
}).passthrough().superRefine((env, ctx) => {
    if (env.CAPTCHA_SERVICE !== 'manual' && !env.CAPTCHA_API_KEY) {
        ctx.addIssue({
            code: 'custom',
            path: ['CAPTCHA_API_KEY'],
            message: `Required when CAPTCHA_SERVICE is "${env.CAPTCHA_SERVICE}"`,
        });
    }
});

export type Env = z.infer<typeof envSchema>;

export function formatEnvIssues(err: ZodError): string {
    const lines = err.issues.map((i) => {
        const key = i.path.join('.') || '(root)';
        return `- ${key}: ${i.message}`;
    });
    return 'Invalid environment variables:\n' + lines.join('\n');
}
