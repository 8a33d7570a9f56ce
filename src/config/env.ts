import 'dotenv/config';
import { envSchema, formatEnvIssues, type Env } from './envSchema.js';

function loadEnv(): Env {
    const parsed = envSchema.safeParse(process.env);
    if (parsed.success) return parsed.data;
    console.error(formatEnvIssues(parsed.error));
    process.exit(1);
}

export const env: Env = loadEnv();
export type { Env };
