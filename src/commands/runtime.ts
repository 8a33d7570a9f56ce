/**
 * src/commands/runtime.ts
 *
 * Wires the validated environment into the pieces every command shares:
 * the pool, the location store, the portal client and the session manager.
 */

import type pkg from 'pg';
import { log, LogLevel } from 'crawlee';
import type { Env } from '../config/envSchema.js';
import { policyFromEnv, type RunPolicy } from '../config/policy.js';
import { PgLocationStore } from '../locations/pgLocationStore.js';
import { PortalTransport } from '../portal/httpTransport.js';
import { PortalClient } from '../portal/portalClient.js';
import { SessionManager } from '../session/sessionManager.js';
import { createPool } from '../utils/db.js';

export interface Runtime {
    env: Env;
    policy: RunPolicy;
    pool: pkg.Pool;
    store: PgLocationStore;
    client: PortalClient;
    session: SessionManager;
    close(): Promise<void>;
}

export function createRuntime(env: Env): Runtime {
    const policy = policyFromEnv(env);
    const pool = createPool(env);
    const client = new PortalClient(new PortalTransport({
        baseUrl: env.PORTAL_BASE_URL,
        proxyUrl: env.PORTAL_PROXY_URL,
        timeoutMs: policy.requestTimeoutMs,
    }));

    return {
        env,
        policy,
        pool,
        store: new PgLocationStore(pool),
        client,
        session: new SessionManager({ probe: client, defaultTtlMs: policy.sessionTtlMs }),
        close: () => pool.end(),
    };
}

const LEVELS: Record<string, LogLevel> = {
    DEBUG: LogLevel.DEBUG,
    INFO: LogLevel.INFO,
    WARNING: LogLevel.WARNING,
    ERROR: LogLevel.ERROR,
    OFF: LogLevel.OFF,
};

/** `--verbose` wins over CRAWLEE_LOG_LEVEL; unknown names keep the default. */
export function applyLogLevel(configured: string, verbose: boolean): void {
    if (verbose) {
        log.setLevel(LogLevel.DEBUG);
        return;
    }
    const level = LEVELS[configured.trim().toUpperCase()];
    if (level !== undefined) log.setLevel(level);
    else if (configured.trim()) log.warning(`[CLI] Unknown CRAWLEE_LOG_LEVEL "${configured}", keeping INFO`);
}

/** First Ctrl+C asks for a cooperative stop; a second one exits at once. */
export function cancelOnSigint(): AbortSignal {
    const controller = new AbortController();
    process.on('SIGINT', () => {
        if (controller.signal.aborted) {
            log.warning('[CLI] Second interrupt, exiting now');
            process.exit(130);
        }
        log.warning('[CLI] Interrupt received, stopping after the current request (Ctrl+C again to force)');
        controller.abort();
    });
    return controller.signal;
}
