import * as crypto from 'crypto';
import type { RunPolicy } from '../config/policy.js';
import type { LocationStore } from '../locations/locationStore.js';
import type { SessionManager } from '../session/sessionManager.js';

/**
 * Everything a crawl or a search run needs, passed explicitly instead of
 * living in module-level state.
 */
export interface RunContext {
    runId: string;
    startedAt: string;
    platform: string;
    policy: RunPolicy;
    store: LocationStore;
    session: SessionManager;
    /** Aborting requests a cooperative stop at the next safe point. */
    signal?: AbortSignal;
}

export interface RunContextInit {
    policy: RunPolicy;
    store: LocationStore;
    session: SessionManager;
    signal?: AbortSignal;
}

export function createRunContext(init: RunContextInit): RunContext {
    return {
        runId: crypto.randomUUID(),
        startedAt: new Date().toISOString(),
        platform: process.platform,
        ...init,
    };
}
