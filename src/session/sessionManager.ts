/**
 * src/session/sessionManager.ts
 *
 * Owns the one session artifact of a run (token and/or cookies produced by
 * the external, human-assisted login) and its lifecycle:
 *
 *   EMPTY ──activate()──▶ ACTIVE ──TTL elapsed / unauthorized──▶ EXPIRED
 *
 * Nothing here logs in. Once EXPIRED, the only way back to ACTIVE is a new
 * artifact from a fresh out-of-band login.
 */

import { log } from 'crawlee';
import { InvalidSessionArtifact, SessionExpired, errorMessage } from '../errors.js';
import type { SessionProbe } from '../portal/types.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface SessionCookie {
    name: string;
    value: string;
    domain?: string;
}

export interface SessionArtifact {
    authToken?: string;
    cookies: SessionCookie[];
    acquiredAt: Date;
    ttlMs: number;
}

export interface ArtifactInput {
    authToken?: string;
    cookies?: SessionCookie[];
    acquiredAt?: Date;
    ttlMs?: number;
}

export type SessionState = 'EMPTY' | 'ACTIVE' | 'EXPIRED';

export interface ValidationResult {
    valid: boolean;
    message: string;
}

export interface SessionPreview {
    state: SessionState;
    tokenPreview: string;
    cookieCount: number;
    acquiredAt: string | null;
    remainingMs: number;
}

/** The external login capability, e.g. FileSessionAcquirer. */
export interface SessionAcquirer {
    acquireSession(): Promise<SessionArtifact>;
}

export interface SessionManagerOptions {
    probe?: SessionProbe;
    defaultTtlMs?: number;
    now?: () => number;
}

const ONE_HOUR_MS = 60 * 60_000;

// ─── Manager ──────────────────────────────────────────────────────────────────

export class SessionManager {
    private current: SessionArtifact | null = null;
    private expiredReason: string | null = null;
    private readonly probe?: SessionProbe;
    private readonly defaultTtlMs: number;
    private readonly now: () => number;

    constructor(options: SessionManagerOptions = {}) {
        this.probe = options.probe;
        this.defaultTtlMs = options.defaultTtlMs ?? ONE_HOUR_MS;
        this.now = options.now ?? Date.now;
    }

    /**
     * Installs a new artifact. It needs a token or at least one cookie,
     * otherwise InvalidSessionArtifact is thrown and the state is unchanged.
     */
    activate(input: ArtifactInput): SessionArtifact {
        const authToken = input.authToken?.trim() || undefined;
        const cookies = input.cookies ?? [];
        if (!authToken && cookies.length === 0) {
            throw new InvalidSessionArtifact('Session artifact has neither a token nor any cookies');
        }

        this.current = {
            authToken,
            cookies: cookies.map((c) => ({ ...c })),
            acquiredAt: input.acquiredAt ?? new Date(this.now()),
            ttlMs: input.ttlMs ?? this.defaultTtlMs,
        };
        this.expiredReason = null;
        log.info(`[Session] Activated (token: ${previewToken(authToken)}, cookies: ${cookies.length})`);

        if (this.state === 'EXPIRED') {
            log.warning(`[Session] Artifact was already past its TTL when loaded`);
        }
        return this.current;
    }

    async load(acquirer: SessionAcquirer): Promise<SessionArtifact> {
        return this.activate(await acquirer.acquireSession());
    }

    get state(): SessionState {
        if (!this.current) return 'EMPTY';
        if (this.expiredReason !== null) return 'EXPIRED';
        if (this.now() - this.current.acquiredAt.getTime() > this.current.ttlMs) {
            this.expire('TTL elapsed');
            return 'EXPIRED';
        }
        return 'ACTIVE';
    }

    /** The live artifact, or SessionExpired when there is none. */
    requireActive(): SessionArtifact {
        const state = this.state;
        if (state === 'ACTIVE' && this.current) return this.current;
        throw new SessionExpired(state === 'EMPTY' ? 'no session loaded' : this.expiredReason ?? 'expired');
    }

    /** Called when a live call was answered with "unauthorized". */
    markUnauthorized(message: string): void {
        if (!this.current) return;
        this.expire(`unauthorized: ${message}`);
    }

    /**
     * Makes one lightweight authenticated call. Success leaves the state
     * untouched; an unauthorized answer expires the session; any other
     * failure is reported without changing state.
     */
    async validate(): Promise<ValidationResult> {
        const state = this.state;
        if (state === 'EMPTY') return { valid: false, message: 'No session loaded' };
        if (state === 'EXPIRED' || !this.current) {
            return { valid: false, message: `Session expired (${this.expiredReason ?? 'expired'})` };
        }
        if (!this.probe) return { valid: true, message: 'Session within TTL (no probe configured)' };

        try {
            const result = await this.probe.probe(this.current);
            if (result.kind === 'unauthorized') {
                this.markUnauthorized(result.message);
                return { valid: false, message: result.message };
            }
            return { valid: result.kind === 'ok', message: result.message };
        } catch (err) {
            return { valid: false, message: `Probe failed: ${errorMessage(err)}` };
        }
    }

    remainingMs(): number {
        if (!this.current || this.state !== 'ACTIVE') return 0;
        return Math.max(0, this.current.ttlMs - (this.now() - this.current.acquiredAt.getTime()));
    }

    preview(): SessionPreview {
        return {
            state: this.state,
            tokenPreview: previewToken(this.current?.authToken),
            cookieCount: this.current?.cookies.length ?? 0,
            acquiredAt: this.current?.acquiredAt.toISOString() ?? null,
            remainingMs: this.remainingMs(),
        };
    }

    private expire(reason: string): void {
        if (this.expiredReason !== null) return;
        this.expiredReason = reason;
        log.warning(`[Session] Expired: ${reason}`);
    }
}

export function previewToken(token: string | undefined): string {
    return token ? `${token.slice(0, 8)}...` : 'None';
}

/** Cookie header value for the artifact, empty string when it has none. */
export function cookieHeader(artifact: SessionArtifact): string {
    return artifact.cookies.map((c) => `${c.name}=${c.value}`).join('; ');
}
