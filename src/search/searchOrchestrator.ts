/**
 * src/search/searchOrchestrator.ts
 *
 * Drives one batch run: a party name and date range searched across an
 * ordered list of village targets, one target at a time.
 *
 * PER TARGET
 * ──────────
 *   1. Session must be ACTIVE, otherwise the run halts here.
 *   2. CAPTCHA: fresh challenge + solve (or the cached solution in reuse mode).
 *      A failed solve fails this target only.
 *   3. Authenticated search call. Calls that get no response at all are
 *      retried under policy.searchBackoff.
 *   4. ok → rows appended to the sink before moving on.
 *      unauthorized → session EXPIRED, run halts.
 *      invalid CAPTCHA → one fresh solve if the rejected one was reused.
 *      anything else → recorded against the target.
 *   5. Inter-target delay, then a cancellation check.
 *
 * Failures are reported in the outcome; only sink errors propagate.
 */

import * as crypto from 'crypto';
import { log } from 'crawlee';
import {
    CaptchaServiceError,
    RemoteSearchError,
    SessionExpired,
    errorMessage,
    errorName,
} from '../errors.js';
import type { CaptchaResolver } from '../captcha/types.js';
import { describeTarget, type SearchTarget } from '../locations/types.js';
import type { CaptchaSolution, SearchApi, SearchResponse } from '../portal/types.js';
import type { SessionArtifact } from '../session/sessionManager.js';
import { RetriesExhausted, retryWithBackoff, sleep } from '../utils/backoff.js';
import type { RunContext } from '../utils/runContext.js';
import type { ResultSink, SearchResult } from './resultStore.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface SearchParams {
    partyName: string;
    middleName?: string;
    lastName?: string;
    /** dd/MM/yyyy, passed to the portal as given. */
    fromDate: string;
    toDate: string;
}

export type TargetStatus = 'succeeded' | 'failed' | 'session-expired' | 'not-attempted';

export interface TargetOutcome {
    target: SearchTarget;
    status: TargetStatus;
    rows: number;
    /** `Name: message` of the error that ended this target, if any. */
    error?: string;
}

export interface TargetError {
    target: SearchTarget;
    errorName: string;
    message: string;
}

export type TerminationReason = 'session-expired' | 'cancelled';

export interface SearchRunOutcome {
    batchId: string;
    total: number;
    attempted: number;
    succeeded: number;
    rowsFound: number;
    errors: TargetError[];
    outcomes: TargetOutcome[];
    terminatedEarly: boolean;
    terminationReason: TerminationReason | null;
    captchaSolves: number;
    captchaCost: number;
    durationMs: number;
}

/** What one search call resolved to, once the CAPTCHA loop is done. */
type Settled =
    | { kind: 'ok'; response: Extract<SearchResponse, { kind: 'ok' }> }
    | { kind: 'failed'; error: Error }
    | { kind: 'unauthorized'; message: string };

// ─── Orchestrator ─────────────────────────────────────────────────────────────

export class SearchOrchestrator {
    /** Last accepted solution; only kept when reuse is on. */
    private cachedSolution: CaptchaSolution | null = null;
    private captchaSolves = 0;
    private captchaCost = 0;

    constructor(
        private readonly ctx: RunContext,
        private readonly api: SearchApi,
        private readonly resolver: CaptchaResolver,
        private readonly sink: ResultSink
    ) {}

    async run(targets: readonly SearchTarget[], params: SearchParams): Promise<SearchRunOutcome> {
        const startedAt = Date.now();
        const batchId = crypto.randomUUID();
        const reuse = this.ctx.policy.reuseCaptcha;
        this.cachedSolution = null;
        this.captchaSolves = 0;
        this.captchaCost = 0;

        const outcomes: TargetOutcome[] = targets.map((target): TargetOutcome => ({ target, status: 'not-attempted', rows: 0 }));
        const errors: TargetError[] = [];
        let terminationReason: TerminationReason | null = null;

        log.info(
            `[Search] Batch ${batchId}: "${params.partyName}" ${params.fromDate} → ${params.toDate} ` +
            `across ${targets.length} villages${reuse ? ' (reusing CAPTCHA)' : ''}`
        );

        for (let i = 0; i < targets.length; i++) {
            const target = targets[i];
            const outcome = outcomes[i];
            if (!target || !outcome) break;

            if (this.ctx.signal?.aborted) {
                terminationReason = 'cancelled';
                log.warning(`[Search] Cancelled before target ${i + 1}/${targets.length}`);
                break;
            }

            let session: SessionArtifact;
            try {
                session = this.ctx.session.requireActive();
            } catch (err) {
                if (!(err instanceof SessionExpired)) throw err;
                terminationReason = 'session-expired';
                log.error(`[Search] ${err.message}`);
                break;
            }

            log.info(`[Search] [${i + 1}/${targets.length}] ${describeTarget(target)}`);
            const settled = await this.searchTarget(target, params, session, reuse);

            if (settled.kind === 'unauthorized') {
                this.ctx.session.markUnauthorized(settled.message);
                const expired = new SessionExpired(`search rejected: ${settled.message}`);
                outcome.status = 'session-expired';
                outcome.error = `${expired.name}: ${expired.message}`;
                errors.push({ target, errorName: expired.name, message: expired.message });
                terminationReason = 'session-expired';
                log.error(`[Search] ✗ ${expired.message}`);
                break;
            }

            if (settled.kind === 'failed') {
                outcome.status = 'failed';
                outcome.error = `${errorName(settled.error)}: ${errorMessage(settled.error)}`;
                errors.push({ target, errorName: errorName(settled.error), message: errorMessage(settled.error) });
                log.warning(`[Search] ✗ ${target.villageName} (${target.villageCode}): ${outcome.error}`);
            } else {
                const recordedAt = new Date();
                const results: SearchResult[] = settled.response.rows.map((fields) => ({
                    batchId,
                    ...target,
                    partyName: params.partyName,
                    fromDate: params.fromDate,
                    toDate: params.toDate,
                    fields,
                    recordedAt,
                }));
                await this.sink.append(results);
                outcome.status = 'succeeded';
                outcome.rows = results.length;
                log.info(`[Search] ✓ ${target.villageName} (${target.villageCode}): ${results.length} row(s)`);
            }

            if (i < targets.length - 1) {
                await sleep(this.ctx.policy.searchDelayMs, this.ctx.signal);
            }
        }

        const summary = this.summarise(batchId, outcomes, errors, terminationReason, Date.now() - startedAt);
        logRunSummary(summary);
        return summary;
    }

    // ─── One target ─────────────────────────────────────────────────────────

    private async searchTarget(
        target: SearchTarget,
        params: SearchParams,
        session: SessionArtifact,
        reuse: boolean
    ): Promise<Settled> {
        let reused = reuse && this.cachedSolution !== null;
        let solution: CaptchaSolution;
        try {
            solution = this.cachedSolution && reuse ? this.cachedSolution : await this.solveFresh();
        } catch (err) {
            return { kind: 'failed', error: asError(err) };
        }

        for (;;) {
            let response: SearchResponse;
            try {
                response = await this.callSearch(target, params, session, solution);
            } catch (err) {
                return { kind: 'failed', error: asError(err) };
            }

            switch (response.kind) {
                case 'ok':
                    if (reuse) this.cachedSolution = solution;
                    return { kind: 'ok', response };
                case 'unauthorized':
                    return { kind: 'unauthorized', message: response.message };
                case 'error':
                    return { kind: 'failed', error: new RemoteSearchError(response.message, response.status) };
                case 'invalid-captcha':
                    this.cachedSolution = null;
                    if (!reused) {
                        return { kind: 'failed', error: new CaptchaServiceError(this.resolver.name, `solution rejected by the portal (${response.message})`) };
                    }
                    log.info(`[Search] Reused CAPTCHA rejected (${response.message}); solving a fresh one`);
                    try {
                        solution = await this.solveFresh();
                    } catch (err) {
                        return { kind: 'failed', error: asError(err) };
                    }
                    reused = false;
                    break;
            }
        }
    }

    private async solveFresh(): Promise<CaptchaSolution> {
        const challenge = await this.api.generateCaptcha();
        const solution = await this.resolver.solve(challenge);
        this.captchaSolves++;
        this.captchaCost += solution.cost;
        return solution;
    }

    /**
     * Retries only calls that produced no response at all. Not tied to the
     * run's signal: an in-flight target runs to completion.
     */
    private async callSearch(
        target: SearchTarget,
        params: SearchParams,
        session: SessionArtifact,
        solution: CaptchaSolution
    ): Promise<SearchResponse> {
        try {
            return await retryWithBackoff(() => this.api.search({
                villageCode: target.villageCode,
                partyName: params.partyName,
                middleName: params.middleName,
                lastName: params.lastName,
                fromDate: params.fromDate,
                toDate: params.toDate,
                captchaId: solution.challengeId,
                captchaText: solution.text,
            }, session), this.ctx.policy.searchBackoff, {
                label: `search in village ${target.villageCode}`,
            });
        } catch (err) {
            const cause = err instanceof RetriesExhausted ? err.lastError : err;
            throw new RemoteSearchError(`search call failed: ${errorMessage(err)}`, null, { cause });
        }
    }

    private summarise(
        batchId: string,
        outcomes: TargetOutcome[],
        errors: TargetError[],
        terminationReason: TerminationReason | null,
        durationMs: number
    ): SearchRunOutcome {
        const attempted = outcomes.filter((o) => o.status !== 'not-attempted').length;
        return {
            batchId,
            total: outcomes.length,
            attempted,
            succeeded: outcomes.filter((o) => o.status === 'succeeded').length,
            rowsFound: outcomes.reduce((sum, o) => sum + o.rows, 0),
            errors,
            outcomes,
            terminatedEarly: terminationReason !== null,
            terminationReason,
            captchaSolves: this.captchaSolves,
            captchaCost: this.captchaCost,
            durationMs,
        };
    }
}

function asError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}

function logRunSummary(s: SearchRunOutcome): void {
    log.info(`\n${'═'.repeat(60)}`);
    log.info(`  SEARCH ${s.terminatedEarly ? `STOPPED (${s.terminationReason})` : 'COMPLETE'}`);
    log.info(`  Targets   : ${s.attempted}/${s.total} attempted, ${s.succeeded} succeeded`);
    log.info(`  Rows      : ${s.rowsFound}`);
    log.info(`  CAPTCHA   : ${s.captchaSolves} solved, cost ${s.captchaCost.toFixed(4)}`);
    log.info(`  Errors    : ${s.errors.length}`);
    log.info(`  Duration  : ${(s.durationMs / 1000).toFixed(1)}s`);
    log.info(`${'═'.repeat(60)}\n`);
    if (s.terminationReason === 'session-expired') {
        log.error('[Search] Session expired: log in again, refresh the session file and re-run the remaining targets.');
    }
}
