/**
 * src/captcha/pollingResolver.ts
 *
 * Shared submit → poll → timeout loop for third-party solving services.
 * Subclasses only describe how to submit an image and how to read one
 * poll response; the loop, the deadline and error wrapping live here.
 */

import { log } from 'crawlee';
import { CaptchaServiceError, CaptchaTimeout, errorMessage } from '../errors.js';
import type { CaptchaChallenge, CaptchaSolution } from '../portal/types.js';
import { sleep } from '../utils/backoff.js';
import type { CaptchaResolver } from './types.js';

export interface PollingResolverOptions {
    apiKey: string;
    pollIntervalMs?: number;
    timeoutMs?: number;
    requestTimeoutMs?: number;
    now?: () => number;
}

export type PollResult =
    | { ready: false }
    | { ready: true; text: string; cost?: number };

export abstract class PollingCaptchaResolver implements CaptchaResolver {
    abstract readonly name: string;

    protected readonly apiKey: string;
    protected readonly pollIntervalMs: number;
    protected readonly timeoutMs: number;
    protected readonly requestTimeoutMs: number;
    private readonly now: () => number;

    constructor(options: PollingResolverOptions) {
        this.apiKey = options.apiKey;
        this.pollIntervalMs = options.pollIntervalMs ?? 5_000;
        this.timeoutMs = options.timeoutMs ?? 120_000;
        this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
        this.now = options.now ?? Date.now;
    }

    /** Submits the base64 image and returns the service's task id. */
    protected abstract submit(imageBase64: string): Promise<string>;

    /** `budgetMs` caps the poll request so it cannot outlive the solve deadline. */
    protected abstract poll(taskId: string, budgetMs: number): Promise<PollResult>;

    /** Per-solve cost when the service does not report one. */
    protected defaultCost(): number {
        return 0;
    }

    abstract getBalance(): Promise<number>;

    /**
     * Gives up with CaptchaTimeout once `timeoutMs` has passed since submit,
     * including when a poll is still in flight or answers after the deadline.
     */
    async solve(challenge: CaptchaChallenge): Promise<CaptchaSolution> {
        const taskId = await this.guard(() => this.submit(challenge.image.toString('base64')));
        log.info(`[Captcha] Submitted to ${this.name}, task ${taskId}`);

        const deadline = this.now() + this.timeoutMs;
        for (;;) {
            await sleep(Math.min(this.pollIntervalMs, Math.max(0, deadline - this.now())));
            const remaining = deadline - this.now();
            if (remaining <= 0) break;

            let result: PollResult;
            try {
                result = await this.poll(taskId, remaining);
            } catch (err) {
                if (remaining < this.requestTimeoutMs && isTimeoutError(err)) break;
                throw this.wrap(err);
            }
            if (this.now() >= deadline) break;

            if (result.ready) {
                log.info(`[Captcha] Solved by ${this.name}: ${result.text}`);
                return {
                    challengeId: challenge.challengeId,
                    text: result.text,
                    cost: result.cost ?? this.defaultCost(),
                };
            }
        }

        throw new CaptchaTimeout(this.name, this.timeoutMs);
    }

    // ─── HTTP helpers ───────────────────────────────────────────────────────

    protected async requestJson(url: string, init: RequestInit = {}, budgetMs = this.requestTimeoutMs): Promise<unknown> {
        const timeoutMs = Math.max(1, Math.min(this.requestTimeoutMs, budgetMs));
        const response = await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
        if (!response.ok) {
            throw new CaptchaServiceError(this.name, `HTTP ${response.status}`);
        }
        const text = await response.text();
        try {
            return JSON.parse(text);
        } catch {
            throw new CaptchaServiceError(this.name, `non-JSON response: ${text.slice(0, 200)}`);
        }
    }

    private async guard<T>(fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (err) {
            throw this.wrap(err);
        }
    }

    private wrap(err: unknown): CaptchaServiceError {
        if (err instanceof CaptchaServiceError) return err;
        return new CaptchaServiceError(this.name, errorMessage(err), { cause: err });
    }
}

/** `AbortSignal.timeout` rejects fetch with a DOMException named TimeoutError. */
function isTimeoutError(err: unknown): boolean {
    return err instanceof Error && err.name === 'TimeoutError';
}
