/**
 * src/errors.ts
 *
 * Error taxonomy shared by the crawler, the session layer, the CAPTCHA
 * backends and the search orchestrator.
 *
 * Every class sets a stable `name` so outcomes can record the kind of
 * failure without holding on to the error object itself.
 */

import type { LocationLevel } from './locations/types.js';

export class FetchFailure extends Error {
    override readonly name = 'FetchFailure';

    constructor(
        message: string,
        readonly endpoint: string,
        readonly attempts: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

export class ReferentialIntegrityError extends Error {
    override readonly name = 'ReferentialIntegrityError';

    constructor(
        readonly level: LocationLevel,
        readonly code: number,
        readonly parentCode: number
    ) {
        super(`Cannot write ${level} ${code}: parent ${parentCode} is not stored`);
    }
}

export class CaptchaTimeout extends Error {
    override readonly name = 'CaptchaTimeout';

    constructor(readonly backend: string, readonly timeoutMs: number) {
        super(`${backend} did not return a solution within ${Math.round(timeoutMs / 1000)}s`);
    }
}

export class CaptchaServiceError extends Error {
    override readonly name = 'CaptchaServiceError';

    constructor(readonly backend: string, message: string, options?: { cause?: unknown }) {
        super(`${backend}: ${message}`, options);
    }
}

/** Raised once the session is gone; only an out-of-band login recovers from it. */
export class SessionExpired extends Error {
    override readonly name = 'SessionExpired';

    constructor(readonly reason: string) {
        super(`Session expired (${reason}). Log in again and refresh the session file.`);
    }
}

export class RemoteSearchError extends Error {
    override readonly name = 'RemoteSearchError';

    constructor(message: string, readonly status: number | null = null, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export class InvalidFilterError extends Error {
    override readonly name = 'InvalidFilterError';
}

export class InvalidSessionArtifact extends Error {
    override readonly name = 'InvalidSessionArtifact';
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export function errorName(err: unknown): string {
    return err instanceof Error ? err.name : 'Error';
}
