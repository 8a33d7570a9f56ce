/**
 * src/session/sessionFile.ts
 *
 * The external login flow (a browser window the operator drives) writes its
 * result to a JSON file:
 *
 * {
 *   "append_token": "<opaque token or null>",
 *   "cookies": [{ "name": "...", "value": "...", "domain": "..." }],
 *   "saved_at": "<ISO timestamp>"
 * }
 *
 * FileSessionAcquirer turns that file into a SessionArtifact. When
 * `saved_at` is missing the file's modification time stands in for it.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { InvalidSessionArtifact } from '../errors.js';
import type { SessionAcquirer, SessionArtifact } from './sessionManager.js';

const sessionFileSchema = z.object({
    append_token: z.string().nullish(),
    cookies: z.array(z.object({
        name: z.string(),
        value: z.string(),
        domain: z.string().nullish(),
    })).default([]),
    saved_at: z.string()
        .refine((s) => !Number.isNaN(Date.parse(s)), 'saved_at is not a timestamp')
        .nullish(),
});

export class FileSessionAcquirer implements SessionAcquirer {
    constructor(
        private readonly filePath: string,
        private readonly ttlMs: number
    ) {}

    async acquireSession(): Promise<SessionArtifact> {
        let raw: string;
        try {
            raw = await fs.promises.readFile(this.filePath, 'utf-8');
        } catch (err) {
            throw new InvalidSessionArtifact(
                `No session file at ${this.filePath}. Log in through the browser flow first.`,
                { cause: err }
            );
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (err) {
            throw new InvalidSessionArtifact(`Session file ${this.filePath} is not valid JSON`, { cause: err });
        }

        const parsed = sessionFileSchema.safeParse(json);
        if (!parsed.success) {
            throw new InvalidSessionArtifact(
                `Session file ${this.filePath} has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`
            );
        }

        const acquiredAt = parsed.data.saved_at
            ? new Date(parsed.data.saved_at)
            : (await fs.promises.stat(this.filePath)).mtime;

        return {
            authToken: parsed.data.append_token ?? undefined,
            cookies: parsed.data.cookies.map((c) => ({
                name: c.name,
                value: c.value,
                ...(c.domain ? { domain: c.domain } : {}),
            })),
            acquiredAt,
            ttlMs: this.ttlMs,
        };
    }
}

/** Writes an artifact in the same format the login flow uses. */
export async function saveSession(filePath: string, artifact: SessionArtifact): Promise<void> {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    const body = {
        append_token: artifact.authToken ?? null,
        cookies: artifact.cookies,
        saved_at: artifact.acquiredAt.toISOString(),
    };
    // temp file, then rename
    const tmp = filePath + '.tmp';
    await fs.promises.writeFile(tmp, JSON.stringify(body, null, 2), 'utf-8');
    await fs.promises.rename(tmp, filePath);
}
