import { FileSessionAcquirer, saveSession } from '../session/sessionFile.js';
import type { SessionCookie } from '../session/sessionManager.js';
import type { Runtime } from './runtime.js';
import { print } from '../utils/fileLogger.js';

export async function runSessionShowCommand(rt: Runtime): Promise<void> {
    await rt.session.load(new FileSessionAcquirer(rt.env.SESSION_FILE, rt.policy.sessionTtlMs));
    const validation = await rt.session.validate();
    const preview = rt.session.preview();

    print(`Session file : ${rt.env.SESSION_FILE}`);
    print(`State        : ${preview.state}`);
    print(`Token        : ${preview.tokenPreview}`);
    print(`Cookies      : ${preview.cookieCount}`);
    print(`Acquired at  : ${preview.acquiredAt ?? '-'}`);
    print(`Remaining    : ${Math.round(preview.remainingMs / 60_000)} min`);
    print(`Validation   : ${validation.valid ? 'OK' : 'FAILED'} (${validation.message})`);
    if (!validation.valid) process.exitCode = 1;
}

/** `name=value` → cookie. */
export function parseCookie(raw: string): SessionCookie {
    const eq = raw.indexOf('=');
    if (eq <= 0) throw new Error(`Cookie "${raw}" is not in name=value form`);
    return { name: raw.slice(0, eq).trim(), value: raw.slice(eq + 1).trim() };
}

export async function runSessionSaveCommand(rt: Runtime, token: string | undefined, cookies: string[]): Promise<void> {
    const artifact = rt.session.activate({ authToken: token, cookies: cookies.map(parseCookie) });
    await saveSession(rt.env.SESSION_FILE, artifact);
    print(`Session saved to ${rt.env.SESSION_FILE} (token ${rt.session.preview().tokenPreview}, ${artifact.cookies.length} cookie(s))`);
}
