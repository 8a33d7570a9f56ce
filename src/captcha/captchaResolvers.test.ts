import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { CaptchaServiceError, CaptchaTimeout } from '../errors.js';
import type { CaptchaChallenge } from '../portal/types.js';
import { AntiCaptchaResolver } from './antiCaptchaResolver.js';
import { createCaptchaResolver } from './index.js';
import { ManualCaptchaResolver } from './manualResolver.js';
import { TwoCaptchaResolver } from './twoCaptchaResolver.js';

const challenge: CaptchaChallenge = { challengeId: 'ch-1', image: Buffer.from('fake-png') };
const fastPolling = { apiKey: 'test-key', pollIntervalMs: 1, timeoutMs: 1_000 };

function json(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status });
}

function mockFetch(...responses: Response[]) {
    const spy = vi.spyOn(globalThis, 'fetch');
    for (const r of responses) spy.mockResolvedValueOnce(r);
    return spy;
}

afterEach(() => {
    vi.restoreAllMocks();
});

describe('TwoCaptchaResolver', () => {
    it('submits, polls until ready and prices the solve', async () => {
        const fetchSpy = mockFetch(
            json({ status: 1, request: 'task-1' }),
            json({ status: 0, request: 'CAPCHA_NOT_READY' }),
            json({ status: 1, request: 'abc12' }),
        );
        const resolver = new TwoCaptchaResolver({ ...fastPolling, costPerSolve: 0.003 });

        const solution = await resolver.solve(challenge);

        expect(solution).toEqual({ challengeId: 'ch-1', text: 'abc12', cost: 0.003 });
        expect(fetchSpy).toHaveBeenCalledTimes(3);

        const [submitUrl, submitInit] = fetchSpy.mock.calls[0] ?? [];
        expect(String(submitUrl)).toBe('https://2captcha.com/in.php');
        const body = submitInit?.body;
        expect(body).toBeInstanceOf(URLSearchParams);
        if (body instanceof URLSearchParams) {
            expect(body.get('method')).toBe('base64');
            expect(body.get('body')).toBe(Buffer.from('fake-png').toString('base64'));
        }
        expect(String(fetchSpy.mock.calls[1]?.[0])).toBe(
            'https://2captcha.com/res.php?key=test-key&action=get&id=task-1&json=1'
        );
    });

    it('surfaces a service error from a poll', async () => {
        mockFetch(
            json({ status: 1, request: 'task-1' }),
            json({ status: 0, request: 'ERROR_CAPTCHA_UNSOLVABLE' }),
        );
        const err = await new TwoCaptchaResolver(fastPolling).solve(challenge).catch((e: unknown) => e);

        expect(err).toBeInstanceOf(CaptchaServiceError);
        expect(err).toMatchObject({ backend: '2captcha', message: '2captcha: ERROR_CAPTCHA_UNSOLVABLE' });
    });

    it('treats an HTTP error as a service error', async () => {
        mockFetch(new Response('bad gateway', { status: 502 }));
        await expect(new TwoCaptchaResolver(fastPolling).solve(challenge))
            .rejects.toThrow('2captcha: HTTP 502');
    });

    it('times out when no solution arrives before the deadline', async () => {
        const spy = vi.spyOn(globalThis, 'fetch');
        spy.mockResolvedValueOnce(json({ status: 1, request: 'task-1' }));
        spy.mockImplementation(async () => json({ status: 0, request: 'CAPCHA_NOT_READY' }));

        let t = 0;
        const resolver = new TwoCaptchaResolver({ ...fastPolling, timeoutMs: 100, now: () => (t += 30) });

        await expect(resolver.solve(challenge)).rejects.toBeInstanceOf(CaptchaTimeout);
    });

    it('discards an answer that arrives after the deadline', async () => {
        let t = 0;
        const spy = mockFetch(json({ status: 1, request: 'task-1' }));
        spy.mockImplementationOnce(async () => {
            t += 400;
            return json({ status: 1, request: 'late' });
        });
        const resolver = new TwoCaptchaResolver({ ...fastPolling, timeoutMs: 100, now: () => t });

        await expect(resolver.solve(challenge)).rejects.toBeInstanceOf(CaptchaTimeout);
        expect(spy).toHaveBeenCalledTimes(2);
    });

    it('cuts a hanging poll off at the deadline', async () => {
        const spy = mockFetch(json({ status: 1, request: 'task-1' }));
        spy.mockImplementation((_input, init) => new Promise<Response>((_resolve, reject) => {
            const signal = init?.signal;
            if (!signal) return;
            signal.addEventListener('abort', () => reject(signal.reason));
        }));
        const resolver = new TwoCaptchaResolver({ ...fastPolling, timeoutMs: 50, requestTimeoutMs: 30_000 });

        const startedAt = Date.now();
        await expect(resolver.solve(challenge)).rejects.toBeInstanceOf(CaptchaTimeout);
        expect(Date.now() - startedAt).toBeLessThan(5_000);
    });

    it('reads the account balance', async () => {
        mockFetch(json({ status: 1, request: '12.5' }));
        expect(await new TwoCaptchaResolver(fastPolling).getBalance()).toBe(12.5);
    });
});

describe('AntiCaptchaResolver', () => {
    it('creates an image task and takes the reported cost', async () => {
        const fetchSpy = mockFetch(
            json({ errorId: 0, taskId: 7 }),
            json({ errorId: 0, status: 'processing' }),
            json({ errorId: 0, status: 'ready', solution: { text: 'xyz99' }, cost: '0.0007' }),
        );

        const solution = await new AntiCaptchaResolver(fastPolling).solve(challenge);

        expect(solution).toEqual({ challengeId: 'ch-1', text: 'xyz99', cost: 0.0007 });
        expect(String(fetchSpy.mock.calls[0]?.[0])).toBe('https://api.anti-captcha.com/createTask');
        const sent: unknown = JSON.parse(String(fetchSpy.mock.calls[0]?.[1]?.body));
        expect(sent).toMatchObject({ clientKey: 'test-key', task: { type: 'ImageToTextTask', body: 'ZmFrZS1wbmc=' } });
        expect(JSON.parse(String(fetchSpy.mock.calls[1]?.[1]?.body))).toEqual({ clientKey: 'test-key', taskId: 7 });
    });

    it('reports a rejected submit', async () => {
        mockFetch(json({ errorId: 1, errorDescription: 'ERROR_KEY_DOES_NOT_EXIST' }));
        await expect(new AntiCaptchaResolver(fastPolling).solve(challenge))
            .rejects.toThrow('anticaptcha: submit failed: ERROR_KEY_DOES_NOT_EXIST');
    });

    it('rejects a response of the wrong shape', async () => {
        mockFetch(json({ hello: 'world' }));
        await expect(new AntiCaptchaResolver(fastPolling).solve(challenge))
            .rejects.toThrow('anticaptcha: unexpected response shape');
    });

    it('reads the account balance', async () => {
        mockFetch(json({ errorId: 0, balance: 3.25 }));
        expect(await new AntiCaptchaResolver(fastPolling).getBalance()).toBe(3.25);
    });
});

describe('ManualCaptchaResolver', () => {
    it('shows the saved image, trims the answer and cleans up', async () => {
        let seenPath = '';
        let existedDuringPrompt = false;
        const resolver = new ManualCaptchaResolver(async (imagePath) => {
            seenPath = imagePath;
            existedDuringPrompt = fs.existsSync(imagePath);
            return '  abc12 \n';
        });

        const solution = await resolver.solve(challenge);

        expect(solution).toEqual({ challengeId: 'ch-1', text: 'abc12', cost: 0 });
        expect(seenPath.endsWith('ch-1.png')).toBe(true);
        expect(existedDuringPrompt).toBe(true);
        expect(fs.existsSync(seenPath)).toBe(false);
    });

    it('keeps the image inside its temp directory whatever the challenge id', async () => {
        let seenPath = '';
        const resolver = new ManualCaptchaResolver(async (imagePath) => {
            seenPath = imagePath;
            return 'abc12';
        });

        await resolver.solve({ challengeId: '../../outside/x.y', image: Buffer.from('fake-png') });

        expect(path.basename(seenPath)).toBe('outsidexy.png');
        expect(path.dirname(path.dirname(seenPath))).toBe(os.tmpdir());
        expect(fs.existsSync(seenPath)).toBe(false);
    });

    it('fails on an empty answer', async () => {
        const resolver = new ManualCaptchaResolver(async () => '   ');
        await expect(resolver.solve(challenge)).rejects.toThrow('manual: no text entered');
    });
});

describe('createCaptchaResolver', () => {
    const settings = {
        CAPTCHA_API_KEY: 'test-key',
        CAPTCHA_POLL_INTERVAL_MS: 5_000,
        CAPTCHA_TIMEOUT_MS: 120_000,
        CAPTCHA_COST_PER_SOLVE: 0,
        REQUEST_TIMEOUT_MS: 30_000,
    };

    it('builds the configured backend', () => {
        expect(createCaptchaResolver('manual', settings).name).toBe('manual');
        expect(createCaptchaResolver('2captcha', settings).name).toBe('2captcha');
        expect(createCaptchaResolver('anticaptcha', settings).name).toBe('anticaptcha');
    });

    it('requires a key for the service backends', () => {
        expect(() => createCaptchaResolver('2captcha', { ...settings, CAPTCHA_API_KEY: undefined }))
            .toThrow('CAPTCHA_API_KEY is required for the 2captcha backend');
    });
});
