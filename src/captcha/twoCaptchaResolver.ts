/**
 * src/captcha/twoCaptchaResolver.ts
 *
 * 2Captcha backend (legacy in.php / res.php API with json=1).
 *
 *   submit: POST in.php  key, method=base64, body  → { status: 1, request: <taskId> }
 *   poll:   GET  res.php action=get, id            → { status: 1, request: <text> }
 *                                                     { status: 0, request: "CAPCHA_NOT_READY" }
 *
 * The service does not report a price per solve; `costPerSolve` is used.
 */

import { z } from 'zod';
import { CaptchaServiceError } from '../errors.js';
import { PollingCaptchaResolver, type PollResult, type PollingResolverOptions } from './pollingResolver.js';

const SUBMIT_URL = 'https://2captcha.com/in.php';
const RESULT_URL = 'https://2captcha.com/res.php';

/** Spelling is the service's own. */
const NOT_READY = 'CAPCHA_NOT_READY';

const envelopeSchema = z.object({
    status: z.number(),
    request: z.union([z.string(), z.number()]).transform(String),
});

export interface TwoCaptchaOptions extends PollingResolverOptions {
    costPerSolve?: number;
}

export class TwoCaptchaResolver extends PollingCaptchaResolver {
    readonly name = '2captcha';
    private readonly costPerSolve: number;

    constructor(options: TwoCaptchaOptions) {
        super(options);
        this.costPerSolve = options.costPerSolve ?? 0;
    }

    protected override defaultCost(): number {
        return this.costPerSolve;
    }

    protected async submit(imageBase64: string): Promise<string> {
        const body = new URLSearchParams({
            key: this.apiKey,
            method: 'base64',
            body: imageBase64,
            json: '1',
        });
        const envelope = this.parse(await this.requestJson(SUBMIT_URL, { method: 'POST', body }));
        if (envelope.status !== 1) {
            throw new CaptchaServiceError(this.name, `submit failed: ${envelope.request}`);
        }
        return envelope.request;
    }

    protected async poll(taskId: string, budgetMs: number): Promise<PollResult> {
        const params = new URLSearchParams({ key: this.apiKey, action: 'get', id: taskId, json: '1' });
        const envelope = this.parse(await this.requestJson(`${RESULT_URL}?${params.toString()}`, {}, budgetMs));
        if (envelope.status === 1) return { ready: true, text: envelope.request };
        if (envelope.request === NOT_READY) return { ready: false };
        throw new CaptchaServiceError(this.name, envelope.request);
    }

    async getBalance(): Promise<number> {
        const params = new URLSearchParams({ key: this.apiKey, action: 'getbalance', json: '1' });
        const envelope = this.parse(await this.requestJson(`${RESULT_URL}?${params.toString()}`));
        if (envelope.status !== 1) {
            throw new CaptchaServiceError(this.name, `balance request failed: ${envelope.request}`);
        }
        return Number(envelope.request);
    }

    private parse(json: unknown): z.infer<typeof envelopeSchema> {
        const parsed = envelopeSchema.safeParse(json);
        if (!parsed.success) {
            throw new CaptchaServiceError(this.name, 'unexpected response shape');
        }
        return parsed.data;
    }
}
