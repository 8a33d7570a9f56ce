/**
 * src/captcha/antiCaptchaResolver.ts
 *
 * Anti-Captcha backend (JSON API). Unlike 2Captcha it reports the cost of
 * each solve in the result.
 */

import { z } from 'zod';
import { CaptchaServiceError } from '../errors.js';
import { PollingCaptchaResolver, type PollResult } from './pollingResolver.js';

const API_BASE = 'https://api.anti-captcha.com';

const errorFields = {
    errorId: z.number(),
    errorDescription: z.string().optional(),
};

const createTaskSchema = z.object({ ...errorFields, taskId: z.number().optional() });

const taskResultSchema = z.object({
    ...errorFields,
    status: z.enum(['processing', 'ready']).optional(),
    solution: z.object({ text: z.string() }).optional(),
    cost: z.union([z.string(), z.number()]).optional(),
});

const balanceSchema = z.object({ ...errorFields, balance: z.number().optional() });

export class AntiCaptchaResolver extends PollingCaptchaResolver {
    readonly name = 'anticaptcha';

    protected async submit(imageBase64: string): Promise<string> {
        const result = this.parse(createTaskSchema, await this.post('createTask', {
            clientKey: this.apiKey,
            task: {
                type: 'ImageToTextTask',
                body: imageBase64,
                phrase: false,
                case: true,
                numeric: 0,
                math: false,
                minLength: 5,
                maxLength: 6,
            },
        }));
        if (result.errorId !== 0 || result.taskId === undefined) {
            throw new CaptchaServiceError(this.name, `submit failed: ${result.errorDescription ?? `error ${result.errorId}`}`);
        }
        return String(result.taskId);
    }

    protected async poll(taskId: string, budgetMs: number): Promise<PollResult> {
        const result = this.parse(taskResultSchema, await this.post('getTaskResult', {
            clientKey: this.apiKey,
            taskId: Number(taskId),
        }, budgetMs));
        if (result.errorId !== 0) {
            throw new CaptchaServiceError(this.name, result.errorDescription ?? `error ${result.errorId}`);
        }
        if (result.status !== 'ready') return { ready: false };
        if (!result.solution) {
            throw new CaptchaServiceError(this.name, 'task reported ready without a solution');
        }
        const cost = result.cost === undefined ? undefined : Number(result.cost);
        return { ready: true, text: result.solution.text, cost };
    }

    async getBalance(): Promise<number> {
        const result = this.parse(balanceSchema, await this.post('getBalance', { clientKey: this.apiKey }));
        if (result.errorId !== 0 || result.balance === undefined) {
            throw new CaptchaServiceError(this.name, `balance request failed: ${result.errorDescription ?? `error ${result.errorId}`}`);
        }
        return result.balance;
    }

    private post(method: string, payload: unknown, budgetMs?: number): Promise<unknown> {
        return this.requestJson(`${API_BASE}/${method}`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(payload),
        }, budgetMs);
    }

    private parse<S extends z.ZodTypeAny>(schema: S, json: unknown): z.infer<S> {
        const parsed = schema.safeParse(json);
        if (!parsed.success) {
            throw new CaptchaServiceError(this.name, 'unexpected response shape');
        }
        return parsed.data;
    }
}
