import type { Env } from '../config/envSchema.js';
import { AntiCaptchaResolver } from './antiCaptchaResolver.js';
import { ManualCaptchaResolver } from './manualResolver.js';
import { TwoCaptchaResolver } from './twoCaptchaResolver.js';
import type { CaptchaResolver } from './types.js';

export type { CaptchaResolver } from './types.js';
export type CaptchaService = Env['CAPTCHA_SERVICE'];

type ResolverSettings = Pick<Env,
    'CAPTCHA_API_KEY' | 'CAPTCHA_POLL_INTERVAL_MS' | 'CAPTCHA_TIMEOUT_MS' | 'CAPTCHA_COST_PER_SOLVE' | 'REQUEST_TIMEOUT_MS'>;

export function createCaptchaResolver(service: CaptchaService, settings: ResolverSettings): CaptchaResolver {
    if (service === 'manual') return new ManualCaptchaResolver();

    if (!settings.CAPTCHA_API_KEY) {
        throw new Error(`CAPTCHA_API_KEY is required for the ${service} backend`);
    }
    const options = {
        apiKey: settings.CAPTCHA_API_KEY,
        pollIntervalMs: settings.CAPTCHA_POLL_INTERVAL_MS,
        timeoutMs: settings.CAPTCHA_TIMEOUT_MS,
        requestTimeoutMs: settings.REQUEST_TIMEOUT_MS,
    };
    return service === '2captcha'
        ? new TwoCaptchaResolver({ ...options, costPerSolve: settings.CAPTCHA_COST_PER_SOLVE })
        : new AntiCaptchaResolver(options);
}
