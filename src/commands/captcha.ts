import { createCaptchaResolver } from '../captcha/index.js';
import { PollingCaptchaResolver } from '../captcha/pollingResolver.js';
import type { Env } from '../config/envSchema.js';
import { print } from '../utils/fileLogger.js';

export async function runCaptchaBalanceCommand(env: Env): Promise<void> {
    const resolver = createCaptchaResolver(env.CAPTCHA_SERVICE, env);
    if (!(resolver instanceof PollingCaptchaResolver)) {
        print('The manual CAPTCHA backend has no balance.');
        return;
    }
    const balance = await resolver.getBalance();
    print(`${resolver.name} balance: ${balance.toFixed(4)}`);
}
