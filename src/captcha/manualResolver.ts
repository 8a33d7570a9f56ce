/**
 * src/captcha/manualResolver.ts
 *
 * Human backend: saves the challenge image to a temporary file, asks the
 * operator for the text and waits for as long as that takes (no timeout).
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import inquirer from 'inquirer';
import { log } from 'crawlee';
import { CaptchaServiceError } from '../errors.js';
import type { CaptchaChallenge, CaptchaSolution } from '../portal/types.js';
import type { CaptchaResolver } from './types.js';

/** Shows the operator the image at `imagePath` and returns what they typed. */
export type CaptchaPrompt = (imagePath: string) => Promise<string>;

export const inquirerPrompt: CaptchaPrompt = async (imagePath) => {
    const answer = await inquirer.prompt<{ code: string }>([
        {
            type: 'input',
            name: 'code',
            message: `Open ${imagePath} and enter the CAPTCHA text:`,
        },
    ]);
    return answer.code;
};

/** The id comes from a portal header; keep it from naming a path outside `dir`. */
function safeFileName(challengeId: string): string {
    return challengeId.replace(/[^A-Za-z0-9_-]/g, '') || 'challenge';
}

export class ManualCaptchaResolver implements CaptchaResolver {
    readonly name = 'manual';

    constructor(private readonly prompt: CaptchaPrompt = inquirerPrompt) {}

    async solve(challenge: CaptchaChallenge): Promise<CaptchaSolution> {
        const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'captcha-'));
        const imagePath = path.join(dir, `${safeFileName(challenge.challengeId)}.png`);
        await fs.promises.writeFile(imagePath, challenge.image);
        log.info(`[Captcha] Challenge saved to ${imagePath}`);

        try {
            const text = (await this.prompt(imagePath)).trim();
            if (!text) {
                throw new CaptchaServiceError(this.name, 'no text entered');
            }
            return { challengeId: challenge.challengeId, text, cost: 0 };
        } finally {
            await fs.promises.rm(dir, { recursive: true, force: true });
        }
    }
}
