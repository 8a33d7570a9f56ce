import type { CaptchaChallenge, CaptchaSolution } from '../portal/types.js';

/**
 * "Solve this challenge image." One call per challenge. A backend that fails
 * throws CaptchaTimeout or CaptchaServiceError and never retries the same
 * challenge: a retry needs a fresh challenge from the portal.
 *
 * A solve is never cut short by a run's cancellation; the run stops after
 * the target it belongs to.
 */
export interface CaptchaResolver {
    readonly name: string;
    solve(challenge: CaptchaChallenge): Promise<CaptchaSolution>;
}
