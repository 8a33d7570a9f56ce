/**
 * src/commands/search.ts
 *
 * `ec-search search`: expand the location filter, load and check the
 * session, then run the batch. `--dry-run` stops after the expansion.
 */

import { log } from 'crawlee';
import { z } from 'zod';
import { createCaptchaResolver } from '../captcha/index.js';
import { CombinationExpander } from '../locations/combinationExpander.js';
import { describeTarget } from '../locations/types.js';
import { DatasetResultSink, PgResultStore, type ResultSink } from '../search/resultStore.js';
import { SearchOrchestrator } from '../search/searchOrchestrator.js';
import { FileSessionAcquirer } from '../session/sessionFile.js';
import { pingDb } from '../utils/db.js';
import { createRunContext } from '../utils/runContext.js';
import type { Runtime } from './runtime.js';
import { print } from '../utils/fileLogger.js';

const portalDate = z.string().regex(/^\d{2}\/\d{2}\/\d{4}$/, 'expected dd/mm/yyyy');

export const searchOptionsSchema = z.object({
    district: z.number().int().optional(),
    taluka: z.number().int().optional(),
    hobli: z.number().int().optional(),
    village: z.number().int().optional(),
    allTalukas: z.boolean().default(false),
    allHoblis: z.boolean().default(false),
    allVillages: z.boolean().default(false),
    party: z.string().trim().min(1, 'a party name is required'),
    middleName: z.string().trim().optional(),
    lastName: z.string().trim().optional(),
    from: portalDate,
    to: portalDate,
    reuseCaptcha: z.boolean().optional(),
    dryRun: z.boolean().default(false),
});

export type SearchCommandOptions = z.input<typeof searchOptionsSchema>;

export async function runSearchCommand(rt: Runtime, input: SearchCommandOptions, signal: AbortSignal): Promise<void> {
    const parsed = searchOptionsSchema.safeParse(input);
    if (!parsed.success) {
        throw new Error(parsed.error.issues.map((i) => `--${i.path.join('.')}: ${i.message}`).join('\n'));
    }
    const opts = parsed.data;

    if (!(await pingDb(rt.pool))) {
        throw new Error('Database is unreachable; the location store is needed to expand the filter');
    }

    const { targets } = await new CombinationExpander(rt.store).expand({
        districtCode: opts.district,
        talukaCode: opts.taluka,
        hobliCode: opts.hobli,
        villageCode: opts.village,
        allTalukas: opts.allTalukas,
        allHoblis: opts.allHoblis,
        allVillages: opts.allVillages,
    });

    if (opts.dryRun) {
        targets.forEach((t, i) => print(`${String(i + 1).padStart(4)}. ${describeTarget(t)}`));
        print(`\n${targets.length} target(s); nothing searched (--dry-run).`);
        return;
    }
    if (targets.length === 0) {
        log.warning('[Search] The filter matched no villages; nothing to do');
        return;
    }

    await rt.session.load(new FileSessionAcquirer(rt.env.SESSION_FILE, rt.policy.sessionTtlMs));
    const validation = await rt.session.validate();
    if (!validation.valid) {
        throw new Error(`Session check failed: ${validation.message}. Log in again and refresh ${rt.env.SESSION_FILE}.`);
    }

    const policy = { ...rt.policy, reuseCaptcha: opts.reuseCaptcha ?? rt.policy.reuseCaptcha };
    const ctx = createRunContext({ policy, store: rt.store, session: rt.session, signal });
    const sink: ResultSink = rt.env.RESULT_SINK === 'dataset' ? new DatasetResultSink() : new PgResultStore(rt.pool);
    const resolver = createCaptchaResolver(rt.env.CAPTCHA_SERVICE, rt.env);

    const outcome = await new SearchOrchestrator(ctx, rt.client, resolver, sink).run(targets, {
        partyName: opts.party,
        middleName: opts.middleName,
        lastName: opts.lastName,
        fromDate: opts.from,
        toDate: opts.to,
    });

    for (const e of outcome.errors) {
        log.warning(`[Search]   ${e.target.villageName} (${e.target.villageCode}): ${e.errorName}: ${e.message}`);
    }
    if (outcome.terminationReason === 'session-expired') process.exitCode = 2;
    else if (outcome.errors.length > 0) process.exitCode = 1;
}
