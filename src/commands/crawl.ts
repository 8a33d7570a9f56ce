import { log } from 'crawlee';
import { migrate } from '../db/migrate.js';
import { HierarchyCrawler } from '../locations/hierarchyCrawler.js';
import { pingDb } from '../utils/db.js';
import { createRunContext } from '../utils/runContext.js';
import type { Runtime } from './runtime.js';

async function requireDb(rt: Runtime): Promise<void> {
    if (!(await pingDb(rt.pool))) {
        throw new Error(`Database ${rt.env.PGDATABASE} is unreachable; check DATABASE_URL / PG* settings`);
    }
}

export async function runMigrateCommand(rt: Runtime): Promise<void> {
    await requireDb(rt);
    await migrate(rt.pool);
}

export async function runCrawlCommand(rt: Runtime, districtCode: number | undefined, signal: AbortSignal): Promise<void> {
    await requireDb(rt);
    const ctx = createRunContext({ policy: rt.policy, store: rt.store, session: rt.session, signal });
    const summary = await new HierarchyCrawler(ctx, rt.client).crawl({ districtCode });

    if (summary.failures.length > 0) {
        log.warning(`[Crawler] ${summary.failures.length} node(s) skipped; re-run the crawl to fill them in`);
        process.exitCode = 1;
    }
}
