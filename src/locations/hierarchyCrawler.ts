/**
 * src/locations/hierarchyCrawler.ts
 *
 * Walks the remote hierarchy top-down and writes it into the LocationStore:
 *
 *   districts → talukas (per district) → hoblis (per taluka) → villages (per hobli)
 *
 * ORDERING
 * ────────
 * A node's children are fetched only after the node itself is written, so
 * every child finds its parent stored. Siblings are crawled concurrently,
 * bounded by one limiter shared across all levels (policy.crawlConcurrency
 * requests in flight at most).
 *
 * FAILURES
 * ────────
 * An empty child list is a failed fetch, not a leaf: it is retried with the
 * crawl backoff policy like any transport error. A node whose children
 * still cannot be fetched is skipped and recorded; the crawl carries on with
 * its siblings. Only a failure of the root (districts) call aborts the crawl.
 */

import { log } from 'crawlee';
import pLimit from 'p-limit';
import { FetchFailure, errorMessage, errorName } from '../errors.js';
import type { HierarchyApi } from '../portal/types.js';
import { RetriesExhausted, retryWithBackoff, sleep } from '../utils/backoff.js';
import type { RunContext } from '../utils/runContext.js';
import type { District, Hobli, LevelCounts, LocationLevel, Taluka } from './types.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface CrawlOptions {
    /** Store every district but descend only into this one. */
    districtCode?: number;
}

export interface CrawlFailure {
    kind: 'fetch' | 'write';
    /** Level of the node that was skipped. */
    level: LocationLevel;
    code: number;
    error: string;
}

export interface CrawlSummary {
    /** Rows written per level. */
    ingested: LevelCounts;
    /** Nodes per level that failed to write or whose children could not be fetched. */
    skipped: LevelCounts;
    failures: CrawlFailure[];
    cancelled: boolean;
    durationMs: number;
}

class EmptyResponse extends Error {
    override readonly name = 'EmptyResponse';
}

function emptyCounts(): LevelCounts {
    return { district: 0, taluka: 0, hobli: 0, village: 0 };
}

function uniqueByCode<T extends { code: number }>(rows: T[]): T[] {
    const seen = new Set<number>();
    return rows.filter((r) => {
        if (seen.has(r.code)) return false;
        seen.add(r.code);
        return true;
    });
}

// ─── Crawler ──────────────────────────────────────────────────────────────────

export class HierarchyCrawler {
    private summary: CrawlSummary = HierarchyCrawler.freshSummary();
    private limit = pLimit(1);

    constructor(
        private readonly ctx: RunContext,
        private readonly api: HierarchyApi
    ) {}

    private static freshSummary(): CrawlSummary {
        return { ingested: emptyCounts(), skipped: emptyCounts(), failures: [], cancelled: false, durationMs: 0 };
    }

    /**
     * Runs one full pass. Resolves with the summary even when subtrees were
     * skipped; rejects with FetchFailure only when the district list itself
     * cannot be fetched.
     */
    async crawl(options: CrawlOptions = {}): Promise<CrawlSummary> {
        const startedAt = Date.now();
        const { store, policy } = this.ctx;
        this.summary = HierarchyCrawler.freshSummary();
        this.limit = pLimit(Math.max(1, policy.crawlConcurrency));

        log.info(`[Crawler] Run ${this.ctx.runId}: fetching districts…`);
        const districts = await this.fetchList('districts', () => this.api.fetchDistricts());

        const written: District[] = [];
        for (const d of uniqueByCode(districts)) {
            if (await this.write('district', d.code, () => store.upsertDistrict(d))) written.push(d);
        }
        log.info(`[Crawler] ✓ ${written.length} districts stored`);

        const targets = options.districtCode === undefined
            ? written
            : written.filter((d) => d.code === options.districtCode);
        if (options.districtCode !== undefined && targets.length === 0) {
            log.warning(`[Crawler] District ${options.districtCode} is not in the portal's district list`);
        }

        await Promise.all(targets.map((d) => this.crawlDistrict(d)));

        this.summary.cancelled = this.ctx.signal?.aborted ?? false;
        this.summary.durationMs = Date.now() - startedAt;
        await store.recordCrawlSummary(this.summary);
        this.logSummary();
        return this.summary;
    }

    // ─── Levels ─────────────────────────────────────────────────────────────

    private async crawlDistrict(district: District): Promise<void> {
        const talukas = await this.fetchChildren('district', district.code,
            `talukas of district ${district.code}`, () => this.api.fetchTalukas(district.code));
        if (!talukas) return;

        const written: Taluka[] = [];
        for (const t of talukas) {
            const row: Taluka = { ...t, districtCode: district.code };
            if (await this.write('taluka', row.code, () => this.ctx.store.upsertTaluka(row))) written.push(row);
        }
        log.info(`[Crawler] ${district.name} (${district.code}): ${written.length} talukas`);

        await Promise.all(written.map((t) => this.crawlTaluka(t)));
    }

    private async crawlTaluka(taluka: Taluka): Promise<void> {
        const hoblis = await this.fetchChildren('taluka', taluka.code,
            `hoblis of taluka ${taluka.code}`, () => this.api.fetchHoblis(taluka.code));
        if (!hoblis) return;

        const written: Hobli[] = [];
        for (const h of hoblis) {
            const row: Hobli = { ...h, talukaCode: taluka.code };
            if (await this.write('hobli', row.code, () => this.ctx.store.upsertHobli(row))) written.push(row);
        }
        log.debug(`[Crawler]   ${taluka.name} (${taluka.code}): ${written.length} hoblis`);

        await Promise.all(written.map((h) => this.crawlHobli(h)));
    }

    private async crawlHobli(hobli: Hobli): Promise<void> {
        const villages = await this.fetchChildren('hobli', hobli.code,
            `villages of hobli ${hobli.code}`, () => this.api.fetchVillages(hobli.code),
            this.ctx.policy.villageDelayMs);
        if (!villages) return;

        for (const v of villages) {
            const row = { ...v, hobliCode: hobli.code };
            await this.write('village', row.code, () => this.ctx.store.upsertVillage(row));
        }
    }

    // ─── Fetch / write helpers ──────────────────────────────────────────────

    /** Root fetch: failure is fatal. */
    private async fetchList<T>(endpoint: string, fn: () => Promise<T[]>): Promise<T[]> {
        try {
            return await this.limit(() => this.fetchWithRetry(endpoint, fn));
        } catch (err) {
            throw this.toFetchFailure(endpoint, err);
        }
    }

    /**
     * Child fetch for one node. Returns null (and records the node as
     * skipped) when it fails or the crawl has been cancelled.
     */
    private async fetchChildren<T extends { code: number }>(
        parentLevel: LocationLevel,
        parentCode: number,
        endpoint: string,
        fn: () => Promise<T[]>,
        delayAfterMs = 0
    ): Promise<T[] | null> {
        if (this.ctx.signal?.aborted) return null;
        try {
            const rows = await this.limit(async () => {
                try {
                    return await this.fetchWithRetry(endpoint, fn);
                } finally {
                    await sleep(delayAfterMs, this.ctx.signal);
                }
            });
            return uniqueByCode(rows);
        } catch (err) {
            const failure = this.toFetchFailure(endpoint, err);
            this.summary.skipped[parentLevel]++;
            this.summary.failures.push({ kind: 'fetch', level: parentLevel, code: parentCode, error: failure.message });
            log.error(`[Crawler] ✗ Skipping ${parentLevel} ${parentCode}: ${failure.message}`);
            return null;
        }
    }

    private fetchWithRetry<T>(endpoint: string, fn: () => Promise<T[]>): Promise<T[]> {
        return retryWithBackoff(async () => {
            const rows = await fn();
            if (rows.length === 0) throw new EmptyResponse('empty response');
            return rows;
        }, this.ctx.policy.crawlBackoff, { label: endpoint, signal: this.ctx.signal });
    }

    private toFetchFailure(endpoint: string, err: unknown): FetchFailure {
        if (err instanceof FetchFailure) return err;
        if (err instanceof RetriesExhausted) {
            return new FetchFailure(err.message, endpoint, err.attempts, { cause: err.lastError });
        }
        return new FetchFailure(`${endpoint}: ${errorMessage(err)}`, endpoint, 1, { cause: err });
    }

    /** Returns false (and records the row as skipped) when the write is rejected. */
    private async write(level: LocationLevel, code: number, fn: () => Promise<void>): Promise<boolean> {
        try {
            await fn();
            this.summary.ingested[level]++;
            return true;
        } catch (err) {
            this.summary.skipped[level]++;
            this.summary.failures.push({ kind: 'write', level, code, error: `${errorName(err)}: ${errorMessage(err)}` });
            log.error(`[Crawler] ✗ Could not store ${level} ${code}: ${errorMessage(err)}`);
            return false;
        }
    }

    private logSummary(): void {
        const { ingested, skipped, durationMs, cancelled } = this.summary;
        log.info(`\n${'═'.repeat(60)}`);
        log.info(`  CRAWL ${cancelled ? 'CANCELLED' : 'COMPLETE'}`);
        log.info(`  Districts : ${ingested.district} stored, ${skipped.district} skipped`);
        log.info(`  Talukas   : ${ingested.taluka} stored, ${skipped.taluka} skipped`);
        log.info(`  Hoblis    : ${ingested.hobli} stored, ${skipped.hobli} skipped`);
        log.info(`  Villages  : ${ingested.village} stored, ${skipped.village} skipped`);
        log.info(`  Duration  : ${(durationMs / 1000).toFixed(1)}s`);
        log.info(`${'═'.repeat(60)}\n`);
    }
}
