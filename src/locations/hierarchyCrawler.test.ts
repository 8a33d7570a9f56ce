import { describe, it, expect } from 'vitest';
import { FetchFailure, ReferentialIntegrityError } from '../errors.js';
import type { HierarchyApi, RemoteDistrict, RemoteHobli, RemoteTaluka, RemoteVillage } from '../portal/types.js';
import { SessionManager } from '../session/sessionManager.js';
import type { RunPolicy } from '../config/policy.js';
import { testPolicy } from '../testing/fixtures.js';
import { createRunContext } from '../utils/runContext.js';
import { HierarchyCrawler } from './hierarchyCrawler.js';
import { MemoryLocationStore } from './locationStore.js';
import type { Hobli } from './types.js';

type Responder<T> = (call: number) => T[] | Promise<T[]>;

/** Scripted portal: each node answers from a table, optionally per call. */
class FakeHierarchyApi implements HierarchyApi {
    readonly calls: string[] = [];
    readonly calledAt = new Map<string, number>();
    inFlight = 0;
    maxInFlight = 0;

    districts: Responder<RemoteDistrict> = () => [named(10, 'Alpha'), named(11, 'Beta')];
    talukas = new Map<number, Responder<RemoteTaluka>>([
        [10, () => [named(20, 'Bravo'), named(21, 'Charlie')]],
        [11, () => [named(22, 'Kilo')]],
    ]);
    hoblis = new Map<number, Responder<RemoteHobli>>([
        [20, () => [named(30, 'Delta')]],
        [21, () => [named(31, 'Golf')]],
        [22, () => [named(32, 'Lima')]],
    ]);
    villages = new Map<number, Responder<RemoteVillage>>([
        [30, () => [village(40, 'Echo'), village(41, 'Foxtrot')]],
        [31, () => [village(42, 'Hotel')]],
        [32, () => [village(43, 'Mike')]],
    ]);

    fetchDistricts(): Promise<RemoteDistrict[]> {
        return this.answer('districts', this.districts);
    }

    fetchTalukas(code: number): Promise<RemoteTaluka[]> {
        return this.answer(`talukas:${code}`, this.talukas.get(code));
    }

    fetchHoblis(code: number): Promise<RemoteHobli[]> {
        return this.answer(`hoblis:${code}`, this.hoblis.get(code));
    }

    fetchVillages(code: number): Promise<RemoteVillage[]> {
        return this.answer(`villages:${code}`, this.villages.get(code));
    }

    private async answer<T>(key: string, responder: Responder<T> | undefined): Promise<T[]> {
        this.calls.push(key);
        this.calledAt.set(key, performance.now());
        const call = this.calls.filter((c) => c === key).length;
        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        try {
            await new Promise((resolve) => setTimeout(resolve, 1));
            return responder ? await responder(call) : [];
        } finally {
            this.inFlight--;
        }
    }
}

function named(code: number, name: string) {
    return { code, name, localizedName: '' };
}

function village(code: number, name: string): RemoteVillage {
    return { code, name, localizedName: '', isUrban: false };
}

/** Refuses hobli 31 as if its taluka were missing. */
class RejectingStore extends MemoryLocationStore {
    override async upsertHobli(row: Hobli): Promise<void> {
        if (row.code === 31) throw new ReferentialIntegrityError('hobli', row.code, row.talukaCode);
        return super.upsertHobli(row);
    }
}

function setup(concurrency = 4, store = new MemoryLocationStore(), policy: Partial<RunPolicy> = {}) {
    const api = new FakeHierarchyApi();
    const ctx = createRunContext({
        policy: { ...testPolicy, crawlConcurrency: concurrency, ...policy },
        store,
        session: new SessionManager(),
    });
    return { store, api, crawler: new HierarchyCrawler(ctx, api) };
}

describe('HierarchyCrawler', () => {
    it('ingests every level with parents written before children', async () => {
        const { store, api, crawler } = setup();
        const summary = await crawler.crawl();

        expect(summary.failures).toEqual([]);
        expect(summary.ingested).toEqual({ district: 2, taluka: 3, hobli: 3, village: 4 });
        expect(summary.skipped).toEqual({ district: 0, taluka: 0, hobli: 0, village: 0 });
        expect(await store.counts()).toEqual({ district: 2, taluka: 3, hobli: 3, village: 4 });
        expect(api.calls.indexOf('talukas:10')).toBeGreaterThan(api.calls.indexOf('districts'));
        expect(api.calls.indexOf('villages:30')).toBeGreaterThan(api.calls.indexOf('hoblis:20'));
    });

    it('retries an empty child list instead of treating it as a leaf', async () => {
        const { store, api, crawler } = setup();
        api.talukas.set(11, (call) => (call === 1 ? [] : [named(22, 'Kilo')]));

        const summary = await crawler.crawl();

        expect(api.calls.filter((c) => c === 'talukas:11')).toHaveLength(2);
        expect(summary.failures).toEqual([]);
        expect((await store.listTalukas(11)).map((t) => t.code)).toEqual([22]);
    });

    it('skips a subtree whose fetch keeps failing and carries on with its siblings', async () => {
        const { store, api, crawler } = setup();
        api.hoblis.set(21, () => {
            throw new Error('portal down');
        });

        const summary = await crawler.crawl();

        expect(api.calls.filter((c) => c === 'hoblis:21')).toHaveLength(3);
        expect(summary.skipped.taluka).toBe(1);
        expect(summary.failures).toEqual([{
            kind: 'fetch',
            level: 'taluka',
            code: 21,
            error: 'hoblis of taluka 21: failed after 3 attempt(s): portal down',
        }]);
        expect(summary.ingested).toEqual({ district: 2, taluka: 3, hobli: 2, village: 3 });
        expect((await store.listHoblis(20)).map((h) => h.code)).toEqual([30]);
    });

    it('skips a node the store rejects and does not descend into it', async () => {
        const { api, crawler } = setup(4, new RejectingStore());
        const summary = await crawler.crawl();

        expect(summary.skipped).toEqual({ district: 0, taluka: 0, hobli: 1, village: 0 });
        expect(summary.failures).toEqual([{
            kind: 'write',
            level: 'hobli',
            code: 31,
            error: 'ReferentialIntegrityError: Cannot write hobli 31: parent 21 is not stored',
        }]);
        expect(api.calls).not.toContain('villages:31');
        expect(summary.ingested).toEqual({ district: 2, taluka: 3, hobli: 2, village: 3 });
    });

    it('waits between village list fetches', async () => {
        const { api, crawler } = setup(1, undefined, { villageDelayMs: 60 });
        await crawler.crawl({ districtCode: 10 });

        const first = api.calledAt.get('villages:30') ?? 0;
        const second = api.calledAt.get('villages:31') ?? 0;
        expect(api.calledAt.has('villages:30') && api.calledAt.has('villages:31')).toBe(true);
        expect(Math.abs(second - first)).toBeGreaterThanOrEqual(50);
    });

    it('fails the whole crawl when districts cannot be fetched', async () => {
        const { api, crawler } = setup();
        api.districts = () => {
            throw new Error('unreachable');
        };

        const err = await crawler.crawl().catch((e: unknown) => e);

        expect(err).toBeInstanceOf(FetchFailure);
        expect(err).toMatchObject({ endpoint: 'districts', attempts: 3 });
        expect(api.calls).toEqual(['districts', 'districts', 'districts']);
    });

    it('descends only into the requested district', async () => {
        const { store, api, crawler } = setup();
        const summary = await crawler.crawl({ districtCode: 11 });

        expect(summary.ingested).toEqual({ district: 2, taluka: 1, hobli: 1, village: 1 });
        expect(api.calls).not.toContain('talukas:10');
        expect((await store.listDistricts()).map((d) => d.code)).toEqual([10, 11]);
    });

    it('drops duplicate codes within one response', async () => {
        const { store, api, crawler } = setup();
        api.villages.set(30, () => [village(40, 'Echo'), village(40, 'Echo'), village(41, 'Foxtrot')]);

        const summary = await crawler.crawl();

        expect(summary.ingested.village).toBe(4);
        expect((await store.listVillages(30)).map((v) => v.code)).toEqual([40, 41]);
    });

    it('keeps requests in flight within the concurrency limit', async () => {
        const { api, crawler } = setup(2);
        await crawler.crawl();
        expect(api.maxInFlight).toBeLessThanOrEqual(2);
        expect(api.maxInFlight).toBe(2);
    });

    it('records the summary in the store', async () => {
        const { store, crawler } = setup();
        const summary = await crawler.crawl();

        const last = await store.lastCrawl();
        expect(last?.summary).toEqual(summary);
        expect(summary.cancelled).toBe(false);
    });

    it('stops descending once cancelled', async () => {
        const store = new MemoryLocationStore();
        const api = new FakeHierarchyApi();
        const controller = new AbortController();
        api.districts = () => {
            controller.abort();
            return [named(10, 'Alpha')];
        };
        const ctx = createRunContext({ policy: testPolicy, store, session: new SessionManager(), signal: controller.signal });

        const summary = await new HierarchyCrawler(ctx, api).crawl();

        expect(summary.cancelled).toBe(true);
        expect(summary.ingested).toEqual({ district: 1, taluka: 0, hobli: 0, village: 0 });
        expect(api.calls).toEqual(['districts']);
    });
});
