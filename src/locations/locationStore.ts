/**
 * src/locations/locationStore.ts
 *
 * Storage contract for the location hierarchy plus an in-process
 * implementation.
 *
 * Contract
 * ────────
 * • upsert* replaces the row with the same key, never duplicates it.
 * • A child whose parent is not stored yet is rejected with
 *   ReferentialIntegrityError. Writing parents first is the caller's job.
 * • list* results are ordered by display name (code breaks ties).
 *
 * MemoryLocationStore backs the tests and `search --dry-run` against a
 * hierarchy loaded some other way; PgLocationStore is the durable one.
 */

import { ReferentialIntegrityError } from '../errors.js';
import type { CrawlSummary } from './hierarchyCrawler.js';
import type {
    District,
    Hobli,
    LevelCounts,
    Taluka,
    Village,
    VillageHierarchy,
} from './types.js';

// ─── Contract ─────────────────────────────────────────────────────────────────

export interface StoredCrawlSummary {
    crawledAt: string;
    summary: CrawlSummary;
}

export interface LocationStore {
    upsertDistrict(row: District): Promise<void>;
    upsertTaluka(row: Taluka): Promise<void>;
    upsertHobli(row: Hobli): Promise<void>;
    upsertVillage(row: Village): Promise<void>;

    listDistricts(): Promise<District[]>;
    listTalukas(districtCode?: number): Promise<Taluka[]>;
    listHoblis(talukaCode?: number): Promise<Hobli[]>;
    listVillages(hobliCode?: number): Promise<Village[]>;

    counts(): Promise<LevelCounts>;
    findVillageHierarchy(villageCode: number): Promise<VillageHierarchy | null>;
    recordCrawlSummary(summary: CrawlSummary, crawledAt?: Date): Promise<void>;
    lastCrawl(): Promise<StoredCrawlSummary | null>;
}

export function byDisplayName<T extends { name: string; code: number }>(a: T, b: T): number {
    return a.name.localeCompare(b.name) || a.code - b.code;
}

// ─── In-memory implementation ─────────────────────────────────────────────────

function villageKey(code: number, hobliCode: number): string {
    return `${code}@${hobliCode}`;
}

export class MemoryLocationStore implements LocationStore {
    private readonly districts = new Map<number, District>();
    private readonly talukas = new Map<number, Taluka>();
    private readonly hoblis = new Map<number, Hobli>();
    private readonly villages = new Map<string, Village>();
    private crawl: StoredCrawlSummary | null = null;

    async upsertDistrict(row: District): Promise<void> {
        this.districts.set(row.code, { ...row });
    }

    async upsertTaluka(row: Taluka): Promise<void> {
        if (!this.districts.has(row.districtCode)) {
            throw new ReferentialIntegrityError('taluka', row.code, row.districtCode);
        }
        this.talukas.set(row.code, { ...row });
    }

    async upsertHobli(row: Hobli): Promise<void> {
        if (!this.talukas.has(row.talukaCode)) {
            throw new ReferentialIntegrityError('hobli', row.code, row.talukaCode);
        }
        this.hoblis.set(row.code, { ...row });
    }

    async upsertVillage(row: Village): Promise<void> {
        if (!this.hoblis.has(row.hobliCode)) {
            throw new ReferentialIntegrityError('village', row.code, row.hobliCode);
        }
        this.villages.set(villageKey(row.code, row.hobliCode), { ...row });
    }

    async listDistricts(): Promise<District[]> {
        return [...this.districts.values()].sort(byDisplayName);
    }

    async listTalukas(districtCode?: number): Promise<Taluka[]> {
        return [...this.talukas.values()]
            .filter((t) => districtCode === undefined || t.districtCode === districtCode)
            .sort(byDisplayName);
    }

    async listHoblis(talukaCode?: number): Promise<Hobli[]> {
        return [...this.hoblis.values()]
            .filter((h) => talukaCode === undefined || h.talukaCode === talukaCode)
            .sort(byDisplayName);
    }

    async listVillages(hobliCode?: number): Promise<Village[]> {
        return [...this.villages.values()]
            .filter((v) => hobliCode === undefined || v.hobliCode === hobliCode)
            .sort((a, b) => byDisplayName(a, b) || a.hobliCode - b.hobliCode);
    }

    async counts(): Promise<LevelCounts> {
        return {
            district: this.districts.size,
            taluka: this.talukas.size,
            hobli: this.hoblis.size,
            village: this.villages.size,
        };
    }

    async findVillageHierarchy(villageCode: number): Promise<VillageHierarchy | null> {
        const matches = (await this.listVillages()).filter((v) => v.code === villageCode);
        for (const village of matches) {
            const hobli = this.hoblis.get(village.hobliCode);
            const taluka = hobli ? this.talukas.get(hobli.talukaCode) : undefined;
            const district = taluka ? this.districts.get(taluka.districtCode) : undefined;
            if (hobli && taluka && district) {
                return { district, taluka, hobli, village };
            }
        }
        return null;
    }

    async recordCrawlSummary(summary: CrawlSummary, crawledAt: Date = new Date()): Promise<void> {
        this.crawl = { crawledAt: crawledAt.toISOString(), summary };
    }

    async lastCrawl(): Promise<StoredCrawlSummary | null> {
        return this.crawl;
    }
}
