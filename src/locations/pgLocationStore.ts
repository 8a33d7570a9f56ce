/**
 * src/locations/pgLocationStore.ts
 *
 * PostgreSQL-backed LocationStore (schema in src/db/migrate.ts).
 *
 * Upserts are INSERT … ON CONFLICT DO UPDATE keyed by the row's code
 * (villages: code + hobli). Parent existence is left to the foreign keys;
 * a violation (SQLSTATE 23503) becomes ReferentialIntegrityError.
 */

import { log } from 'crawlee';
import { ReferentialIntegrityError } from '../errors.js';
import { FOREIGN_KEY_VIOLATION, pgErrorCode, type Queryable } from '../utils/db.js';
import type { CrawlSummary } from './hierarchyCrawler.js';
import type { LocationStore, StoredCrawlSummary } from './locationStore.js';
import type {
    District,
    Hobli,
    LevelCounts,
    LocationLevel,
    Taluka,
    Village,
    VillageHierarchy,
} from './types.js';

// ─── SQL ────────────────────────────────────────────────────────────────────

const UPSERT_DISTRICT_SQL = `
INSERT INTO districts (district_code, name, localized_name)
VALUES ($1, $2, $3)
ON CONFLICT (district_code) DO UPDATE
    SET name = EXCLUDED.name, localized_name = EXCLUDED.localized_name, updated_at = NOW();
`;

const UPSERT_TALUKA_SQL = `
INSERT INTO talukas (taluka_code, name, localized_name, district_code)
VALUES ($1, $2, $3, $4)
ON CONFLICT (taluka_code) DO UPDATE
    SET name = EXCLUDED.name, localized_name = EXCLUDED.localized_name,
        district_code = EXCLUDED.district_code, updated_at = NOW();
`;

const UPSERT_HOBLI_SQL = `
INSERT INTO hoblis (hobli_code, name, localized_name, taluka_code)
VALUES ($1, $2, $3, $4)
ON CONFLICT (hobli_code) DO UPDATE
    SET name = EXCLUDED.name, localized_name = EXCLUDED.localized_name,
        taluka_code = EXCLUDED.taluka_code, updated_at = NOW();
`;

const UPSERT_VILLAGE_SQL = `
INSERT INTO villages (village_code, hobli_code, name, localized_name, is_urban)
VALUES ($1, $2, $3, $4, $5)
ON CONFLICT (village_code, hobli_code) DO UPDATE
    SET name = EXCLUDED.name, localized_name = EXCLUDED.localized_name,
        is_urban = EXCLUDED.is_urban, updated_at = NOW();
`;

const HIERARCHY_SQL = `
SELECT d.district_code, d.name AS district_name, d.localized_name AS district_localized,
       t.taluka_code, t.name AS taluka_name, t.localized_name AS taluka_localized,
       h.hobli_code, h.name AS hobli_name, h.localized_name AS hobli_localized,
       v.village_code, v.name AS village_name, v.localized_name AS village_localized, v.is_urban
FROM villages v
JOIN hoblis h    ON h.hobli_code = v.hobli_code
JOIN talukas t   ON t.taluka_code = h.taluka_code
JOIN districts d ON d.district_code = t.district_code
WHERE v.village_code = $1
ORDER BY v.name, v.hobli_code
LIMIT 1;
`;

const UPSERT_METADATA_SQL = `
INSERT INTO crawl_metadata (key, value) VALUES ($1, $2)
ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value;
`;

// ─── Row shapes ─────────────────────────────────────────────────────────────

interface NamedRow {
    code: number;
    name: string;
    localized_name: string;
}

interface HierarchyRow {
    district_code: number;
    district_name: string;
    district_localized: string;
    taluka_code: number;
    taluka_name: string;
    taluka_localized: string;
    hobli_code: number;
    hobli_name: string;
    hobli_localized: string;
    village_code: number;
    village_name: string;
    village_localized: string;
    is_urban: boolean;
}

// ─── Store ──────────────────────────────────────────────────────────────────

export class PgLocationStore implements LocationStore {
    constructor(private readonly db: Queryable) {}

    async upsertDistrict(row: District): Promise<void> {
        await this.db.query(UPSERT_DISTRICT_SQL, [row.code, row.name, row.localizedName]);
    }

    async upsertTaluka(row: Taluka): Promise<void> {
        await this.writeChild('taluka', row.code, row.districtCode, UPSERT_TALUKA_SQL,
            [row.code, row.name, row.localizedName, row.districtCode]);
    }

    async upsertHobli(row: Hobli): Promise<void> {
        await this.writeChild('hobli', row.code, row.talukaCode, UPSERT_HOBLI_SQL,
            [row.code, row.name, row.localizedName, row.talukaCode]);
    }

    async upsertVillage(row: Village): Promise<void> {
        await this.writeChild('village', row.code, row.hobliCode, UPSERT_VILLAGE_SQL,
            [row.code, row.hobliCode, row.name, row.localizedName, row.isUrban]);
    }

    async listDistricts(): Promise<District[]> {
        const { rows } = await this.db.query<NamedRow>(
            `SELECT district_code AS code, name, localized_name FROM districts ORDER BY name, district_code`
        );
        return rows.map((r) => ({ code: r.code, name: r.name, localizedName: r.localized_name }));
    }

    async listTalukas(districtCode?: number): Promise<Taluka[]> {
        const { rows } = await this.db.query<NamedRow & { district_code: number }>(
            `SELECT taluka_code AS code, name, localized_name, district_code FROM talukas
             WHERE ($1::int IS NULL OR district_code = $1) ORDER BY name, taluka_code`,
            [districtCode ?? null]
        );
        return rows.map((r) => ({
            code: r.code, name: r.name, localizedName: r.localized_name, districtCode: r.district_code,
        }));
    }

    async listHoblis(talukaCode?: number): Promise<Hobli[]> {
        const { rows } = await this.db.query<NamedRow & { taluka_code: number }>(
            `SELECT hobli_code AS code, name, localized_name, taluka_code FROM hoblis
             WHERE ($1::int IS NULL OR taluka_code = $1) ORDER BY name, hobli_code`,
            [talukaCode ?? null]
        );
        return rows.map((r) => ({
            code: r.code, name: r.name, localizedName: r.localized_name, talukaCode: r.taluka_code,
        }));
    }

    async listVillages(hobliCode?: number): Promise<Village[]> {
        const { rows } = await this.db.query<NamedRow & { hobli_code: number; is_urban: boolean }>(
            `SELECT village_code AS code, name, localized_name, hobli_code, is_urban FROM villages
             WHERE ($1::int IS NULL OR hobli_code = $1) ORDER BY name, village_code, hobli_code`,
            [hobliCode ?? null]
        );
        return rows.map((r) => ({
            code: r.code,
            name: r.name,
            localizedName: r.localized_name,
            hobliCode: r.hobli_code,
            isUrban: r.is_urban,
        }));
    }

    async counts(): Promise<LevelCounts> {
        const { rows } = await this.db.query<{ district: string; taluka: string; hobli: string; village: string }>(`
            SELECT (SELECT COUNT(*) FROM districts)::text AS district,
                   (SELECT COUNT(*) FROM talukas)::text   AS taluka,
                   (SELECT COUNT(*) FROM hoblis)::text    AS hobli,
                   (SELECT COUNT(*) FROM villages)::text  AS village
        `);
        const row = rows[0];
        return {
            district: Number(row?.district ?? 0),
            taluka: Number(row?.taluka ?? 0),
            hobli: Number(row?.hobli ?? 0),
            village: Number(row?.village ?? 0),
        };
    }

    async findVillageHierarchy(villageCode: number): Promise<VillageHierarchy | null> {
        const { rows } = await this.db.query<HierarchyRow>(HIERARCHY_SQL, [villageCode]);
        const r = rows[0];
        if (!r) return null;
        return {
            district: { code: r.district_code, name: r.district_name, localizedName: r.district_localized },
            taluka: {
                code: r.taluka_code, name: r.taluka_name, localizedName: r.taluka_localized,
                districtCode: r.district_code,
            },
            hobli: {
                code: r.hobli_code, name: r.hobli_name, localizedName: r.hobli_localized,
                talukaCode: r.taluka_code,
            },
            village: {
                code: r.village_code, name: r.village_name, localizedName: r.village_localized,
                hobliCode: r.hobli_code, isUrban: r.is_urban,
            },
        };
    }

    async recordCrawlSummary(summary: CrawlSummary, crawledAt: Date = new Date()): Promise<void> {
        await this.db.query(UPSERT_METADATA_SQL, ['last_crawled_at', crawledAt.toISOString()]);
        await this.db.query(UPSERT_METADATA_SQL, ['last_crawl_summary', JSON.stringify(summary)]);
    }

    async lastCrawl(): Promise<StoredCrawlSummary | null> {
        const { rows } = await this.db.query<{ key: string; value: string }>(
            `SELECT key, value FROM crawl_metadata WHERE key IN ('last_crawled_at', 'last_crawl_summary')`
        );
        const crawledAt = rows.find((r) => r.key === 'last_crawled_at')?.value;
        const raw = rows.find((r) => r.key === 'last_crawl_summary')?.value;
        if (!crawledAt || !raw) return null;
        try {
            const summary: CrawlSummary = JSON.parse(raw);
            return { crawledAt, summary };
        } catch (err) {
            log.warning(`[Store] Stored crawl summary is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
            return null;
        }
    }

    // ─── Internals ──────────────────────────────────────────────────────────

    private async writeChild(
        level: LocationLevel,
        code: number,
        parentCode: number,
        sql: string,
        values: unknown[]
    ): Promise<void> {
        try {
            await this.db.query(sql, values);
        } catch (err) {
            if (pgErrorCode(err) === FOREIGN_KEY_VIOLATION) {
                throw new ReferentialIntegrityError(level, code, parentCode);
            }
            throw err;
        }
    }
}
