/**
 * src/search/resultStore.ts
 *
 * Append-only sinks for search results. One SearchResult is one row the
 * portal returned for one target; nothing here updates or deletes.
 */

import { Dataset, log } from 'crawlee';
import type { FieldMap, FieldValue } from '../portal/types.js';
import type { Queryable } from '../utils/db.js';

export interface SearchResult {
    batchId: string;
    districtCode: number;
    talukaCode: number;
    hobliCode: number;
    villageCode: number;
    districtName: string;
    talukaName: string;
    hobliName: string;
    villageName: string;
    partyName: string;
    fromDate: string;
    toDate: string;
    fields: FieldMap;
    recordedAt: Date;
}

export interface ResultSink {
    /** Resolves once every result is durably written. */
    append(results: readonly SearchResult[]): Promise<void>;
}

// ─── PostgreSQL ───────────────────────────────────────────────────────────────

const COLUMNS = [
    'batch_id', 'district_code', 'taluka_code', 'hobli_code', 'village_code', 'village_name',
    'party_name', 'from_date', 'to_date', 'fields', 'recorded_at',
] as const;

/**
 * Writes to `search_results`. `fields` is stored as a JSON array of
 * [key, value] pairs so the portal's column order survives.
 *
 * One multi-row INSERT per append, so a target's rows land together or not
 * at all.
 */
export class PgResultStore implements ResultSink {
    constructor(private readonly db: Queryable) {}

    async append(results: readonly SearchResult[]): Promise<void> {
        if (results.length === 0) return;

        const values: unknown[] = [];
        const tuples = results.map((r) => {
            const base = values.length;
            values.push(
                r.batchId,
                r.districtCode,
                r.talukaCode,
                r.hobliCode,
                r.villageCode,
                r.villageName,
                r.partyName,
                r.fromDate,
                r.toDate,
                JSON.stringify(r.fields),
                r.recordedAt,
            );
            return `(${COLUMNS.map((_, i) => `$${base + i + 1}`).join(', ')})`;
        });

        await this.db.query(
            `INSERT INTO search_results (${COLUMNS.join(', ')}) VALUES ${tuples.join(', ')}`,
            values
        );
        log.debug(`[Store] ${results.length} result row(s) written for village ${results[0]?.villageCode}`);
    }
}

// ─── Crawlee dataset ──────────────────────────────────────────────────────────

/** Target columns first, then the portal's fields under their own names. */
export function flattenResult(result: SearchResult): Record<string, FieldValue> {
    const record: Record<string, FieldValue> = {
        batchId: result.batchId,
        districtCode: result.districtCode,
        talukaCode: result.talukaCode,
        hobliCode: result.hobliCode,
        villageCode: result.villageCode,
        villageName: result.villageName,
        partyName: result.partyName,
        fromDate: result.fromDate,
        toDate: result.toDate,
        recordedAt: result.recordedAt.toISOString(),
    };
    for (const [key, value] of result.fields) {
        record[key in record ? `field_${key}` : key] = value;
    }
    return record;
}

export class DatasetResultSink implements ResultSink {
    private dataset: Dataset | null = null;

    constructor(private readonly datasetName?: string) {}

    async append(results: readonly SearchResult[]): Promise<void> {
        if (results.length === 0) return;
        this.dataset ??= await Dataset.open(this.datasetName);
        await this.dataset.pushData(results.map(flattenResult));
    }
}
