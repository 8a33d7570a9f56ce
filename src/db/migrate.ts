/**
 * src/db/migrate.ts
 *
 * Idempotent database migration for the location hierarchy and the
 * search result log.
 *
 * Run:  npm run db:migrate   (or `ec-search migrate`)
 *
 * Uses CREATE TABLE IF NOT EXISTS / CREATE INDEX IF NOT EXISTS, so it is
 * safe to run any number of times without data loss.
 */

import { log } from 'crawlee';
import type { Queryable } from '../utils/db.js';

// ─── Schema ─────────────────────────────────────────────────────────────────

const CREATE_TABLES = [
    `
CREATE TABLE IF NOT EXISTS districts (
    district_code   INTEGER PRIMARY KEY,
    name            TEXT NOT NULL,
    localized_name  TEXT NOT NULL DEFAULT '',
    updated_at      TIMESTAMPTZ NOT NULL DEFAULT NOW()
);`,
    `
CREATE TABLE IF NOT EXISTS talukas (
    taluka_code     INTEGER PRIMARY KEY,
    name            TEXT NOT NULL,
    localized_name  TEXT NOT NULL DEFAULT '',
    district_code   INTEGER NOT NULL REFERENCES districts(district_code),
    updated_at      TIMESTAMPTZ NOT NULL DEFAULT NOW()
);`,
    `
CREATE TABLE IF NOT EXISTS hoblis (
    hobli_code      INTEGER PRIMARY KEY,
    name            TEXT NOT NULL,
    localized_name  TEXT NOT NULL DEFAULT '',
    taluka_code     INTEGER NOT NULL REFERENCES talukas(taluka_code),
    updated_at      TIMESTAMPTZ NOT NULL DEFAULT NOW()
);`,
    // Village codes repeat across hoblis, so the key is the pair.
    `
CREATE TABLE IF NOT EXISTS villages (
    village_code    INTEGER NOT NULL,
    hobli_code      INTEGER NOT NULL REFERENCES hoblis(hobli_code),
    name            TEXT NOT NULL,
    localized_name  TEXT NOT NULL DEFAULT '',
    is_urban        BOOLEAN NOT NULL DEFAULT FALSE,
    updated_at      TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    PRIMARY KEY (village_code, hobli_code)
);`,
    `
CREATE TABLE IF NOT EXISTS crawl_metadata (
    key             TEXT PRIMARY KEY,
    value           TEXT NOT NULL
);`,
    // Append-only. `fields` is JSON (not JSONB) to keep the portal's column order.
    `
CREATE TABLE IF NOT EXISTS search_results (
    id              BIGSERIAL PRIMARY KEY,
    batch_id        TEXT NOT NULL,
    district_code   INTEGER NOT NULL,
    taluka_code     INTEGER NOT NULL,
    hobli_code      INTEGER NOT NULL,
    village_code    INTEGER NOT NULL,
    village_name    TEXT NOT NULL,
    party_name      TEXT NOT NULL,
    from_date       TEXT NOT NULL,
    to_date         TEXT NOT NULL,
    fields          JSON NOT NULL,
    recorded_at     TIMESTAMPTZ NOT NULL DEFAULT NOW()
);`,
];

const INDEXES = [
    `CREATE INDEX IF NOT EXISTS idx_talukas_district   ON talukas(district_code);`,
    `CREATE INDEX IF NOT EXISTS idx_hoblis_taluka      ON hoblis(taluka_code);`,
    `CREATE INDEX IF NOT EXISTS idx_villages_hobli     ON villages(hobli_code);`,
    `CREATE INDEX IF NOT EXISTS idx_results_batch      ON search_results(batch_id);`,
    `CREATE INDEX IF NOT EXISTS idx_results_village    ON search_results(village_code);`,
];

// ─── Runner ─────────────────────────────────────────────────────────────────

export async function migrate(db: Queryable): Promise<void> {
    log.info('[migrate] Creating tables…');
    for (const ddl of CREATE_TABLES) {
        await db.query(ddl);
    }
    log.info(`[migrate] ✓ ${CREATE_TABLES.length} tables ready.`);

    log.info('[migrate] Creating indexes…');
    for (const idx of INDEXES) {
        await db.query(idx);
    }
    log.info(`[migrate] ✓ ${INDEXES.length} indexes in place.`);
}
