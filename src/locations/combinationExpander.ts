/**
 * src/locations/combinationExpander.ts
 *
 * Turns a partial location filter into the ordered list of village-level
 * search targets for one batch run.
 *
 * Each level below the district is resolved within its already-resolved
 * parents:
 *   all flag set      → every child
 *   code given        → the child with that code, if the parent has it
 *   neither           → every child
 * The `all` flag wins over a code at the same level. A code set beneath an
 * `all` level therefore narrows each expanded parent rather than being
 * rejected. A district code is mandatory: expansion across every district
 * is refused.
 */

import { log } from 'crawlee';
import { z } from 'zod';
import { InvalidFilterError } from '../errors.js';
import type { LocationStore } from './locationStore.js';
import { targetKey, type SearchTarget } from './types.js';

// ─── Filter ───────────────────────────────────────────────────────────────────

const code = z.number().int().nonnegative();

export const locationFilterSchema = z.object({
    districtCode: code.optional(),
    talukaCode: code.optional(),
    hobliCode: code.optional(),
    villageCode: code.optional(),
    allTalukas: z.boolean().default(false),
    allHoblis: z.boolean().default(false),
    allVillages: z.boolean().default(false),
});

export type LocationFilter = z.input<typeof locationFilterSchema>;

export interface Expansion {
    targets: SearchTarget[];
    duplicatesRemoved: number;
}

function pick<T extends { code: number }>(rows: T[], all: boolean, wanted: number | undefined): T[] {
    if (all || wanted === undefined) return rows;
    return rows.filter((r) => r.code === wanted);
}

// ─── Expander ─────────────────────────────────────────────────────────────────

export class CombinationExpander {
    constructor(private readonly store: LocationStore) {}

    async expand(input: LocationFilter): Promise<Expansion> {
        const parsed = locationFilterSchema.safeParse(input);
        if (!parsed.success) {
            throw new InvalidFilterError(
                'Invalid location filter: ' +
                parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
            );
        }
        const filter = parsed.data;
        if (filter.districtCode === undefined) {
            throw new InvalidFilterError('A district is required; searching every district is not allowed');
        }

        const district = (await this.store.listDistricts()).find((d) => d.code === filter.districtCode);
        if (!district) {
            throw new InvalidFilterError(`District ${filter.districtCode} is not in the location store`);
        }

        const candidates: SearchTarget[] = [];
        const talukas = pick(await this.store.listTalukas(district.code), filter.allTalukas, filter.talukaCode);
        for (const taluka of talukas) {
            const hoblis = pick(await this.store.listHoblis(taluka.code), filter.allHoblis, filter.hobliCode);
            for (const hobli of hoblis) {
                const villages = pick(await this.store.listVillages(hobli.code), filter.allVillages, filter.villageCode);
                for (const village of villages) {
                    candidates.push({
                        districtCode: district.code,
                        talukaCode: taluka.code,
                        hobliCode: hobli.code,
                        villageCode: village.code,
                        districtName: district.name,
                        talukaName: taluka.name,
                        hobliName: hobli.name,
                        villageName: village.name,
                    });
                }
            }
        }

        const seen = new Set<string>();
        const targets = candidates.filter((t) => {
            const key = targetKey(t);
            if (seen.has(key)) return false;
            seen.add(key);
            return true;
        });
        const duplicatesRemoved = candidates.length - targets.length;

        if (duplicatesRemoved > 0) {
            log.info(`[Expander] Removed ${duplicatesRemoved} duplicate combinations`);
        }
        log.info(`[Expander] ${targets.length} search targets under ${district.name} (${district.code})`);
        return { targets, duplicatesRemoved };
    }
}
