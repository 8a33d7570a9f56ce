/**
 * Shared test data: a small hierarchy, a zero-delay policy and a target
 * builder. Imported by *.test.ts files only.
 */

import { DEFAULT_POLICY, type RunPolicy } from '../config/policy.js';
import { MemoryLocationStore } from '../locations/locationStore.js';
import type { SearchTarget } from '../locations/types.js';

export const testPolicy: RunPolicy = {
    ...DEFAULT_POLICY,
    crawlBackoff: { maxAttempts: 3, baseDelayMs: 0, multiplier: 2, maxDelayMs: 0 },
    searchBackoff: { maxAttempts: 1, baseDelayMs: 0, multiplier: 2, maxDelayMs: 0 },
    villageDelayMs: 0,
    searchDelayMs: 0,
};

/**
 * District 10 → talukas 20, 21; hobli 30 under taluka 20;
 * villages 40, 41 under hobli 30.
 */
export async function seedStore(store = new MemoryLocationStore()): Promise<MemoryLocationStore> {
    await store.upsertDistrict({ code: 10, name: 'Alpha District', localizedName: '' });
    await store.upsertTaluka({ code: 20, name: 'Bravo Taluk', localizedName: '', districtCode: 10 });
    await store.upsertTaluka({ code: 21, name: 'Charlie Taluk', localizedName: '', districtCode: 10 });
    await store.upsertHobli({ code: 30, name: 'Delta Hobli', localizedName: '', talukaCode: 20 });
    await store.upsertVillage({ code: 40, name: 'Echo', localizedName: '', hobliCode: 30, isUrban: false });
    await store.upsertVillage({ code: 41, name: 'Foxtrot', localizedName: '', hobliCode: 30, isUrban: true });
    return store;
}

export function target(villageCode: number, villageName = `Village ${villageCode}`): SearchTarget {
    return {
        districtCode: 10,
        talukaCode: 20,
        hobliCode: 30,
        villageCode,
        districtName: 'Alpha District',
        talukaName: 'Bravo Taluk',
        hobliName: 'Delta Hobli',
        villageName,
    };
}
