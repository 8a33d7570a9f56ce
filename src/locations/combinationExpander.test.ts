import { describe, it, expect } from 'vitest';
import { InvalidFilterError } from '../errors.js';
import { seedStore } from '../testing/fixtures.js';
import { CombinationExpander } from './combinationExpander.js';
import { MemoryLocationStore } from './locationStore.js';
import { targetKey, type Village } from './types.js';

describe('CombinationExpander', () => {
    it('expands a fixed taluka with all hoblis to every village beneath it', async () => {
        const expander = new CombinationExpander(await seedStore());
        const { targets, duplicatesRemoved } = await expander.expand({ districtCode: 10, talukaCode: 20, allHoblis: true });

        expect(targets.map(targetKey)).toEqual(['10/20/30/40', '10/20/30/41']);
        expect(targets[0]).toEqual({
            districtCode: 10,
            talukaCode: 20,
            hobliCode: 30,
            villageCode: 40,
            districtName: 'Alpha District',
            talukaName: 'Bravo Taluk',
            hobliName: 'Delta Hobli',
            villageName: 'Echo',
        });
        expect(duplicatesRemoved).toBe(0);
    });

    it('narrows to one village when every level is fixed', async () => {
        const expander = new CombinationExpander(await seedStore());
        const { targets } = await expander.expand({ districtCode: 10, talukaCode: 20, hobliCode: 30, villageCode: 41 });
        expect(targets.map(targetKey)).toEqual(['10/20/30/41']);
    });

    it('scopes a fixed hobli to the talukas an all-talukas filter resolves', async () => {
        const store = await seedStore();
        await store.upsertHobli({ code: 31, name: 'Golf Hobli', localizedName: '', talukaCode: 21 });
        await store.upsertVillage({ code: 42, name: 'Hotel', localizedName: '', hobliCode: 31, isUrban: false });

        const { targets } = await new CombinationExpander(store).expand({ districtCode: 10, allTalukas: true, hobliCode: 31 });
        expect(targets.map(targetKey)).toEqual(['10/21/31/42']);
    });

    it('lets the all flag win over a code at the same level', async () => {
        const expander = new CombinationExpander(await seedStore());
        const { targets } = await expander.expand({ districtCode: 10, talukaCode: 20, allVillages: true, villageCode: 40 });
        expect(targets.map(targetKey)).toEqual(['10/20/30/40', '10/20/30/41']);
    });

    it('returns the same ordered list on repeated calls', async () => {
        const expander = new CombinationExpander(await seedStore());
        const filter = { districtCode: 10, allTalukas: true, allHoblis: true, allVillages: true };

        const first = await expander.expand(filter);
        const second = await expander.expand(filter);
        expect(second.targets).toEqual(first.targets);
    });

    it('rejects a filter without a district', async () => {
        const expander = new CombinationExpander(await seedStore());
        await expect(expander.expand({ allTalukas: true })).rejects.toBeInstanceOf(InvalidFilterError);
    });

    it('rejects a district the store does not hold', async () => {
        const expander = new CombinationExpander(await seedStore());
        await expect(expander.expand({ districtCode: 99 }))
            .rejects.toThrow('District 99 is not in the location store');
    });

    it('rejects malformed codes', async () => {
        const expander = new CombinationExpander(await seedStore());
        await expect(expander.expand({ districtCode: 10, talukaCode: -1 })).rejects.toBeInstanceOf(InvalidFilterError);
    });

    it('removes a leaf reached twice and reports it', async () => {
        class DoublingStore extends MemoryLocationStore {
            override async listVillages(hobliCode?: number): Promise<Village[]> {
                const rows = await super.listVillages(hobliCode);
                return [...rows, ...rows];
            }
        }
        const doubling = await seedStore(new DoublingStore());

        const { targets, duplicatesRemoved } = await new CombinationExpander(doubling)
            .expand({ districtCode: 10, talukaCode: 20 });

        expect(targets.map(targetKey)).toEqual(['10/20/30/40', '10/20/30/41']);
        expect(duplicatesRemoved).toBe(2);
    });

    it('yields nothing for a taluka without hoblis', async () => {
        const expander = new CombinationExpander(await seedStore());
        const { targets } = await expander.expand({ districtCode: 10, talukaCode: 21 });
        expect(targets).toEqual([]);
    });
});
