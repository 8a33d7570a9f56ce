import { describe, it, expect, vi } from 'vitest';
import { target } from '../testing/fixtures.js';
import { PgResultStore, flattenResult, type SearchResult } from './resultStore.js';

function fakeDb() {
    return { query: vi.fn().mockResolvedValue({ rows: [], rowCount: 0 }) };
}

function result(docNo: string, fields: SearchResult['fields'] = [['DocNo', docNo]]): SearchResult {
    return {
        batchId: 'batch-1',
        ...target(40, 'Echo'),
        partyName: 'Ramesh',
        fromDate: '01/01/2020',
        toDate: '31/12/2023',
        fields,
        recordedAt: new Date('2024-03-01T10:00:00.000Z'),
    };
}

describe('PgResultStore', () => {
    it('writes all rows of an append in one statement', async () => {
        const db = fakeDb();
        await new PgResultStore(db).append([result('D-1'), result('D-2')]);

        expect(db.query).toHaveBeenCalledTimes(1);
        const [sql, values] = db.query.mock.calls[0] ?? [];
        expect(sql).toBe(
            'INSERT INTO search_results (batch_id, district_code, taluka_code, hobli_code, village_code, ' +
            'village_name, party_name, from_date, to_date, fields, recorded_at) VALUES ' +
            '($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11), ' +
            '($12, $13, $14, $15, $16, $17, $18, $19, $20, $21, $22)'
        );
        expect(values).toHaveLength(22);
        expect(values?.slice(0, 10)).toEqual([
            'batch-1', 10, 20, 30, 40, 'Echo', 'Ramesh', '01/01/2020', '31/12/2023', '[["DocNo","D-1"]]',
        ]);
        expect(values?.[20]).toBe('[["DocNo","D-2"]]');
    });

    it('does nothing for an empty append', async () => {
        const db = fakeDb();
        await new PgResultStore(db).append([]);
        expect(db.query).not.toHaveBeenCalled();
    });
});

describe('flattenResult', () => {
    it('puts target columns first and keeps field order', () => {
        const flat = flattenResult(result('D-1', [['DocNo', 'D-1'], ['Pages', 3]]));

        expect(Object.keys(flat)).toEqual([
            'batchId', 'districtCode', 'talukaCode', 'hobliCode', 'villageCode', 'villageName',
            'partyName', 'fromDate', 'toDate', 'recordedAt', 'DocNo', 'Pages',
        ]);
        expect(flat.recordedAt).toBe('2024-03-01T10:00:00.000Z');
        expect(flat.Pages).toBe(3);
    });

    it('prefixes a field that collides with a target column', () => {
        const flat = flattenResult(result('D-1', [['villageName', 'From portal']]));

        expect(flat.villageName).toBe('Echo');
        expect(flat.field_villageName).toBe('From portal');
    });
});
