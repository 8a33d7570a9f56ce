import { Dataset, log } from 'crawlee';
import { print } from '../utils/fileLogger.js';

/** Writes the result dataset as CSV into the default key-value store under `key`. */
export async function runExportCommand(key: string): Promise<void> {
    const dataset = await Dataset.open();
    const { itemCount } = (await dataset.getInfo()) ?? { itemCount: 0 };
    if (itemCount === 0) {
        log.warning('[Export] The result dataset is empty; run a search with RESULT_SINK=dataset first');
        return;
    }
    await dataset.exportToCSV(key);
    print(`Exported ${itemCount} row(s) to "${key}" in the default key-value store`);
}
