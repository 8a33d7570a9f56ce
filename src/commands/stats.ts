import { LOCATION_LEVELS } from '../locations/types.js';
import type { Runtime } from './runtime.js';
import { print } from '../utils/fileLogger.js';

export async function runStatsCommand(rt: Runtime): Promise<void> {
    const counts = await rt.store.counts();
    const last = await rt.store.lastCrawl();

    print('Location store');
    for (const level of LOCATION_LEVELS) {
        print(`  ${level.padEnd(9)} ${counts[level]}`);
    }
    if (!last) {
        print('\nNo crawl recorded yet. Run `ec-search crawl`.');
        return;
    }
    const { summary } = last;
    print(`\nLast crawl: ${last.crawledAt}${summary.cancelled ? ' (cancelled)' : ''}`);
    print(`  ${summary.failures.length} failure(s), ${(summary.durationMs / 1000).toFixed(1)}s`);
}

export async function runLocateCommand(rt: Runtime, villageCode: number): Promise<void> {
    const found = await rt.store.findVillageHierarchy(villageCode);
    if (!found) {
        print(`Village ${villageCode} is not in the location store.`);
        process.exitCode = 1;
        return;
    }
    const { district, taluka, hobli, village } = found;
    print(`District : ${district.name} (${district.code})`);
    print(`Taluka   : ${taluka.name} (${taluka.code})`);
    print(`Hobli    : ${hobli.name} (${hobli.code})`);
    print(`Village  : ${village.name} (${village.code})${village.isUrban ? ' [urban]' : ''}`);
}
