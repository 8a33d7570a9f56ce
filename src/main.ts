#!/usr/bin/env node
/**
 * src/main.ts
 *
 * ENTRY POINT: `ec-search <command>`
 *
 *   migrate                     create tables (safe to re-run)
 *   crawl [--district <code>]   refresh the location hierarchy from the portal
 *   stats                       rows per level + last crawl
 *   locate <villageCode>        village code → district/taluka/hobli names
 *   session show | save         inspect / write the session file
 *   search ...                  batch search across a location filter
 *   export [key]                result dataset → CSV
 *   captcha-balance             remaining credit at the solving service
 *
 * LOGGING
 * ───────
 *  • log.txt is truncated at the start of every run and mirrors the console.
 *  • CRAWLEE_LOG_LEVEL sets the level; --verbose forces DEBUG.
 */

import { createRequire } from 'node:module';
import { Command, InvalidArgumentError } from 'commander';
import { log } from 'crawlee';
import { runCaptchaBalanceCommand } from './commands/captcha.js';
import { runCrawlCommand, runMigrateCommand } from './commands/crawl.js';
import { runExportCommand } from './commands/export.js';
import { applyLogLevel, cancelOnSigint, createRuntime, type Runtime } from './commands/runtime.js';
import { runSearchCommand, type SearchCommandOptions } from './commands/search.js';
import { runSessionSaveCommand, runSessionShowCommand } from './commands/session.js';
import { runLocateCommand, runStatsCommand } from './commands/stats.js';
import { env } from './config/env.js';
import { errorMessage, errorName } from './errors.js';
import { closeFileLogger, initFileLogger } from './utils/fileLogger.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

function parseCode(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('expected a non-negative integer code');
    return n;
}

function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

/** Builds the runtime, runs `fn`, and always releases the pool. */
async function withRuntime(fn: (rt: Runtime) => Promise<void>): Promise<void> {
    const rt = createRuntime(env);
    try {
        await fn(rt);
    } finally {
        await rt.close();
    }
}

async function main(): Promise<void> {
    const program = new Command();

    program
        .name('ec-search')
        .description('Crawl the land-records location hierarchy and run batch encumbrance searches')
        .version(pkg.version)
        .option('-v, --verbose', 'debug logging', false)
        .hook('preAction', () => {
            applyLogLevel(env.CRAWLEE_LOG_LEVEL, program.opts<{ verbose: boolean }>().verbose);
        });

    program
        .command('migrate')
        .description('Create the database tables')
        .action(() => withRuntime(runMigrateCommand));

    program
        .command('crawl')
        .description('Fetch districts → talukas → hoblis → villages into the location store')
        .option('-d, --district <code>', 'store all districts but descend only into this one', parseCode)
        .action((opts: { district?: number }) =>
            withRuntime((rt) => runCrawlCommand(rt, opts.district, cancelOnSigint())));

    program
        .command('stats')
        .description('Show stored rows per level and the last crawl')
        .action(() => withRuntime(runStatsCommand));

    program
        .command('locate')
        .argument('<villageCode>', 'village code', parseCode)
        .description('Resolve a village code to its full hierarchy')
        .action((villageCode: number) => withRuntime((rt) => runLocateCommand(rt, villageCode)));

    const sessionCommand = program
        .command('session')
        .description('Inspect or write the session file');

    sessionCommand
        .command('show', { isDefault: true })
        .description('Load the session file, show a preview and validate it against the portal')
        .action(() => withRuntime(runSessionShowCommand));

    sessionCommand
        .command('save')
        .description('Write a session file from a token and/or cookies copied out of the browser')
        .option('-t, --token <token>', 'the _append header value')
        .option('-c, --cookie <name=value>', 'cookie (repeatable)', collect, [])
        .action((opts: { token?: string; cookie: string[] }) =>
            withRuntime((rt) => runSessionSaveCommand(rt, opts.token, opts.cookie)));

    program
        .command('search')
        .description('Search a party name across every village the filter selects')
        .requiredOption('--district <code>', 'district code', parseCode)
        .option('--taluka <code>', 'taluka code', parseCode)
        .option('--hobli <code>', 'hobli code', parseCode)
        .option('--village <code>', 'village code', parseCode)
        .option('--all-talukas', 'every taluka of the district', false)
        .option('--all-hoblis', 'every hobli of each selected taluka', false)
        .option('--all-villages', 'every village of each selected hobli', false)
        .requiredOption('-p, --party <name>', 'party (first) name')
        .option('--middle-name <name>', 'party middle name')
        .option('--last-name <name>', 'party last name')
        .requiredOption('--from <dd/mm/yyyy>', 'start of the registration date range')
        .requiredOption('--to <dd/mm/yyyy>', 'end of the registration date range')
        .option('--reuse-captcha', 'solve once and reuse the text while the portal accepts it')
        .option('--dry-run', 'print the expanded targets and stop', false)
        .action((opts: SearchCommandOptions) =>
            withRuntime((rt) => runSearchCommand(rt, opts, cancelOnSigint())));

    program
        .command('export')
        .argument('[key]', 'key-value store key for the CSV', 'search_results')
        .description('Export the result dataset (RESULT_SINK=dataset) to CSV')
        .action((key: string) => runExportCommand(key));

    program
        .command('captcha-balance')
        .description('Show the remaining balance at the configured CAPTCHA service')
        .action(() => runCaptchaBalanceCommand(env));

    initFileLogger();
    try {
        await program.parseAsync(process.argv);
    } catch (err) {
        log.error(`[CLI] ${errorName(err)}: ${errorMessage(err)}`);
        process.exitCode = 1;
    } finally {
        await closeFileLogger();
    }
}

void main();
