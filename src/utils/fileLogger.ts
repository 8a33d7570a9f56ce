/**
 * src/utils/fileLogger.ts
 *
 * Dual-output logging: every Crawlee log line goes to the console as usual
 * AND to `log.txt`. Command output printed through print() is mirrored too.
 *
 *  • initFileLogger() truncates the file, so each run starts clean.
 *  • Lines are written without colour codes.
 *  • closeFileLogger() flushes and closes the stream and restores the
 *    plain console logger.
 */

import * as fs from 'fs';
import * as path from 'path';
import { log, LoggerText, LogLevel } from 'crawlee';

const DEFAULT_LOG_FILE = path.resolve(process.cwd(), 'log.txt');
const ANSI = /\x1b\[[0-9;]*m/g;

let writeStream: fs.WriteStream | null = null;

class TeeLogger extends LoggerText {
    override _outputWithConsole(level: LogLevel, line: string): void {
        super._outputWithConsole(level, line);
        writeStream?.write(`${line.replace(ANSI, '')}\n`);
    }
}

/** Console output for commands; lands in the log file while one is open. */
export function print(line = ''): void {
    console.log(line);
    writeStream?.write(`${line}\n`);
}

export function initFileLogger(filePath: string = DEFAULT_LOG_FILE): void {
    fs.writeFileSync(filePath, '', 'utf-8');
    writeStream = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
    writeStream.on('error', (err) => {
        writeStream = null;
        console.error(`[FileLogger] Writing ${filePath} failed, console only from here: ${err.message}`);
    });
    log.setOptions({ logger: new TeeLogger() });
    log.debug(`[FileLogger] Mirroring log output to ${filePath}`);
}

export function closeFileLogger(): Promise<void> {
    const stream = writeStream;
    writeStream = null;
    log.setOptions({ logger: new LoggerText() });
    if (!stream) return Promise.resolve();
    return new Promise((resolve) => stream.end(resolve));
}
