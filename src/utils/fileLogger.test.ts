import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { log } from 'crawlee';
import { closeFileLogger, initFileLogger, print } from './fileLogger.js';

afterEach(() => {
    vi.restoreAllMocks();
});

describe('fileLogger', () => {
    it('mirrors command output and log lines into the file', async () => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'file-logger-'));
        const file = path.join(dir, 'log.txt');

        initFileLogger(file);
        print('Session file : session.json');
        log.info('[Test] mirrored');
        await closeFileLogger();
        print('after close');

        const lines = fs.readFileSync(file, 'utf-8').split('\n');
        expect(lines).toContain('Session file : session.json');
        expect(lines.some((l) => l.endsWith('[Test] mirrored'))).toBe(true);
        expect(lines).not.toContain('after close');
        fs.rmSync(dir, { recursive: true, force: true });
    });
});
