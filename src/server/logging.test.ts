import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { log } from './logging.js';

afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
});

describe('log', () => {
    it('writes info as a JSON line to stdout', () => {
        vi.stubEnv('LOG_LEVEL', 'info');
        vi.stubEnv('LOG_FILE', '');
        const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        log('info', 'Wrote feed.xml', { items: 4 });

        expect(out).toHaveBeenCalledTimes(1);
        const entry = JSON.parse(String(out.mock.calls[0][0]));
        expect(entry).toMatchObject({ level: 'info', message: 'Wrote feed.xml', context: { items: 4 } });
    });

    it('sends warnings to stderr and filters below LOG_LEVEL', () => {
        vi.stubEnv('LOG_LEVEL', 'warn');
        vi.stubEnv('LOG_FILE', '');
        const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        log('info', 'hidden');
        log('warn', 'Feed source unavailable');

        expect(out).not.toHaveBeenCalled();
        expect(err).toHaveBeenCalledTimes(1);
    });

    it('mirrors entries to LOG_FILE', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'jp-sports-log-'));
        const file = path.join(dir, 'run.log');
        vi.stubEnv('LOG_LEVEL', 'info');
        vi.stubEnv('LOG_FILE', file);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);

        log('error', 'Static build failed', { error: 'boom' });

        const line = fs.readFileSync(file, 'utf8');
        fs.rmSync(dir, { recursive: true, force: true });
        expect(line).toMatch(/^\S+ \[ERROR\] Static build failed \{"error":"boom"\}\n$/);
    });
});
