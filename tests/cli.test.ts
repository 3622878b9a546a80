import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { MockInstance } from 'vitest';
import { buildParser, consoleLogger, decoderOptions, getErrorMessage, jsonReplacer } from '../src/cli.js';
import { IntegrityError } from '../src/snss/errors.js';
import { buildSnssFile, buildTabState, tabRestorePayload, webkitMicros } from './helpers/pickle-builder.js';

describe('snss-reader CLI', () => {
    let tmp: string;
    let log: MockInstance<typeof console.log>;
    let error: MockInstance<typeof console.error>;

    beforeEach(async () => {
        tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'snss-cli-'));
        log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(async () => {
        await fs.rm(tmp, { recursive: true, force: true });
    });

    async function run(...argv: string[]): Promise<void> {
        await buildParser(argv).fail(false).exitProcess(false).parseAsync();
    }

    async function writeInput(name: string, data: Uint8Array): Promise<string> {
        const file = path.join(tmp, name);
        await fs.writeFile(file, data);
        return file;
    }

    it('lists commands', async () => {
        const payload = tabRestorePayload(3, { url: 'https://a.test/' });
        const input = await writeInput('Session', buildSnssFile([{ id: 6, payload }]));

        await run('commands', input);

        expect(log.mock.calls).toEqual([
            ['SNSS version 1'],
            [`8\t6\t${payload.length + 1}`],
        ]);
        expect(process.exitCode).toBeUndefined();
    });

    it('exports CSV tables', async () => {
        const input = await writeInput('Tabs', buildSnssFile([
            { id: 1, payload: tabRestorePayload(3, { index: 0, url: 'https://a.test/' }) },
        ]));
        const outDir = path.join(tmp, 'out');

        await run('export', input, outDir, '--platform', 'desktop');

        expect(log).toHaveBeenCalledWith(`Exported 1 navigation(s) from 1 tab(s), 0 page state file(s) to ${outDir}`);
        expect(await fs.readdir(outDir)).toEqual(['tab3.csv']);
    });

    it('prints a tab state as JSON', async () => {
        const input = await writeInput('tab.pickle', buildTabState(false, 0, [
            { index: 0, url: 'https://a.test/', timestamp: webkitMicros('2020-05-06T07:08:09.000Z') },
        ]).finish());

        await run('tab-state', input);

        expect(log).toHaveBeenCalledTimes(1);
        const printed: unknown = JSON.parse(String(log.mock.calls[0][0]));
        expect(printed).toMatchObject({
            isIncognito: false,
            currentEntryIndex: 0,
            entries: [{ index: 0, url: 'https://a.test/', timestamp: '2020-05-06T07:08:09.000000Z' }],
        });
    });

    it('reports decode errors and sets the exit code', async () => {
        const input = await writeInput('Bad', buildSnssFile([], { magic: 'XXXX' }));

        await run('commands', input);

        expect(error).toHaveBeenCalledWith(
            'IntegrityError [header @ 0]: Invalid header (expected: SNSS (534e5353); actual: 58585858)'
        );
        expect(process.exitCode).toBe(1);
    });

    it('reports a missing input file', async () => {
        await run('tab-state', path.join(tmp, 'missing'));
        expect(error).toHaveBeenCalledTimes(1);
        expect(process.exitCode).toBe(1);
    });

    it('rejects unknown commands', async () => {
        await expect(run('bogus')).rejects.toThrow();
    });
});

describe('CLI helpers', () => {
    it('builds decoder options from global flags', () => {
        const options = decoderOptions({ platform: 'desktop', maxFrameDepth: 8, verbose: false });
        expect(options.platform).toBe('desktop');
        expect(options.limits).toEqual({ maxFrameDepth: 8 });
        expect(decoderOptions({ platform: 'mobile', verbose: false }).limits).toEqual({});
    });

    it('logs debug output only when verbose', () => {
        expect(consoleLogger(false).debug).toBeUndefined();
        expect(consoleLogger(true).debug).toBeTypeOf('function');
    });

    it('formats errors for the terminal', () => {
        expect(getErrorMessage(new IntegrityError('bad', 'pickle', 4))).toBe('IntegrityError [pickle @ 4]: bad');
        expect(getErrorMessage(new Error('plain'))).toBe('plain');
        expect(getErrorMessage('text')).toBe('text');
    });

    it('serializes decoded values', () => {
        const json = JSON.stringify({
            id: 5n,
            data: Uint8Array.from([1, 255]),
            forms: new Map([['f', [{ name: 'a' }]]]),
        }, jsonReplacer);
        expect(json).toBe('{"id":"5","data":"01ff","forms":{"f":[{"name":"a"}]}}');
    });
});
