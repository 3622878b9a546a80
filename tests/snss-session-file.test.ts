import SNSS, { SnssDecoder } from '../src/index.js';
import { FormatError, IncompleteDataError, IntegrityError, SnssError } from '../src/snss/errors.js';
import { PickleBuilder, buildSnssFile, tabRestorePayload } from './helpers/pickle-builder.js';

function twoTabsFile() {
    const first = tabRestorePayload(5, { index: 0, url: 'https://a.test/' });
    const skipped = Uint8Array.from([1, 2, 3]);
    const second = tabRestorePayload(7, { index: 2, url: 'https://b.test/' });
    const data = buildSnssFile([
        { id: 6, payload: first },
        { id: 9, payload: skipped },
        { id: 1, payload: second },
    ]);
    const offsets = [8, 8 + 2 + 1 + first.length, 8 + 2 + 1 + first.length + 2 + 1 + skipped.length];
    return { data, first, second, offsets };
}

describe('SNSS container', () => {
    it('yields nothing for a header without commands', () => {
        const decoder = new SnssDecoder(buildSnssFile([]));
        expect(decoder.readHeader()).toEqual({ version: 1, versionSupported: true });
        expect(Array.from(decoder.navigations())).toEqual([]);
    });

    it('rejects a wrong magic before yielding anything', () => {
        const decoder = new SnssDecoder(buildSnssFile([], { magic: 'SNSX' }));
        expect(() => decoder.readHeader()).toThrow(IntegrityError);
        expect(() => decoder.readHeader()).toThrow('Invalid header (expected: SNSS (534e5353); actual: 534e5358)');
        expect(() => Array.from(new SnssDecoder(buildSnssFile([], { magic: 'XXXX' })).navigations()))
            .toThrow(IntegrityError);
    });

    it('rejects data shorter than the header', () => {
        expect(() => new SnssDecoder(Uint8Array.from([0x53, 0x4E])).readHeader()).toThrow(IncompleteDataError);
        expect(() => new SnssDecoder(Uint8Array.from([0x53, 0x4E, 0x53, 0x53, 1])).readHeader())
            .toThrow(IncompleteDataError);
    });

    it('checks the magic before the version field is complete', () => {
        const decoder = new SnssDecoder(Uint8Array.from([0x41, 0x42, 0x43, 0x44]));
        expect(() => decoder.readHeader()).toThrow(IntegrityError);
        expect(() => decoder.readHeader()).toThrow('Invalid header (expected: SNSS (534e5353); actual: 41424344)');
    });

    it('warns about an unexpected version and keeps decoding', () => {
        const warn = vi.fn();
        const data = buildSnssFile([{ id: 6, payload: tabRestorePayload(1, { url: 'https://a.test/' }) }], { version: 3 });
        const decoder = new SnssDecoder(data, { logger: { warn } });

        expect(decoder.readHeader()).toEqual({ version: 3, versionSupported: false });
        expect(warn).toHaveBeenCalledWith('[SNSS] Invalid version (expected: 1; actual: 3)');
        expect(Array.from(decoder.navigations(), n => n.entry.url)).toEqual(['https://a.test/']);
        expect(warn).toHaveBeenCalledTimes(1);
    });

    it('lists commands with offsets and lengths', () => {
        const { data, first, second, offsets } = twoTabsFile();
        const commands = Array.from(new SnssDecoder(data).commands());
        expect(commands.map(c => [c.id, c.offset, c.length])).toEqual([
            [6, offsets[0], first.length + 1],
            [9, offsets[1], 4],
            [1, offsets[2], second.length + 1],
        ]);
        expect(commands[1].payload).toEqual(Uint8Array.from([1, 2, 3]));
    });

    it('decodes tab-restore commands and skips the rest', () => {
        const { data, offsets } = twoTabsFile();
        const debug = vi.fn();
        const navigations = Array.from(new SnssDecoder(data, { logger: { debug } }).navigations());

        expect(navigations.map(n => [n.tabId, n.entry.index, n.entry.url]))
            .toEqual([[5, 0, 'https://a.test/'], [7, 2, 'https://b.test/']]);
        expect(debug).toHaveBeenCalledWith(`[SNSS] skip command #1 id=9 len=4 @ ${offsets[1]}`);
    });

    it('ends cleanly on a single trailing byte', () => {
        const data = buildSnssFile([{ id: 9, payload: Uint8Array.from([0]) }], { trailing: [0x01] });
        expect(Array.from(new SnssDecoder(data).commands())).toHaveLength(1);
    });

    it('fails on a command shorter than its declared length', () => {
        const data = buildSnssFile([{ id: 6, payload: Uint8Array.from([1, 2, 3]), declaredLength: 50 }]);
        try {
            Array.from(new SnssDecoder(data).commands());
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(IncompleteDataError);
            expect(err).toMatchObject({ stage: 'command', offset: 8 });
        }
    });

    it('fails on a zero-length command', () => {
        const data = buildSnssFile([{ id: 0, payload: new Uint8Array(0), declaredLength: 0 }]);
        // the id byte written by the builder is left over as trailing data
        expect(() => Array.from(new SnssDecoder(data).commands())).toThrow(IntegrityError);
    });

    it('yields entries decoded before a later failure', () => {
        const good = tabRestorePayload(1, { url: 'https://ok.test/' });
        const data = buildSnssFile([
            { id: 6, payload: good },
            { id: 6, payload: Uint8Array.from([1]), declaredLength: 40 },
        ]);
        const iter = new SnssDecoder(data).navigations();
        const first = iter.next();
        expect(first.done).toBe(false);
        if (first.done) return;
        expect(first.value.entry.url).toBe('https://ok.test/');
        expect(() => iter.next()).toThrow(IncompleteDataError);
    });

    it('adds the command position to entry errors', () => {
        const data = buildSnssFile([{ id: 6, payload: tabRestorePayload(1, { transition: -1 }) }]);
        try {
            Array.from(new SnssDecoder(data).navigations());
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(FormatError);
            if (!(err instanceof SnssError)) throw err;
            expect(err.context).toEqual(['command #0 id=6 @ 8']);
        }
    });

    it('requires a tab id in tab-restore payloads', () => {
        const data = buildSnssFile([{ id: 1, payload: new PickleBuilder().finish() }]);
        expect(() => Array.from(new SnssDecoder(data).navigations())).toThrow(IncompleteDataError);
    });

    it('hands out a single command stream per decoder', () => {
        const decoder = new SnssDecoder(twoTabsFile().data);
        expect(Array.from(decoder.navigations())).toHaveLength(2);
        expect(() => Array.from(decoder.commands())).toThrow(SnssError);
        expect(() => Array.from(decoder.navigations())).toThrow('Command stream already consumed');
    });

    it('decodes identical files to equal results', () => {
        const { data } = twoTabsFile();
        expect(Array.from(SNSS.navigations(data))).toEqual(Array.from(SNSS.navigations(Uint8Array.from(data))));
    });
});
