import { decodeTabStateBytes } from '../src/snss/tab-state.js';
import { FormatError, IncompleteDataError, IntegrityError, LimitExceededError, SnssError } from '../src/snss/errors.js';
import { PickleBuilder, buildTabState } from './helpers/pickle-builder.js';

describe('Tab state', () => {
    it('decodes the header and every entry', () => {
        const bytes = buildTabState(true, 1, [
            { index: 0, url: 'https://a.test/' },
            { index: 1, url: 'https://b.test/', title: 'B' },
        ]).finish();

        const state = decodeTabStateBytes(bytes);
        expect(state.isIncognito).toBe(true);
        expect(state.currentEntryIndex).toBe(1);
        expect(state.entries.map(e => [e.index, e.url, e.title]))
            .toEqual([[0, 'https://a.test/', 'Example'], [1, 'https://b.test/', 'B']]);
    });

    it('decodes a tab without entries', () => {
        expect(decodeTabStateBytes(buildTabState(false, -1, []).finish()))
            .toEqual({ isIncognito: false, currentEntryIndex: -1, entries: [] });
    });

    it('requires the full header', () => {
        const bytes = new PickleBuilder().bool(false).int32(1).finish();
        expect(() => decodeTabStateBytes(bytes)).toThrow(IncompleteDataError);
    });

    it('fails when fewer entries follow than announced', () => {
        const b = buildTabState(false, 0, [{ index: 0 }]);
        const bytes = b.finish();
        new DataView(bytes.buffer).setInt32(8, 2, true);
        expect(() => decodeTabStateBytes(bytes)).toThrow(IncompleteDataError);
    });

    it('fails on a nested entry longer than the record', () => {
        const bytes = new PickleBuilder().bool(false).int32(1).int32(0).int32(0).int32(100).finish();
        expect(() => decodeTabStateBytes(bytes)).toThrow(IncompleteDataError);
    });

    it('validates the entry count', () => {
        const negative = new PickleBuilder().bool(false).int32(-1).int32(0).finish();
        expect(() => decodeTabStateBytes(negative)).toThrow(IntegrityError);

        const bytes = buildTabState(false, 0, [{}, {}]).finish();
        expect(() => decodeTabStateBytes(bytes, { limits: { maxTabEntries: 1 } })).toThrow(LimitExceededError);
    });

    it('adds the entry position to decode errors', () => {
        const bytes = buildTabState(false, 0, [{ transition: -1 }]).finish();
        try {
            decodeTabStateBytes(bytes);
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(FormatError);
            if (!(err instanceof SnssError)) throw err;
            expect(err.context).toEqual(['tab entry 0 @ 20']);
        }
    });
});
