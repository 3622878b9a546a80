import type { NavigationEntry, TabState } from '../snss-types.js';
import type { SnssDecoderOptions } from './types.js';
import { resolveOptions } from './types.js';
import { PickleReader } from './pickle.js';
import { PickleType } from './format.js';
import { IncompleteDataError, IntegrityError, SnssError } from './errors.js';
import { decodeNavigationEntry } from './navigation-entry.js';

const STAGE = 'tab-state';

const TAB_STATE_HEADER = [PickleType.Bool, PickleType.Int32, PickleType.Int32] as const;

/**
 * Decodes a whole tab snapshot: incognito flag, entry count, current index,
 * then one length-tagged nested pickle per navigation entry.
 */
export function decodeTabState(reader: PickleReader, options: SnssDecoderOptions = {}): TabState {
    const { limits } = resolveOptions(options);
    const [isIncognito, entryCount, currentEntryIndex] = reader.iterDeserialize(TAB_STATE_HEADER, true);

    if (typeof isIncognito !== 'boolean' || typeof entryCount !== 'number' || typeof currentEntryIndex !== 'number') {
        throw new IntegrityError('Tab state header has unexpected field types', STAGE, 0);
    }
    reader.checkCount(entryCount, limits.maxTabEntries, 'entries', STAGE, 8);

    const entries: NavigationEntry[] = [];
    for (let i = 0; i < entryCount; i++) {
        // historical blob length, informational only
        reader.expect(reader.readInt32(), `entries[${i}].length`, STAGE);

        const at = reader.offset;
        const nested = reader.readPickle();
        if (!nested.ok) {
            throw new IncompleteDataError(`Navigation entry ${i} of ${entryCount} is truncated`, STAGE, at);
        }
        try {
            entries.push(decodeNavigationEntry(nested.value, options));
        } catch (err) {
            if (err instanceof SnssError) err.withContext(`tab entry ${i} @ ${at}`);
            throw err;
        }
    }

    return { isIncognito, currentEntryIndex, entries };
}

export function decodeTabStateBytes(data: Uint8Array, options: SnssDecoderOptions = {}): TabState {
    return decodeTabState(new PickleReader(data), options);
}
