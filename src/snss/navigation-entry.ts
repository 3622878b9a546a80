import type { NavigationEntry, PageState } from '../snss-types.js';
import type { SnssDecoderOptions } from './types.js';
import type { FieldSpec, PickleReader } from './pickle.js';
import { PickleType } from './format.js';
import { SnssError } from './errors.js';
import { decodePageStateBlob } from './frame-state.js';
import { decodeTransition } from './transition.js';

/**
 * Serialized navigation entry fields, in write order. Newer writers append a
 * second referrer policy slot; it replaces the first only when present.
 */
export const NAVIGATION_ENTRY_FIELDS: readonly FieldSpec[] = [
    ['index', PickleType.Int32],
    ['url', PickleType.String],
    ['title', PickleType.String16],
    ['pageStateBlob', PickleType.Blob],
    ['transitionType', PickleType.Int32],
    ['typeMask', PickleType.Int32],
    ['referrerUrl', PickleType.String],
    ['referrerPolicy', PickleType.Int32],
    ['originalRequestUrl', PickleType.String],
    ['isOverridingUserAgent', PickleType.Bool],
    ['timestamp', PickleType.DateTime],
    ['searchTerms', PickleType.String16],
    ['httpStatusCode', PickleType.Int32],
    ['referrerPolicy', PickleType.Int32],
];

/**
 * Reads one navigation entry. Trailing fields missing from older records
 * come back as null; page state and transition are decoded eagerly.
 */
export function decodeNavigationEntry(reader: PickleReader, options: SnssDecoderOptions = {}): NavigationEntry {
    const fields = reader.deserializeInto(NAVIGATION_ENTRY_FIELDS);

    const pageStateBlob = fields.bytes('pageStateBlob');
    let pageState: PageState | null = null;
    if (pageStateBlob !== null && pageStateBlob.length > 0) {
        try {
            pageState = decodePageStateBlob(pageStateBlob, options);
        } catch (err) {
            if (err instanceof SnssError) err.withContext(`navigation entry ${fields.int('index') ?? '?'} page state`);
            throw err;
        }
    }

    const rawTransition = fields.int('transitionType');

    return {
        index: fields.int('index'),
        url: fields.string('url'),
        title: fields.string('title'),
        pageState,
        rawTransition,
        transition: rawTransition === null ? null : decodeTransition(rawTransition),
        typeMask: fields.int('typeMask'),
        referrerUrl: fields.string('referrerUrl'),
        referrerPolicy: fields.int('referrerPolicy'),
        originalRequestUrl: fields.string('originalRequestUrl'),
        isOverridingUserAgent: fields.bool('isOverridingUserAgent'),
        timestamp: fields.timestamp('timestamp'),
        searchTerms: fields.string('searchTerms'),
        httpStatusCode: fields.int('httpStatusCode'),
    };
}
