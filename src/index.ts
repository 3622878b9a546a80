/**
 * SNSS Reader Public API
 *
 * @module snss
 */

import { SnssDecoder } from './snss/session-file.js';
import { PickleReader } from './snss/pickle.js';
import { decodeTabStateBytes } from './snss/tab-state.js';
import { decodePageStateBlob } from './snss/frame-state.js';
import type { PageState, TabNavigation, TabState } from './snss-types.js';
import type { SnssDecoderOptions } from './snss/types.js';

export type {
    FrameState, PageState, LegacyPageState, VersionedPageState, HttpBody, HttpBodyElement,
    HttpBodyDataElement, HttpBodyFileElement, HttpBodyBlobElement, FormState, FormControlState,
    NavigationEntry, TabState, SessionHeader, SessionCommand, TabNavigation
} from './snss-types.js';
export type { SnssDecoderOptions as DecoderOptions, SnssLogger as Logger, DecodeLimits, Platform } from './snss/types.js';
export { DEFAULT_LIMITS } from './snss/types.js';
export { SnssError, IntegrityError, IncompleteDataError, FormatError, LimitExceededError } from './snss/errors.js';
export type { DecodeStage } from './snss/errors.js';
export { PickleReader } from './snss/pickle.js';
export type { ReadResult, PickleValue, FieldSpec, BlobLengthMode } from './snss/pickle.js';
export { FieldMap } from './snss/field-map.js';
export { PickleType, FORM_STATE_MAGIC, PAGE_STATE_MIN_VERSION, PAGE_STATE_CURRENT_VERSION } from './snss/format.js';
export { WebkitTimestamp } from './snss/timestamp.js';
export { decodeTransition, splitTransition, formatTransition } from './snss/transition.js';
export type { ChromeTransition, CoreTransition, TransitionBits, TransitionQualifier } from './snss/transition.js';
export { decodeHttpBody, httpBodyParts } from './snss/http-body.js';
export { decodePageState, decodePageStateBlob, decodeFrameState, flattenFrames } from './snss/frame-state.js';
export { FRAME_STATE_LAYOUT } from './snss/frame-layout.js';
export { decodeFormState, isFormState, formStateToObject } from './snss/form-state.js';
export { decodeNavigationEntry, NAVIGATION_ENTRY_FIELDS } from './snss/navigation-entry.js';
export { decodeTabState, decodeTabStateBytes } from './snss/tab-state.js';
export { SnssDecoder } from './snss/session-file.js';
export { exportSession } from './export/session-export.js';
export type { ExportSummary } from './export/session-export.js';

// The SNSS Namespace Object
export const SNSS = {
    /**
     * Lazily decodes the tab-restore commands of an SNSS file.
     */
    navigations: (data: Uint8Array, options?: SnssDecoderOptions): Generator<TabNavigation, void, undefined> => {
        return new SnssDecoder(data, options).navigations();
    },

    /**
     * Decodes a whole tab snapshot pickle.
     */
    tabState: (data: Uint8Array, options?: SnssDecoderOptions): TabState => {
        return decodeTabStateBytes(data, options);
    },

    /**
     * Decodes a page state blob as found in a navigation entry.
     */
    pageState: (data: Uint8Array, options?: SnssDecoderOptions): PageState => {
        return decodePageStateBlob(data, options);
    },

    Decoder: SnssDecoder,

    Reader: PickleReader,
};

export default SNSS;
