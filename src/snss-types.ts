import type { ChromeTransition } from './snss/transition.js';
import type { WebkitTimestamp } from './snss/timestamp.js';

// --- HTTP body ---

export interface HttpBodyDataElement {
    type: 'data';
    data: Uint8Array;
}

export interface HttpBodyFileElement {
    type: 'file';
    /** `utf16` for plain file elements, `utf8` for file system URLs. */
    pathEncoding: 'utf16' | 'utf8';
    path: string | null;
    start: bigint;
    length: bigint;
    /** Seconds since the Unix epoch, as a double. */
    modificationTime: number;
}

export interface HttpBodyBlobElement {
    type: 'blob';
    uuid: string | null;
}

export type HttpBodyElement = HttpBodyDataElement | HttpBodyFileElement | HttpBodyBlobElement;

export interface HttpBody {
    elements: HttpBodyElement[];
    identifier: bigint;
    containsPasswords: boolean;
    /** Read after the body by the enclosing frame state. */
    contentType: string | null;
}

// --- Form state ---

export interface FormControlState {
    name: string;
    type: string;
    values: string[];
}

/** Form id → control states, in first-seen order. */
export type FormState = Map<string, FormControlState[]>;

// --- Page / frame state ---

export interface FrameState {
    version: number;
    url: string | null;
    target: string | null;
    scrollOffset: [x: number, y: number];
    referrer: string | null;
    documentState: Array<string | null>;
    /** Decoded document state, or null when it is opaque. */
    formState: FormState | null;
    pageScaleFactor: number;
    itemSequenceNumber: bigint;
    documentSequenceNumber: bigint;
    /** -1 when the version does not carry it. */
    referrerPolicy: number;
    pinchViewportScrollOffset: [x: number, y: number];
    scrollRestorationType: number;
    stateObject: string | null;
    httpBody: HttpBody | null;
    children: FrameState[];
}

export interface LegacyPageState {
    kind: 'legacy';
    url: string | null;
}

export interface VersionedPageState {
    kind: 'versioned';
    version: number;
    referencedFiles: Array<string | null>;
    frame: FrameState;
}

export type PageState = LegacyPageState | VersionedPageState;

// --- Navigation ---

export interface NavigationEntry {
    index: number | null;
    url: string | null;
    title: string | null;
    pageState: PageState | null;
    rawTransition: number | null;
    transition: ChromeTransition | null;
    typeMask: number | null;
    referrerUrl: string | null;
    referrerPolicy: number | null;
    originalRequestUrl: string | null;
    isOverridingUserAgent: boolean | null;
    timestamp: WebkitTimestamp | null;
    searchTerms: string | null;
    httpStatusCode: number | null;
}

export interface TabState {
    isIncognito: boolean;
    currentEntryIndex: number;
    entries: NavigationEntry[];
}

// --- Session container ---

export interface SessionHeader {
    version: number;
    versionSupported: boolean;
}

export interface SessionCommand {
    id: number;
    /** File offset of the command's length prefix. */
    offset: number;
    /** Payload length including the id byte. */
    length: number;
    /** Bytes after the id byte. */
    payload: Uint8Array;
}

export interface TabNavigation {
    tabId: number;
    entry: NavigationEntry;
}
