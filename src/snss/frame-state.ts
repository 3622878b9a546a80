/**
 * Page state: a version header, the files a page references and a tree of
 * frame states (main frame first, nested frames as children).
 *
 * Frame fields follow {@link FRAME_STATE_LAYOUT}; this module only knows how
 * to read each field kind.
 */
import type { FrameState, HttpBody, PageState } from '../snss-types.js';
import type { DecodeLimits, Platform, SnssDecoderOptions } from './types.js';
import { resolveOptions } from './types.js';
import { PickleReader } from './pickle.js';
import {
    PAGE_STATE_LEGACY_VERSION, PAGE_STATE_MIN_VERSION, PAGE_STATE_CURRENT_VERSION
} from './format.js';
import { FormatError, LimitExceededError } from './errors.js';
import { layoutFor } from './frame-layout.js';
import type { FrameField, SkippedKind } from './frame-layout.js';
import { decodeHttpBody } from './http-body.js';
import { decodeFormState } from './form-state.js';

const STAGE = 'frame-state';

interface FrameFields {
    url: string | null;
    target: string | null;
    scrollX: number;
    scrollY: number;
    referrer: string | null;
    documentState: Array<string | null>;
    pageScaleFactor: number;
    itemSequenceNumber: bigint;
    documentSequenceNumber: bigint;
    referrerPolicy: number;
    pinchX: number;
    pinchY: number;
    scrollRestorationType: number;
    stateObject: string | null;
    httpBody: HttpBody | null;
}

/** Values for fields a version does not carry. */
function defaultFrameFields(): FrameFields {
    return {
        url: null,
        target: null,
        scrollX: 0,
        scrollY: 0,
        referrer: null,
        documentState: [],
        pageScaleFactor: 0,
        itemSequenceNumber: 0n,
        documentSequenceNumber: 0n,
        referrerPolicy: -1,
        pinchX: -1,
        pinchY: -1,
        scrollRestorationType: -1,
        stateObject: null,
        httpBody: null,
    };
}

interface FrameContext {
    version: number;
    isTop: boolean;
    platform: Platform;
    limits: DecodeLimits;
    depth: number;
    /** Frames decoded so far in this page state, shared across the tree. */
    frameCount: { value: number };
}

type FieldReaders = { [F in FrameField]: (reader: PickleReader, ctx: FrameContext) => FrameFields[F] };

const string16 = (field: string) => (reader: PickleReader): string | null =>
    reader.expect(reader.readString16ByteCount(), field, STAGE);
const int32 = (field: string) => (reader: PickleReader): number =>
    reader.expect(reader.readInt32(), field, STAGE);
const int64 = (field: string) => (reader: PickleReader): bigint =>
    reader.expect(reader.readInt64(), field, STAGE);
const doubleBlob = (field: string) => (reader: PickleReader): number =>
    reader.readDoubleBlob(field, STAGE);

const FIELD_READERS: FieldReaders = {
    url: string16('url'),
    target: string16('target'),
    scrollX: int32('scrollOffset.x'),
    scrollY: int32('scrollOffset.y'),
    referrer: string16('referrer'),
    documentState: (reader, ctx) => reader.readStringVector('documentState', ctx.limits.maxVectorLength, STAGE),
    pageScaleFactor: doubleBlob('pageScaleFactor'),
    itemSequenceNumber: int64('itemSequenceNumber'),
    documentSequenceNumber: int64('documentSequenceNumber'),
    referrerPolicy: int32('referrerPolicy'),
    pinchX: doubleBlob('pinchViewportScrollOffset.x'),
    pinchY: doubleBlob('pinchViewportScrollOffset.y'),
    scrollRestorationType: int32('scrollRestorationType'),
    stateObject: (reader) => {
        const present = reader.expect(reader.readBool(), 'stateObject.present', STAGE);
        return present ? reader.expect(reader.readString16ByteCount(), 'stateObject', STAGE) : null;
    },
    httpBody: (reader, ctx) => {
        const body = decodeHttpBody(reader, ctx.version, ctx.limits);
        const contentType = reader.expect(reader.readString16ByteCount(), 'httpBody.contentType', STAGE);
        if (body !== null) body.contentType = contentType;
        return body;
    },
};

function readField<F extends FrameField>(fields: FrameFields, field: F, reader: PickleReader, ctx: FrameContext): void {
    fields[field] = FIELD_READERS[field](reader, ctx);
}

function skipField(kind: SkippedKind, note: string, reader: PickleReader): void {
    const field = `skipped ${note}`;
    switch (kind) {
        case 'int32': reader.expect(reader.readInt32(), field, STAGE); break;
        case 'int64': reader.expect(reader.readInt64(), field, STAGE); break;
        case 'bool': reader.expect(reader.readBool(), field, STAGE); break;
        case 'string16': reader.expect(reader.readString16ByteCount(), field, STAGE); break;
        case 'double': reader.readDoubleBlob(field, STAGE); break;
    }
}

function decodeFrame(reader: PickleReader, ctx: FrameContext): FrameState {
    if (ctx.depth > ctx.limits.maxFrameDepth) {
        throw new LimitExceededError(`Frame nesting deeper than ${ctx.limits.maxFrameDepth}`, STAGE, reader.offset);
    }
    ctx.frameCount.value++;
    if (ctx.frameCount.value > ctx.limits.maxFrames) {
        throw new LimitExceededError(`More than ${ctx.limits.maxFrames} frames in page state`, STAGE, reader.offset);
    }

    const fields = defaultFrameFields();
    for (const step of layoutFor(ctx)) {
        if (step.op === 'read') readField(fields, step.field, reader, ctx);
        else skipField(step.kind, step.note, reader);
    }

    const countOffset = reader.offset;
    const childCount = reader.expect(reader.readInt32(), 'childCount', STAGE);
    reader.checkCount(childCount, ctx.limits.maxFrames, 'children', STAGE, countOffset);

    const children: FrameState[] = [];
    for (let i = 0; i < childCount; i++) {
        children.push(decodeFrame(reader, { ...ctx, isTop: false, depth: ctx.depth + 1 }));
    }

    return {
        version: ctx.version,
        url: fields.url,
        target: fields.target,
        scrollOffset: [fields.scrollX, fields.scrollY],
        referrer: fields.referrer,
        documentState: fields.documentState,
        formState: decodeFormState(fields.documentState, ctx.limits.maxFormItems),
        pageScaleFactor: fields.pageScaleFactor,
        itemSequenceNumber: fields.itemSequenceNumber,
        documentSequenceNumber: fields.documentSequenceNumber,
        referrerPolicy: fields.referrerPolicy,
        pinchViewportScrollOffset: [fields.pinchX, fields.pinchY],
        scrollRestorationType: fields.scrollRestorationType,
        stateObject: fields.stateObject,
        httpBody: fields.httpBody,
        children,
    };
}

/**
 * Decodes one frame state and its children from `reader`. `version` is the
 * enclosing page state's version.
 */
export function decodeFrameState(
    reader: PickleReader,
    version: number,
    isTop: boolean,
    options: SnssDecoderOptions = {}
): FrameState {
    const { platform, limits } = resolveOptions(options);
    return decodeFrame(reader, { version, isTop, platform, limits, depth: 0, frameCount: { value: 0 } });
}

export function decodePageState(reader: PickleReader, options: SnssDecoderOptions = {}): PageState {
    const versionOffset = reader.offset;
    const version = reader.expect(reader.readInt32(), 'pageState.version', 'page-state');

    if (version === PAGE_STATE_LEGACY_VERSION) {
        const url = reader.expect(reader.readString(), 'pageState.url', 'page-state');
        return { kind: 'legacy', url };
    }

    if (version < PAGE_STATE_MIN_VERSION || version > PAGE_STATE_CURRENT_VERSION) {
        throw new FormatError(
            `Unsupported page state version ${version} (supported ${PAGE_STATE_MIN_VERSION}-${PAGE_STATE_CURRENT_VERSION})`,
            'page-state',
            versionOffset
        );
    }

    const { limits } = resolveOptions(options);
    const referencedFiles = version >= 14
        ? reader.readStringVector('referencedFiles', limits.maxVectorLength, 'page-state')
        : [];

    const frame = decodeFrameState(reader, version, true, options);
    return { kind: 'versioned', version, referencedFiles, frame };
}

/** Page state stored as a blob inside a navigation entry. */
export function decodePageStateBlob(blob: Uint8Array, options: SnssDecoderOptions = {}): PageState {
    return decodePageState(new PickleReader(blob), options);
}

/** Pre-order walk of a frame tree. */
export function* flattenFrames(frame: FrameState): Generator<FrameState> {
    yield frame;
    for (const child of frame.children) {
        yield* flattenFrames(child);
    }
}
