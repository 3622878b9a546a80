/**
 * Sequential reader over a length-prefixed pickle record.
 *
 * Layout: [payloadLength: int32 LE][payload]. Every field inside the payload
 * starts on a 4-byte boundary; variable-length fields are padded after
 * their bytes.
 *
 * Reads return a {@link ReadResult}. Running out of bytes is a normal
 * outcome (`ok: false`) that callers use to detect the end of a record;
 * only framing violations throw.
 */
import {
    PickleType, PICKLE_HEADER_SIZE, PICKLE_ALIGNMENT, PICKLE_NULL_LENGTH
} from './format.js';
import { IncompleteDataError, IntegrityError, LimitExceededError } from './errors.js';
import type { DecodeStage } from './errors.js';
import { FieldMap } from './field-map.js';
import { WebkitTimestamp } from './timestamp.js';

export type ReadResult<T> = { ok: true; value: T } | { ok: false };

/** `bytes`: the length counts bytes. `chars`: it counts UTF-16 code units. */
export type BlobLengthMode = 'bytes' | 'chars';

export type PickleValue =
    | number
    | bigint
    | boolean
    | string
    | Uint8Array
    | WebkitTimestamp
    | PickleReader
    | null;

export type FieldSpec = readonly [name: string, type: PickleType];

const FAIL: { ok: false } = { ok: false };

function ok<T>(value: T): ReadResult<T> {
    return { ok: true, value };
}

const utf8 = new TextDecoder('utf-8', { fatal: true });
const utf16 = new TextDecoder('utf-16le', { fatal: true });

export class PickleReader {
    private readonly data: Uint8Array;
    private readonly view: DataView;
    private pos: number = PICKLE_HEADER_SIZE;

    /** Declared payload length from the header. */
    readonly payloadLength: number;

    constructor(data: Uint8Array) {
        if (data.length < PICKLE_HEADER_SIZE) {
            throw new IncompleteDataError(`Pickle too short for its length header (${data.length} bytes)`, 'pickle', 0);
        }
        this.data = data;
        this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
        this.payloadLength = this.view.getInt32(0, true);
        if (this.payloadLength !== data.length - PICKLE_HEADER_SIZE) {
            throw new IntegrityError(
                `Declared pickle length ${this.payloadLength} does not match payload length ${data.length - PICKLE_HEADER_SIZE}`,
                'pickle',
                0
            );
        }
    }

    /** Cursor position, counted from the start of the length header. */
    get offset(): number {
        return this.pos;
    }

    get length(): number {
        return this.data.length;
    }

    get remaining(): number {
        return Math.max(0, this.data.length - this.pos);
    }

    get atEnd(): boolean {
        return this.remaining === 0;
    }

    // --- fixed-size scalars ---

    readInt16(): ReadResult<number> {
        if (this.remaining < 2) return FAIL;
        const value = this.view.getInt16(this.pos, true);
        this.advance(4);
        return ok(value);
    }

    readUInt16(): ReadResult<number> {
        if (this.remaining < 2) return FAIL;
        const value = this.view.getUint16(this.pos, true);
        this.advance(4);
        return ok(value);
    }

    readInt32(): ReadResult<number> {
        if (this.remaining < 4) return FAIL;
        const value = this.view.getInt32(this.pos, true);
        this.pos += 4;
        return ok(value);
    }

    readUInt32(): ReadResult<number> {
        if (this.remaining < 4) return FAIL;
        const value = this.view.getUint32(this.pos, true);
        this.pos += 4;
        return ok(value);
    }

    readInt64(): ReadResult<bigint> {
        if (this.remaining < 8) return FAIL;
        const value = this.view.getBigInt64(this.pos, true);
        this.pos += 8;
        return ok(value);
    }

    readUInt64(): ReadResult<bigint> {
        if (this.remaining < 8) return FAIL;
        const value = this.view.getBigUint64(this.pos, true);
        this.pos += 8;
        return ok(value);
    }

    readFloat(): ReadResult<number> {
        if (this.remaining < 4) return FAIL;
        const value = this.view.getFloat32(this.pos, true);
        this.pos += 4;
        return ok(value);
    }

    readDouble(): ReadResult<number> {
        if (this.remaining < 8) return FAIL;
        const value = this.view.getFloat64(this.pos, true);
        this.pos += 8;
        return ok(value);
    }

    readBool(): ReadResult<boolean> {
        const raw = this.readInt32();
        return raw.ok ? ok(raw.value !== 0) : FAIL;
    }

    readTimestamp(): ReadResult<WebkitTimestamp> {
        const raw = this.readInt64();
        return raw.ok ? ok(new WebkitTimestamp(raw.value)) : FAIL;
    }

    // --- variable-length fields ---

    /**
     * Reads an int32 length and that many bytes (twice as many in `chars`
     * mode), then aligns the cursor. A length of -1 is an absent value; a
     * length past the end consumes the rest of the payload.
     */
    readBlob(lengthMode: BlobLengthMode = 'bytes'): ReadResult<Uint8Array | null> {
        const start = this.pos;
        const declared = this.readInt32();
        if (!declared.ok) return FAIL;
        if (declared.value === PICKLE_NULL_LENGTH) return ok(null);
        if (declared.value < 0) {
            throw new IntegrityError(`Negative blob length ${declared.value}`, 'pickle', start);
        }

        const byteLength = lengthMode === 'chars' ? declared.value * 2 : declared.value;
        if (byteLength > this.remaining) {
            this.pos = this.data.length;
            return FAIL;
        }

        const bytes = this.data.subarray(this.pos, this.pos + byteLength);
        this.advance(byteLength);
        this.align();
        return ok(bytes);
    }

    /** UTF-8 string. */
    readString(): ReadResult<string | null> {
        return this.readText('bytes', utf8);
    }

    /** UTF-16LE string whose length counts code units. */
    readString16(): ReadResult<string | null> {
        return this.readText('chars', utf16);
    }

    /** UTF-16LE string whose length counts bytes (page state encoding). */
    readString16ByteCount(): ReadResult<string | null> {
        return this.readText('bytes', utf16);
    }

    /**
     * Nested record: int32 length then that many bytes, wrapped together with
     * the length as a new reader.
     */
    readPickle(): ReadResult<PickleReader> {
        const start = this.pos;
        const declared = this.readInt32();
        if (!declared.ok) return FAIL;
        if (declared.value < 0) {
            throw new IntegrityError(`Negative nested pickle length ${declared.value}`, 'pickle', start);
        }
        if (declared.value > this.remaining) {
            this.pos = this.data.length;
            return FAIL;
        }
        const end = this.pos + declared.value;
        const nested = new PickleReader(this.data.subarray(start, end));
        this.pos = end;
        return ok(nested);
    }

    read(type: PickleType): ReadResult<PickleValue> {
        switch (type) {
            case PickleType.Bool: return this.readBool();
            case PickleType.Int16: return this.readInt16();
            case PickleType.UInt16: return this.readUInt16();
            case PickleType.Int32: return this.readInt32();
            case PickleType.UInt32: return this.readUInt32();
            case PickleType.Int64: return this.readInt64();
            case PickleType.UInt64: return this.readUInt64();
            case PickleType.Single: return this.readFloat();
            case PickleType.Double: return this.readDouble();
            case PickleType.Blob: return this.readBlob('bytes');
            case PickleType.String: return this.readString();
            case PickleType.String16: return this.readString16();
            case PickleType.DateTime: return this.readTimestamp();
            case PickleType.Pickle: return this.readPickle();
            case PickleType.String16ByteCount: return this.readString16ByteCount();
        }
    }

    // --- schema helpers ---

    /**
     * Reads `fields` in order into a name → value map. A failed read stores
     * `null` unless the name already holds a value from an earlier slot.
     */
    deserializeInto(fields: readonly FieldSpec[], raiseOnMissing: boolean = false): FieldMap {
        const result = new FieldMap();
        for (const [name, type] of fields) {
            const start = this.pos;
            const res = this.read(type);
            if (!res.ok && raiseOnMissing) {
                throw new IncompleteDataError(`Field '${name}' (${PickleType[type]}) couldn't be read`, 'pickle', start);
            }
            if (res.ok) {
                result.set(name, res.value);
            } else if (!result.has(name)) {
                result.set(name, null);
            }
        }
        return result;
    }

    /**
     * Lazily reads one value per requested type. Stops (returning `false`) at
     * the first failed read, or throws when `raiseOnMissing` is set.
     */
    *iterDeserialize(types: Iterable<PickleType>, raiseOnMissing: boolean = false): Generator<PickleValue, boolean, undefined> {
        for (const type of types) {
            const start = this.pos;
            const res = this.read(type);
            if (!res.ok) {
                if (raiseOnMissing) {
                    throw new IncompleteDataError(`Field ${PickleType[type]} couldn't be read`, 'pickle', start);
                }
                return false;
            }
            yield res.value;
        }
        return true;
    }

    /** Unwraps `result`, treating exhaustion as truncation of a required field. */
    expect<T>(result: ReadResult<T>, field: string, stage: DecodeStage = 'pickle'): T {
        if (!result.ok) {
            throw new IncompleteDataError(`Unexpected end of pickle reading '${field}'`, stage, this.pos);
        }
        return result.value;
    }

    /**
     * A double stored as an 8-byte blob rather than a native double. Page
     * state writes its floating point fields this way.
     */
    readDoubleBlob(field: string, stage: DecodeStage = 'pickle'): number {
        const start = this.pos;
        const bytes = this.expect(this.readBlob('bytes'), field, stage);
        if (bytes === null || bytes.length !== 8) {
            throw new IntegrityError(
                `Expected 8-byte double blob for '${field}', got ${bytes === null ? 'null' : `${bytes.length} bytes`}`,
                stage,
                start
            );
        }
        return new DataView(bytes.buffer, bytes.byteOffset, 8).getFloat64(0, true);
    }

    /** int32 count followed by that many byte-count UTF-16 strings. */
    readStringVector(field: string, maxLength: number, stage: DecodeStage = 'pickle'): Array<string | null> {
        const start = this.pos;
        const count = this.expect(this.readInt32(), `${field}.length`, stage);
        this.checkCount(count, maxLength, field, stage, start);

        const result: Array<string | null> = [];
        for (let i = 0; i < count; i++) {
            result.push(this.expect(this.readString16ByteCount(), `${field}[${i}]`, stage));
        }
        return result;
    }

    /** Rejects negative counts and counts above `max`. */
    checkCount(count: number, max: number, field: string, stage: DecodeStage, offset: number = this.pos): void {
        if (count < 0) {
            throw new IntegrityError(`Negative count ${count} for '${field}'`, stage, offset);
        }
        if (count > max) {
            throw new LimitExceededError(`Count ${count} for '${field}' exceeds limit ${max}`, stage, offset);
        }
    }

    // --- internals ---

    private readText(lengthMode: BlobLengthMode, decoder: TextDecoder): ReadResult<string | null> {
        const start = this.pos;
        const res = this.readBlob(lengthMode);
        if (!res.ok) return FAIL;
        if (res.value === null) return ok(null);
        try {
            return ok(decoder.decode(res.value));
        } catch (err) {
            if (!(err instanceof TypeError)) throw err;
            throw new IntegrityError(`Invalid ${decoder.encoding} string (${res.value.length} bytes)`, 'pickle', start);
        }
    }

    private advance(n: number): void {
        this.pos = Math.min(this.pos + n, this.data.length);
    }

    private align(): void {
        const rel = (this.pos - PICKLE_HEADER_SIZE) % PICKLE_ALIGNMENT;
        if (rel !== 0) this.advance(PICKLE_ALIGNMENT - rel);
    }
}
