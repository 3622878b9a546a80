import type { HttpBody, HttpBodyElement, HttpBodyFileElement } from '../snss-types.js';
import type { DecodeLimits } from './types.js';
import type { PickleReader } from './pickle.js';
import { HttpBodyElementType } from './format.js';
import { FormatError } from './errors.js';

const STAGE = 'http-body';

/**
 * Reads the optional request body of a frame state. Returns null when the
 * presence flag is false; nothing else is consumed in that case. The content
 * type that follows in the frame layout is left for the caller.
 */
export function decodeHttpBody(reader: PickleReader, version: number, limits: DecodeLimits): HttpBody | null {
    const present = reader.expect(reader.readBool(), 'httpBody.present', STAGE);
    if (!present) return null;

    const countOffset = reader.offset;
    const count = reader.expect(reader.readInt32(), 'httpBody.elementCount', STAGE);
    reader.checkCount(count, limits.maxHttpBodyElements, 'httpBody.elements', STAGE, countOffset);

    const elements: HttpBodyElement[] = [];
    for (let i = 0; i < count; i++) {
        const tagOffset = reader.offset;
        const tag = reader.expect(reader.readInt32(), `httpBody.elements[${i}].type`, STAGE);

        switch (tag) {
            case HttpBodyElementType.DATA: {
                const data = reader.expect(reader.readBlob(), `httpBody.elements[${i}].data`, STAGE);
                if (data !== null && data.length > 0) elements.push({ type: 'data', data });
                break;
            }
            case HttpBodyElementType.FILE:
            case HttpBodyElementType.FILE_SYSTEM_URL: {
                const pathEncoding = tag === HttpBodyElementType.FILE ? 'utf16' : 'utf8';
                const path = reader.expect(
                    pathEncoding === 'utf16' ? reader.readString16ByteCount() : reader.readString(),
                    `httpBody.elements[${i}].path`,
                    STAGE
                );
                const start = reader.expect(reader.readInt64(), `httpBody.elements[${i}].start`, STAGE);
                const length = reader.expect(reader.readInt64(), `httpBody.elements[${i}].length`, STAGE);
                const modificationTime = reader.readDoubleBlob(`httpBody.elements[${i}].modificationTime`, STAGE);
                elements.push({ type: 'file', pathEncoding, path, start, length, modificationTime });
                break;
            }
            case HttpBodyElementType.BLOB: {
                const uuid = reader.expect(reader.readString(), `httpBody.elements[${i}].uuid`, STAGE);
                // read regardless, kept from version 16
                if (version >= 16) elements.push({ type: 'blob', uuid });
                break;
            }
            default:
                throw new FormatError(`Unknown HTTP body element type ${tag}`, STAGE, tagOffset);
        }
    }

    const identifier = reader.expect(reader.readInt64(), 'httpBody.identifier', STAGE);
    const containsPasswords = version >= 12
        ? reader.expect(reader.readBool(), 'httpBody.containsPasswords', STAGE)
        : true;

    return { elements, identifier, containsPasswords, contentType: null };
}

/** Splits a body into data chunks, file ranges and blob uuids. */
export function httpBodyParts(body: HttpBody): {
    dataChunks: Uint8Array[];
    fileRanges: HttpBodyFileElement[];
    blobs: Array<string | null>;
} {
    const dataChunks: Uint8Array[] = [];
    const fileRanges: HttpBodyFileElement[] = [];
    const blobs: Array<string | null> = [];
    for (const element of body.elements) {
        if (element.type === 'data') dataChunks.push(element.data);
        else if (element.type === 'file') fileRanges.push(element);
        else blobs.push(element.uuid);
    }
    return { dataChunks, fileRanges, blobs };
}
