export const SNSS_MAGIC = new Uint8Array([0x53, 0x4E, 0x53, 0x53]); // "SNSS"
export const SNSS_VERSION = 1;
export const SNSS_HEADER_SIZE = 8; // magic(4) + version(4)

/** uint16 LE length preceding every command in the stream. */
export const COMMAND_LENGTH_SIZE = 2;

export enum CommandId {
    TAB_CLOSED = 1,
    TAB_RESTORED = 6,
}

export const TAB_RESTORE_COMMANDS: ReadonlySet<number> = new Set([CommandId.TAB_CLOSED, CommandId.TAB_RESTORED]);

/**
 * Typed slots a pickle can hold. Values match the schema helpers of the
 * record reader, not anything stored on disk.
 */
export enum PickleType {
    Bool = 1,
    Int16 = 2,
    UInt16 = 3,
    Int32 = 4,
    UInt32 = 5,
    Int64 = 6,
    UInt64 = 7,
    Single = 8,
    Double = 9,
    Blob = 10,
    String = 11,
    String16 = 12,
    DateTime = 13,
    Pickle = 14,
    String16ByteCount = 15,
}

export const PICKLE_HEADER_SIZE = 4;
export const PICKLE_ALIGNMENT = 4;

/** Blob length that marks an absent value. */
export const PICKLE_NULL_LENGTH = -1;

export const PAGE_STATE_LEGACY_VERSION = -1;
export const PAGE_STATE_MIN_VERSION = 11;
export const PAGE_STATE_CURRENT_VERSION = 23;

export enum HttpBodyElementType {
    DATA = 0,
    FILE = 1,
    BLOB = 2,
    FILE_SYSTEM_URL = 3,
}

export const FORM_STATE_MAGIC = '\n\r?% Blink serialized form state version 9 \n\r=&';

/** Microseconds between 1601-01-01T00:00:00Z and the Unix epoch. */
export const WEBKIT_EPOCH_OFFSET_US = 11_644_473_600_000_000n;
