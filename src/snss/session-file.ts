/**
 * SNSS session container.
 *
 * Layout:
 *   [magic "SNSS"][version: int32 LE]
 *   repeated { [length: uint16 LE][id: uint8][payload: length - 1 bytes] }
 *
 * Tab-restore commands (ids 1 and 6) carry a pickle holding the tab id
 * followed by the navigation entry fields.
 */
import type { SessionCommand, SessionHeader, TabNavigation } from '../snss-types.js';
import type { ResolvedDecoderOptions, SnssDecoderOptions } from './types.js';
import { resolveOptions } from './types.js';
import {
    SNSS_MAGIC, SNSS_VERSION, SNSS_HEADER_SIZE, COMMAND_LENGTH_SIZE, TAB_RESTORE_COMMANDS
} from './format.js';
import { IncompleteDataError, IntegrityError, SnssError } from './errors.js';
import { PickleReader } from './pickle.js';
import { decodeNavigationEntry } from './navigation-entry.js';

const ERR_DATA_TOO_SHORT = 'Data too short for SNSS header';

function hex(bytes: Uint8Array): string {
    return Array.from(bytes, b => b.toString(16).padStart(2, '0')).join('');
}

export class SnssDecoder {
    private readonly data: Uint8Array;
    private readonly view: DataView;
    private readonly options: ResolvedDecoderOptions;
    private header: SessionHeader | null = null;
    private consumed = false;

    constructor(data: Uint8Array, options: SnssDecoderOptions = {}) {
        this.data = data;
        this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
        this.options = resolveOptions(options);
    }

    /**
     * Validates the 8-byte header. A wrong magic is fatal; an unexpected
     * version is logged and reported through `versionSupported` only.
     */
    readHeader(): SessionHeader {
        if (this.header) return this.header;

        if (this.data.length < SNSS_MAGIC.length) {
            throw new IncompleteDataError(ERR_DATA_TOO_SHORT, 'header', 0);
        }
        if (!this.verifyMagic()) {
            throw new IntegrityError(
                `Invalid header (expected: SNSS (${hex(SNSS_MAGIC)}); actual: ${hex(this.data.subarray(0, SNSS_MAGIC.length))})`,
                'header',
                0
            );
        }

        if (this.data.length < SNSS_HEADER_SIZE) {
            throw new IncompleteDataError(ERR_DATA_TOO_SHORT, 'header', SNSS_MAGIC.length);
        }

        const version = this.view.getInt32(SNSS_MAGIC.length, true);
        const versionSupported = version === SNSS_VERSION;
        if (!versionSupported) {
            this.options.logger?.warn?.(`[SNSS] Invalid version (expected: ${SNSS_VERSION}; actual: ${version})`);
        }

        this.header = { version, versionSupported };
        return this.header;
    }

    /**
     * Every command in stream order. Ends cleanly when fewer than two bytes
     * remain; a payload shorter than its declared length is fatal.
     * Single-pass: a decoder hands out one command stream.
     */
    *commands(): Generator<SessionCommand, void, undefined> {
        if (this.consumed) {
            throw new SnssError('Command stream already consumed; create a new decoder to read again', 'container');
        }
        this.consumed = true;
        this.readHeader();

        let pos = SNSS_HEADER_SIZE;
        while (this.data.length - pos >= COMMAND_LENGTH_SIZE) {
            const offset = pos;
            const length = this.view.getUint16(pos, true);
            pos += COMMAND_LENGTH_SIZE;

            if (this.data.length - pos < length) {
                throw new IncompleteDataError(
                    `Command bytes is less than the stated command size (${this.data.length - pos} < ${length})`,
                    'command',
                    offset
                );
            }
            if (length === 0) {
                throw new IntegrityError('Empty command without id byte', 'command', offset);
            }

            const id = this.data[pos];
            const payload = this.data.subarray(pos + 1, pos + length);
            pos += length;
            yield { id, offset, length, payload };
        }
    }

    /** Tab-restore commands decoded into `(tabId, entry)` pairs, lazily. */
    *navigations(): Generator<TabNavigation, void, undefined> {
        const { logger } = this.options;
        let index = 0;
        for (const command of this.commands()) {
            const n = index++;
            if (!TAB_RESTORE_COMMANDS.has(command.id)) {
                logger?.debug?.(`[SNSS] skip command #${n} id=${command.id} len=${command.length} @ ${command.offset}`);
                continue;
            }
            try {
                const navigation = this.decodeTabRestore(command);
                logger?.debug?.(`[SNSS] tab ${navigation.tabId} navigation ${navigation.entry.index ?? '?'} @ ${command.offset}`);
                yield navigation;
            } catch (err) {
                if (err instanceof SnssError) err.withContext(`command #${n} id=${command.id} @ ${command.offset}`);
                throw err;
            }
        }
    }

    private decodeTabRestore(command: SessionCommand): TabNavigation {
        const reader = new PickleReader(command.payload);
        const tabId = reader.expect(reader.readInt32(), 'tabId', 'command');
        const entry = decodeNavigationEntry(reader, this.options);
        return { tabId, entry };
    }

    private verifyMagic(): boolean {
        for (let i = 0; i < SNSS_MAGIC.length; i++) {
            if (this.data[i] !== SNSS_MAGIC[i]) return false;
        }
        return true;
    }
}
