import type { PickleValue } from './pickle.js';
import type { DecodeStage } from './errors.js';
import { IntegrityError } from './errors.js';
import { WebkitTimestamp } from './timestamp.js';

/**
 * Ordered name → value container produced by `PickleReader.deserializeInto`.
 * The typed getters narrow a slot to what the schema promised; `null` means
 * the slot was not present in the record.
 */
export class FieldMap {
    private readonly values = new Map<string, PickleValue>();

    constructor(private readonly stage: DecodeStage = 'pickle') { }

    set(name: string, value: PickleValue): void {
        this.values.set(name, value);
    }

    has(name: string): boolean {
        return this.values.has(name);
    }

    get(name: string): PickleValue | undefined {
        return this.values.get(name);
    }

    keys(): string[] {
        return Array.from(this.values.keys());
    }

    get size(): number {
        return this.values.size;
    }

    int(name: string): number | null {
        const v = this.slot(name);
        if (v === null || typeof v === 'number') return v;
        throw this.mismatch(name, 'number', v);
    }

    bigint(name: string): bigint | null {
        const v = this.slot(name);
        if (v === null || typeof v === 'bigint') return v;
        throw this.mismatch(name, 'bigint', v);
    }

    bool(name: string): boolean | null {
        const v = this.slot(name);
        if (v === null || typeof v === 'boolean') return v;
        throw this.mismatch(name, 'boolean', v);
    }

    string(name: string): string | null {
        const v = this.slot(name);
        if (v === null || typeof v === 'string') return v;
        throw this.mismatch(name, 'string', v);
    }

    bytes(name: string): Uint8Array | null {
        const v = this.slot(name);
        if (v === null || v instanceof Uint8Array) return v;
        throw this.mismatch(name, 'bytes', v);
    }

    timestamp(name: string): WebkitTimestamp | null {
        const v = this.slot(name);
        if (v === null || v instanceof WebkitTimestamp) return v;
        throw this.mismatch(name, 'timestamp', v);
    }

    private slot(name: string): PickleValue {
        return this.values.get(name) ?? null;
    }

    private mismatch(name: string, expected: string, value: PickleValue): IntegrityError {
        const actual = value === null ? 'null' : value.constructor.name;
        return new IntegrityError(`Field '${name}' holds ${actual}, expected ${expected}`, this.stage);
    }
}
