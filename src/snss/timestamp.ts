import { WEBKIT_EPOCH_OFFSET_US } from './format.js';

/**
 * Signed 64-bit count of microseconds since 1601-01-01T00:00:00Z.
 * Keeps the raw value so no precision is lost below the millisecond.
 */
export class WebkitTimestamp {
    constructor(public readonly microseconds: bigint) { }

    /** Microseconds relative to the Unix epoch. */
    get unixMicroseconds(): bigint {
        return this.microseconds - WEBKIT_EPOCH_OFFSET_US;
    }

    /** Millisecond-precision Date; an Invalid Date when out of range. */
    toDate(): Date {
        const us = this.unixMicroseconds;
        let ms = us / 1000n;
        // bigint division truncates toward zero; Date wants the floor
        if (us < 0n && us % 1000n !== 0n) ms -= 1n;
        return new Date(Number(ms));
    }

    /** ISO-8601 with microsecond precision, e.g. `2016-03-01T10:20:30.123456Z`. */
    toISOString(): string {
        const date = this.toDate();
        if (Number.isNaN(date.getTime())) return `Invalid(${this.microseconds})`;
        let micros = this.unixMicroseconds % 1_000_000n;
        if (micros < 0n) micros += 1_000_000n;
        return `${date.toISOString().slice(0, 19)}.${micros.toString().padStart(6, '0')}Z`;
    }

    toString(): string {
        return this.toISOString();
    }

    toJSON(): string {
        return this.toISOString();
    }
}
