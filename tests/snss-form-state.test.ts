import { describe, it, expect } from 'vitest';
import { decodeFormState, formStateToObject, isFormState } from '../src/snss/form-state.js';
import { FORM_STATE_MAGIC } from '../src/snss/format.js';
import { FormatError, LimitExceededError } from '../src/snss/errors.js';

const MAX = 1000;

describe('Form state', () => {
    it('decodes a single form with one field', () => {
        const state = decodeFormState([FORM_STATE_MAGIC, 'form1', '1', 'field1', 'text', '1', 'hello'], MAX);
        expect(state).toEqual(new Map([['form1', [{ name: 'field1', type: 'text', values: ['hello'] }]]]));
        if (state === null) throw new Error('expected form state');
        expect(formStateToObject(state)).toEqual({ form1: { 'field1|text': ['hello'] } });
    });

    it('fails when the last value is missing', () => {
        expect(() => decodeFormState([FORM_STATE_MAGIC, 'form1', '1', 'field1', 'text', '1'], MAX))
            .toThrow(FormatError);
        expect(() => decodeFormState([FORM_STATE_MAGIC, 'form1', '1', 'field1', 'text', '1'], MAX))
            .toThrow('Form state ended while reading field value');
    });

    it('leaves other document state opaque', () => {
        expect(isFormState(['a', 'b'])).toBe(false);
        expect(isFormState([])).toBe(false);
        expect(decodeFormState(['a', FORM_STATE_MAGIC], MAX)).toBeNull();
        expect(decodeFormState([], MAX)).toBeNull();
    });

    it('returns an empty map for a bare marker', () => {
        expect(decodeFormState([FORM_STATE_MAGIC], MAX)).toEqual(new Map());
    });

    it('accumulates values of repeated controls', () => {
        const state = decodeFormState([
            FORM_STATE_MAGIC,
            'f', '2', 'a', 'text', '1', 'x', 'a', 'text', '1', 'y',
            'f', '1', 'a', 'text', '1', 'z',
        ], MAX);
        expect(state).toEqual(new Map([['f', [{ name: 'a', type: 'text', values: ['x', 'y', 'z'] }]]]));
    });

    it('keys controls by name and type', () => {
        const state = decodeFormState([
            FORM_STATE_MAGIC, 'f', '2', 'a', 'text', '1', 'x', 'a', 'hidden', '0',
        ], MAX);
        expect(state?.get('f')).toEqual([
            { name: 'a', type: 'text', values: ['x'] },
            { name: 'a', type: 'hidden', values: [] },
        ]);
    });

    it('merges revisited controls across a long token list in first-seen order', () => {
        const count = 5000;
        const names = Array.from({ length: count }, (_, i) => `c${i}`);
        const tokens = [FORM_STATE_MAGIC, 'f', String(count)];
        for (const name of names) tokens.push(name, 'text', '1', `${name}-first`);
        tokens.push('f', String(count));
        for (const name of [...names].reverse()) tokens.push(name, 'text', '1', `${name}-second`);

        const controls = decodeFormState(tokens, 2 * count)?.get('f');
        expect(controls?.map(c => c.name)).toEqual(names);
        expect(controls?.[0]).toEqual({ name: 'c0', type: 'text', values: ['c0-first', 'c0-second'] });
        expect(controls?.[count - 1].values).toEqual([`c${count - 1}-first`, `c${count - 1}-second`]);
    });

    it('keeps forms in first-seen order', () => {
        const state = decodeFormState([
            FORM_STATE_MAGIC, 'f1', '0', 'f2', '1', 'n', 'checkbox', '0',
        ], MAX);
        expect(state).toEqual(new Map([
            ['f1', []],
            ['f2', [{ name: 'n', type: 'checkbox', values: [] }]],
        ]));
    });

    it('reads absent tokens as empty strings', () => {
        const state = decodeFormState([FORM_STATE_MAGIC, null, '1', 'a', 't', '1', null], MAX);
        expect(state).toEqual(new Map([['', [{ name: 'a', type: 't', values: [''] }]]]));
    });

    it('rejects counts that are not numbers', () => {
        expect(() => decodeFormState([FORM_STATE_MAGIC, 'f', 'x'], MAX)).toThrow(FormatError);
        expect(() => decodeFormState([FORM_STATE_MAGIC, 'f', '-1'], MAX)).toThrow(FormatError);
        expect(() => decodeFormState([FORM_STATE_MAGIC, 'f', '1', 'a', 't', '1.5', 'v'], MAX)).toThrow(FormatError);
    });

    it('bounds item and value counts', () => {
        expect(() => decodeFormState([FORM_STATE_MAGIC, 'f', '5'], 4)).toThrow(LimitExceededError);
        expect(() => decodeFormState([FORM_STATE_MAGIC, 'f', '1', 'a', 't', '9'], 4)).toThrow(LimitExceededError);
    });
});
