/**
 * Serialized form state carried in a frame's document state list.
 *
 * Token grammar after the magic marker, repeated until the list ends:
 *   formId, itemCount, itemCount × (name, type, valueCount, valueCount × value)
 */
import type { FormControlState, FormState } from '../snss-types.js';
import { FORM_STATE_MAGIC } from './format.js';
import { FormatError, LimitExceededError } from './errors.js';

const STAGE = 'form-state';
const COUNT_PATTERN = /^\s*\+?\d+\s*$/;

export function isFormState(documentState: ReadonlyArray<string | null>): boolean {
    return documentState.length > 0 && documentState[0] === FORM_STATE_MAGIC;
}

class TokenStream {
    private pos = 1; // past the magic marker

    constructor(private readonly tokens: ReadonlyArray<string | null>) { }

    get done(): boolean {
        return this.pos >= this.tokens.length;
    }

    next(what: string): string {
        if (this.done) {
            throw new FormatError(`Form state ended while reading ${what}`, STAGE, this.pos);
        }
        // null entries are empty strings to the form controller
        return this.tokens[this.pos++] ?? '';
    }

    count(what: string, max: number): number {
        const at = this.pos;
        const token = this.next(what);
        if (!COUNT_PATTERN.test(token)) {
            throw new FormatError(`Form state ${what} is not a count: ${JSON.stringify(token)}`, STAGE, at);
        }
        const n = Number.parseInt(token, 10);
        if (n > max) {
            throw new LimitExceededError(`Form state ${what} ${n} exceeds limit ${max}`, STAGE, at);
        }
        return n;
    }
}

/**
 * Decodes the form state in `documentState`, or returns null when the list
 * does not start with the form state marker.
 */
export function decodeFormState(documentState: ReadonlyArray<string | null>, maxItems: number): FormState | null {
    if (!isFormState(documentState)) return null;

    const result: FormState = new Map();
    const indexes = new Map<string, ControlIndex>();
    const tokens = new TokenStream(documentState);

    while (!tokens.done) {
        const formId = tokens.next('form id');
        let index = indexes.get(formId);
        if (index === undefined) {
            index = new ControlIndex();
            indexes.set(formId, index);
            result.set(formId, index.controls);
        }

        const itemCount = tokens.count('item count', maxItems);
        for (let i = 0; i < itemCount; i++) {
            const name = tokens.next('field name');
            const type = tokens.next('field type');
            const control = index.findOrAdd(name, type);
            const valueCount = tokens.count('value count', maxItems);
            for (let j = 0; j < valueCount; j++) {
                control.values.push(tokens.next('field value'));
            }
        }
    }

    return result;
}

/** Controls of one form in first-seen order, looked up by name and type. */
class ControlIndex {
    readonly controls: FormControlState[] = [];
    private readonly byKey = new Map<string, Map<string, FormControlState>>();

    findOrAdd(name: string, type: string): FormControlState {
        let byType = this.byKey.get(name);
        if (byType === undefined) {
            byType = new Map();
            this.byKey.set(name, byType);
        }
        let control = byType.get(type);
        if (control === undefined) {
            control = { name, type, values: [] };
            byType.set(type, control);
            this.controls.push(control);
        }
        return control;
    }
}

/** Plain-object view, `{ formId: { "name|type": values } }`. */
export function formStateToObject(state: FormState): Record<string, Record<string, string[]>> {
    const out: Record<string, Record<string, string[]>> = {};
    for (const [formId, controls] of state) {
        const form: Record<string, string[]> = {};
        for (const control of controls) {
            form[`${control.name}|${control.type}`] = [...control.values];
        }
        out[formId] = form;
    }
    return out;
}
