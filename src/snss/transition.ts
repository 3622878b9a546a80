/**
 * Page transition bitfield: the low byte selects why a navigation happened,
 * the high 24 bits carry independent qualifier flags.
 */
import { FormatError } from './errors.js';

export const CORE_MASK = 0xFF;
export const QUALIFIER_MASK = 0xFFFFFF00;

export const CORE_TRANSITIONS = [
    'Link',
    'Typed',
    'AutoBookmark',
    'AutoSubframe',
    'ManualSubframe',
    'Generated',
    'AutoToplevel',
    'FormSubmit',
    'Reload',
    'Keyword',
    'KeywordGenerated',
] as const;

export type CoreTransition = typeof CORE_TRANSITIONS[number];

export const TRANSITION_QUALIFIERS = [
    [0x00800000, 'Blocked'],
    [0x01000000, 'ForwardBack'],
    [0x02000000, 'FromAddressBar'],
    [0x04000000, 'HomePage'],
    [0x08000000, 'FromApi'],
    [0x10000000, 'ChainStart'],
    [0x20000000, 'ChainEnd'],
    [0x40000000, 'ClientRedirect'],
    [0x80000000, 'ServerRedirect'],
] as const;

export type TransitionQualifier = typeof TRANSITION_QUALIFIERS[number][1];

export interface ChromeTransition {
    /** Value as stored (signed int32). */
    value: number;
    core: CoreTransition;
    /** Set qualifiers in ascending bit order. */
    qualifiers: TransitionQualifier[];
}

/** Raw parts of a transition value; total over every int32. */
export interface TransitionBits {
    /** Low byte, before it is mapped to a name. */
    coreByte: number;
    qualifiers: TransitionQualifier[];
}

export function splitTransition(value: number): TransitionBits {
    const unsigned = value >>> 0;
    const qualifierBits = (unsigned & QUALIFIER_MASK) >>> 0;
    const qualifiers: TransitionQualifier[] = [];
    for (const [flag, name] of TRANSITION_QUALIFIERS) {
        if ((qualifierBits & flag) >>> 0 !== 0) qualifiers.push(name);
    }
    return { coreByte: unsigned & CORE_MASK, qualifiers };
}

/** Names the core kind of `value`; an unmapped core byte is a FormatError. */
export function decodeTransition(value: number): ChromeTransition {
    const { coreByte, qualifiers } = splitTransition(value);
    const core = CORE_TRANSITIONS[coreByte];
    if (core === undefined) {
        throw new FormatError(`Unknown core transition ${coreByte} in 0x${(value >>> 0).toString(16).padStart(8, '0')}`, 'transition');
    }
    return { value, core, qualifiers };
}

/** `Link; ClientRedirect; ServerRedirect` */
export function formatTransition(transition: ChromeTransition): string {
    return [transition.core, ...transition.qualifiers].join('; ');
}
