/**
 * Frame state field layout across page state versions 11–23.
 *
 * Each step is read in order when its gate matches the frame being decoded.
 * `skip` steps consume fields that older writers emitted and that no longer
 * carry information; they keep the cursor aligned with the historical layout.
 * Fields a version does not carry keep their value from `defaultFrameFields`.
 */
import type { Platform } from './types.js';

/** Version window `[from, before)` plus frame-position and platform conditions. */
export interface FrameGate {
    from?: number;
    before?: number;
    /** Only for frames below the main frame. */
    nestedOnly?: true;
    platform?: Platform;
}

export type FrameField =
    | 'url'
    | 'target'
    | 'scrollX'
    | 'scrollY'
    | 'referrer'
    | 'documentState'
    | 'pageScaleFactor'
    | 'itemSequenceNumber'
    | 'documentSequenceNumber'
    | 'referrerPolicy'
    | 'pinchX'
    | 'pinchY'
    | 'scrollRestorationType'
    | 'stateObject'
    | 'httpBody';

export type SkippedKind = 'int32' | 'int64' | 'bool' | 'string16' | 'double';

export type FrameStep =
    | { op: 'read'; field: FrameField; gate?: FrameGate }
    | { op: 'skip'; kind: SkippedKind; gate?: FrameGate; note: string };

export const FRAME_STATE_LAYOUT: readonly FrameStep[] = [
    { op: 'skip', kind: 'int32', gate: { before: 14, nestedOnly: true }, note: 'pre-v14 nested int32' },
    { op: 'read', field: 'url' },
    { op: 'skip', kind: 'string16', gate: { before: 19 }, note: 'pre-v19 string16' },
    { op: 'read', field: 'target' },
    { op: 'skip', kind: 'string16', gate: { before: 15 }, note: 'pre-v15 string16' },
    { op: 'skip', kind: 'string16', gate: { before: 15 }, note: 'pre-v15 string16' },
    { op: 'skip', kind: 'string16', gate: { before: 15 }, note: 'pre-v15 string16' },
    { op: 'skip', kind: 'double', gate: { before: 15 }, note: 'pre-v15 double' },
    { op: 'read', field: 'scrollX' },
    { op: 'read', field: 'scrollY' },
    { op: 'skip', kind: 'bool', gate: { before: 15 }, note: 'pre-v15 bool' },
    { op: 'skip', kind: 'int32', gate: { before: 15 }, note: 'pre-v15 int32' },
    { op: 'read', field: 'referrer' },
    { op: 'read', field: 'documentState' },
    { op: 'read', field: 'pageScaleFactor' },
    { op: 'read', field: 'itemSequenceNumber' },
    { op: 'read', field: 'documentSequenceNumber' },
    { op: 'skip', kind: 'int64', gate: { from: 21, before: 23 }, note: 'v21-22 int64' },
    { op: 'skip', kind: 'int64', gate: { from: 17, before: 19 }, note: 'v17-18 int64' },
    { op: 'read', field: 'referrerPolicy', gate: { from: 18 } },
    { op: 'read', field: 'pinchX', gate: { from: 20 } },
    { op: 'read', field: 'pinchY', gate: { from: 20 } },
    { op: 'read', field: 'scrollRestorationType', gate: { from: 22 } },
    { op: 'read', field: 'stateObject' },
    { op: 'read', field: 'httpBody' },
    { op: 'skip', kind: 'string16', gate: { before: 14 }, note: 'pre-v14 string16' },
    { op: 'skip', kind: 'double', gate: { from: 11, before: 12, platform: 'mobile' }, note: 'v11 mobile double' },
    { op: 'skip', kind: 'bool', gate: { from: 11, before: 12, platform: 'mobile' }, note: 'v11 mobile bool' },
];

export interface FrameGateContext {
    version: number;
    isTop: boolean;
    platform: Platform;
}

export function gateMatches(gate: FrameGate | undefined, ctx: FrameGateContext): boolean {
    if (gate === undefined) return true;
    if (gate.from !== undefined && ctx.version < gate.from) return false;
    if (gate.before !== undefined && ctx.version >= gate.before) return false;
    if (gate.nestedOnly && ctx.isTop) return false;
    if (gate.platform !== undefined && ctx.platform !== gate.platform) return false;
    return true;
}

/** Steps that apply to one frame, in read order. */
export function layoutFor(ctx: FrameGateContext): FrameStep[] {
    return FRAME_STATE_LAYOUT.filter(step => gateMatches(step.gate, ctx));
}
