export type SnssLogger = {
    debug?: (msg: string) => void;
    warn?: (msg: string) => void;
};

/**
 * Selects platform-specific page state quirks. Mobile builds wrote two extra
 * fields per frame in page state version 11.
 */
export type Platform = 'desktop' | 'mobile';

/** Upper bounds applied to counts read from untrusted input. */
export type DecodeLimits = {
    /** Deepest frame nesting accepted below the main frame. */
    maxFrameDepth: number;
    /** Total frames accepted in one page state tree. */
    maxFrames: number;
    /** Entries in a count-prefixed string vector. */
    maxVectorLength: number;
    maxHttpBodyElements: number;
    /** Items per form and values per item in serialized form state. */
    maxFormItems: number;
    maxTabEntries: number;
};

export const DEFAULT_LIMITS: DecodeLimits = {
    maxFrameDepth: 64,
    maxFrames: 4096,
    maxVectorLength: 65_536,
    maxHttpBodyElements: 65_536,
    maxFormItems: 65_536,
    maxTabEntries: 65_536,
};

export type SnssDecoderOptions = {
    /** Default `mobile`. */
    platform?: Platform;
    limits?: Partial<DecodeLimits>;
    /** Optional logger hook; decoders never write to the console themselves. */
    logger?: SnssLogger | null;
};

export type ResolvedDecoderOptions = {
    platform: Platform;
    limits: DecodeLimits;
    logger: SnssLogger | null;
};

export function resolveOptions(options: SnssDecoderOptions = {}): ResolvedDecoderOptions {
    return {
        platform: options.platform ?? 'mobile',
        limits: { ...DEFAULT_LIMITS, ...options.limits },
        logger: options.logger ?? null,
    };
}
