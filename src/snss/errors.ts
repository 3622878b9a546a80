export type DecodeStage =
    | 'pickle'
    | 'transition'
    | 'http-body'
    | 'page-state'
    | 'frame-state'
    | 'form-state'
    | 'navigation-entry'
    | 'tab-state'
    | 'header'
    | 'command'
    | 'container';

export class SnssError extends Error {
    /** Outer decode context, innermost first (e.g. `command #3 id=6 @ 28`). */
    public readonly context: string[] = [];

    constructor(
        message: string,
        public readonly stage: DecodeStage,
        public readonly offset: number | null = null
    ) {
        super(message);
        this.name = 'SnssError';
    }

    withContext(entry: string): this {
        this.context.push(entry);
        return this;
    }

    /** Message plus stage, offset and context, for user-facing reports. */
    describe(): string {
        const where = this.offset === null ? this.stage : `${this.stage} @ ${this.offset}`;
        const ctx = this.context.length > 0 ? ` (${this.context.join(' <- ')})` : '';
        return `${this.name} [${where}]: ${this.message}${ctx}`;
    }
}

export class IntegrityError extends SnssError {
    constructor(message: string, stage: DecodeStage, offset: number | null = null) {
        super(message, stage, offset);
        this.name = 'IntegrityError';
    }
}

export class IncompleteDataError extends SnssError {
    constructor(message: string, stage: DecodeStage, offset: number | null = null) {
        super(message, stage, offset);
        this.name = 'IncompleteDataError';
    }
}

export class FormatError extends SnssError {
    constructor(message: string, stage: DecodeStage, offset: number | null = null) {
        super(message, stage, offset);
        this.name = 'FormatError';
    }
}

export class LimitExceededError extends SnssError {
    constructor(message: string, stage: DecodeStage, offset: number | null = null) {
        super(message, stage, offset);
        this.name = 'LimitExceededError';
    }
}
