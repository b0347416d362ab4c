import { AmbiguousLine } from './types.js';

export type PatchErrorCode =
    | 'UNTERMINATED_CONSTRUCT'
    | 'IO_ERROR'
    | 'AMBIGUOUS_MATCH'
    | 'RULE_SET_INVALID';

/**
 * Base class for every failure that aborts a patch run
 */
export abstract class PatchError extends Error {
    abstract readonly code: PatchErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * A construct matched but its end could not be found before the end of the buffer
 */
export class UnterminatedConstructError extends PatchError {
    readonly code = 'UNTERMINATED_CONSTRUCT';

    constructor(readonly ruleId: string, readonly startIndex: number) {
        super(`Unterminated construct for rule "${ruleId}" starting at line ${startIndex + 1}`);
    }
}

export class PatchIOError extends PatchError {
    readonly code = 'IO_ERROR';

    constructor(readonly path: string, cause: unknown) {
        super(`I/O failure on ${path}: ${describeError(cause)}`, { cause });
    }
}

/**
 * Two or more rules claim the same start line
 */
export class AmbiguousMatchError extends PatchError {
    readonly code = 'AMBIGUOUS_MATCH';

    constructor(readonly lines: AmbiguousLine[]) {
        super(`Ambiguous rule set: ${lines
            .map(line => `line ${line.index + 1} matched by ${line.ruleIds.join(', ')}`)
            .join('; ')}`);
    }

    get indices(): number[] {
        return this.lines.map(line => line.index);
    }

    get ruleIds(): string[] {
        return [...new Set(this.lines.flatMap(line => line.ruleIds))];
    }
}

export class RuleSetError extends PatchError {
    readonly code = 'RULE_SET_INVALID';

    constructor(readonly source: string, readonly issues: string[]) {
        super(`Invalid rule set ${source}: ${issues.join('; ')}`);
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
