/**
 * Types for structural patch operations
 */

export type LineEnding = '\n' | '\r\n';

// '' only for a last line with no newline after it
export type LineTerminator = LineEnding | '';

/**
 * One line of the input and the terminator that followed it
 */
export interface SourceLine {
    readonly index: number;
    readonly text: string;
    readonly ending: LineTerminator;
}

/**
 * Test applied to a single line
 */
export type LinePattern =
    | { kind: 'contains'; text: string; negate?: boolean }
    | { kind: 'prefix'; text: string; negate?: boolean }
    | { kind: 'trimmed'; text: string; negate?: boolean }
    | { kind: 'regex'; source: string; flags?: string; negate?: boolean };

/**
 * How far a construct extends once its start line has matched
 */
export type SpanStrategy =
    | { kind: 'single' }
    | {
        kind: 'fixedPattern';
        terminator: LinePattern;
        // Terminator only counts when the following line matches this too
        followedBy?: LinePattern;
        // End the span on the following line instead of the terminator
        includeFollowing?: boolean;
    }
    | { kind: 'balancedDelimiters'; open: string; close: string; initialDepth: number }
    | { kind: 'blankOrDedent'; baseIndent?: number };

/**
 * What happens to the lines of a resolved span
 */
export type RewriteAction =
    | { kind: 'delete' }
    | { kind: 'replaceLines'; template: string[] }
    | { kind: 'replaceHeaderKeepBody'; template: string }
    // Replaces every match of `pattern` on every line of the span
    | { kind: 'substitute'; pattern: string; flags?: string; replacement: string };

export type RewriteKind = RewriteAction['kind'];

/**
 * A removable or rewritable construct
 */
export interface ConstructRule {
    id: string;
    description?: string;
    start: LinePattern;
    // Window widening: the previous and next line
    precededBy?: LinePattern;
    followedBy?: LinePattern;
    // Defaults to a single line
    span?: SpanStrategy;
    action: RewriteAction;
    // Swallow one blank line directly after the span
    consumeTrailingBlank?: boolean;
}

/**
 * Substrings captured while matching a start line
 */
export interface MatchCaptures {
    // $0 is the whole match, $1.. the numbered groups
    positional: string[];
    named: Record<string, string>;
}

/**
 * Audit trail entry
 */
export interface AppliedRewrite {
    ruleId: string;
    action: RewriteKind;
    startIndex: number;
    endIndex: number;
    // Lines written in place of the span
    emitted: number;
}

/**
 * Outcome of one engine run
 */
export interface PatchResult {
    outputLines: string[];
    // Terminator of each output line; copied lines keep their own
    outputEndings: LineTerminator[];
    applied: AppliedRewrite[];
    inputLineCount: number;
    // Most common terminator of the input, used for generated lines
    lineEnding: LineEnding;
    finalNewline: boolean;
}

export type EngineState = 'scanning' | 'inSpan' | 'done';

/**
 * Options for patching a file on disk
 */
export interface FilePatchOptions {
    // Report the change as a unified diff and leave the file alone
    dryRun?: boolean;
    // Copy the original to <path>.bak before replacing it
    createBackup?: boolean;
    // Called for every rewrite as it is applied
    onApplied?: (rewrite: AppliedRewrite) => void;
}

/**
 * Result of patching a file on disk
 */
export interface FilePatchReport {
    filePath: string;
    changed: boolean;
    dryRun: boolean;
    applied: AppliedRewrite[];
    removed: number;
    rewritten: number;
    inputLineCount: number;
    outputLineCount: number;
    backupPath?: string;
    // Unified diff, only for dry runs
    diff?: string;
}

/**
 * A line claimed by more than one rule
 */
export interface AmbiguousLine {
    index: number;
    ruleIds: string[];
}

/**
 * Named, ordered collection of rules as stored on disk
 */
export interface RuleSet {
    name: string;
    description?: string;
    rules: ConstructRule[];
}
