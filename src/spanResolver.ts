import { UnterminatedConstructError } from './errors.js';
import { LineBuffer, indentOf, isBlank } from './lineBuffer.js';
import { lineMatches } from './matcher.js';
import { SpanStrategy } from './types.js';

export const SINGLE_LINE: SpanStrategy = Object.freeze({ kind: 'single' });

function countOccurrences(text: string, token: string): number {
    let count = 0;
    for (let at = text.indexOf(token); at !== -1; at = text.indexOf(token, at + token.length)) {
        count++;
    }
    return count;
}

function resolveFixedPattern(
    strategy: Extract<SpanStrategy, { kind: 'fixedPattern' }>,
    buffer: LineBuffer,
    start: number,
    ruleId: string
): number {
    for (let i = start; i < buffer.length; i++) {
        if (!lineMatches(strategy.terminator, buffer.peek(i, 0) ?? '')) {
            continue;
        }
        if (!strategy.followedBy) {
            return i;
        }
        const next = buffer.peek(i, 1);
        if (next !== undefined && lineMatches(strategy.followedBy, next)) {
            return strategy.includeFollowing ? i + 1 : i;
        }
    }
    throw new UnterminatedConstructError(ruleId, start);
}

/**
 * Counts delimiters line by line. Characters inside string and comment
 * literals are counted too; rules must not start on lines where that matters.
 */
function resolveBalancedDelimiters(
    strategy: Extract<SpanStrategy, { kind: 'balancedDelimiters' }>,
    buffer: LineBuffer,
    start: number,
    ruleId: string
): number {
    let depth = strategy.initialDepth;
    let opened = depth > 0;

    for (let i = start; i < buffer.length; i++) {
        const text = buffer.peek(i, 0) ?? '';
        const opens = countOccurrences(text, strategy.open);
        depth += opens - countOccurrences(text, strategy.close);
        opened = opened || opens > 0;
        if (opened && depth <= 0) {
            return i;
        }
    }
    throw new UnterminatedConstructError(ruleId, start);
}

function resolveBlankOrDedent(
    strategy: Extract<SpanStrategy, { kind: 'blankOrDedent' }>,
    buffer: LineBuffer,
    start: number
): number {
    const base = strategy.baseIndent ?? indentOf(buffer.peek(start, 0) ?? '').length;

    let end = start;
    for (let i = start + 1; i < buffer.length; i++) {
        const text = buffer.peek(i, 0) ?? '';
        if (isBlank(text)) {
            continue;
        }
        if (indentOf(text).length <= base) {
            break;
        }
        end = i;
    }
    return end;
}

/**
 * Index of the last line (inclusive) of the construct starting at `start`.
 *
 * @throws UnterminatedConstructError when the buffer ends before the construct does
 */
export function resolve(strategy: SpanStrategy, buffer: LineBuffer, start: number, ruleId: string): number {
    if (start < 0 || start >= buffer.length) {
        throw new UnterminatedConstructError(ruleId, start);
    }

    switch (strategy.kind) {
        case 'single':
            return start;
        case 'fixedPattern':
            return resolveFixedPattern(strategy, buffer, start, ruleId);
        case 'balancedDelimiters':
            return resolveBalancedDelimiters(strategy, buffer, start, ruleId);
        case 'blankOrDedent':
            return resolveBlankOrDedent(strategy, buffer, start);
    }
}
