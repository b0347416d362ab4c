import { LineBuffer, indentOf } from './lineBuffer.js';
import { ConstructRule, LinePattern, MatchCaptures } from './types.js';

type LineTest = (text: string) => MatchCaptures | undefined;

const EMPTY_CAPTURES: MatchCaptures = Object.freeze({ positional: [], named: {} });

const compiled = new WeakMap<LinePattern, LineTest>();

/**
 * Builds a RegExp for a pattern source. Global and sticky flags are dropped
 * so that a compiled expression carries no lastIndex between lines.
 */
export function compileRegex(source: string, flags = ''): RegExp {
    return new RegExp(source, flags.replace(/[gy]/g, ''));
}

/**
 * Same as compileRegex, but global, for replacing every match on a line
 */
export function compileGlobalRegex(source: string, flags = ''): RegExp {
    return new RegExp(source, `${flags.replace(/[gy]/g, '')}g`);
}

export function toCaptures(match: RegExpMatchArray): MatchCaptures {
    const named: Record<string, string> = {};
    for (const [name, value] of Object.entries(match.groups ?? {})) {
        named[name] = value ?? '';
    }
    return {
        positional: Array.from(match, group => group ?? ''),
        named
    };
}

function compilePositive(pattern: LinePattern): LineTest {
    switch (pattern.kind) {
        case 'contains': {
            const { text } = pattern;
            return line => (line.includes(text) ? EMPTY_CAPTURES : undefined);
        }
        case 'prefix': {
            const { text } = pattern;
            return line => (line.startsWith(text) ? EMPTY_CAPTURES : undefined);
        }
        case 'trimmed': {
            const expected = pattern.text.trim();
            return line => (line.trim() === expected ? EMPTY_CAPTURES : undefined);
        }
        case 'regex': {
            const regex = compileRegex(pattern.source, pattern.flags);
            return line => {
                const match = regex.exec(line);
                return match ? toCaptures(match) : undefined;
            };
        }
    }
}

function compile(pattern: LinePattern): LineTest {
    const test = compilePositive(pattern);
    if (!pattern.negate) {
        return test;
    }
    return line => (test(line) ? undefined : EMPTY_CAPTURES);
}

/**
 * Tests one line against a pattern, returning its captures on success
 */
export function testLine(pattern: LinePattern, text: string): MatchCaptures | undefined {
    let test = compiled.get(pattern);
    if (!test) {
        test = compile(pattern);
        compiled.set(pattern, test);
    }
    return test(text);
}

export function lineMatches(pattern: LinePattern, text: string): boolean {
    return testLine(pattern, text) !== undefined;
}

/**
 * Decides whether `rule` starts a construct at `index`.
 *
 * Looks at most one line back (`precededBy`) and one line ahead (`followedBy`).
 * Named groups from those neighbours are merged into the captures; the start
 * line's own groups win on a name clash, and `indent` is always available.
 */
export function matches(rule: ConstructRule, buffer: LineBuffer, index: number): MatchCaptures | undefined {
    const line = buffer.at(index);
    if (!line) {
        return undefined;
    }

    const head = testLine(rule.start, line.text);
    if (!head) {
        return undefined;
    }

    const neighbours: Array<[LinePattern | undefined, number]> = [
        [rule.precededBy, -1],
        [rule.followedBy, 1]
    ];
    let named: Record<string, string> = {};
    for (const [pattern, offset] of neighbours) {
        if (!pattern) {
            continue;
        }
        const text = buffer.peek(index, offset);
        const neighbour = text === undefined ? undefined : testLine(pattern, text);
        if (!neighbour) {
            return undefined;
        }
        named = { ...named, ...neighbour.named };
    }

    return {
        positional: head.positional,
        named: { indent: indentOf(line.text), ...named, ...head.named }
    };
}

/**
 * Ids of every rule whose start predicate holds at `index`, in rule order
 */
export function matchingRuleIds(rules: readonly ConstructRule[], buffer: LineBuffer, index: number): string[] {
    return rules.filter(rule => matches(rule, buffer, index) !== undefined).map(rule => rule.id);
}
