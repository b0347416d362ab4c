import { EventEmitter } from 'events';
import { LineBuffer, isBlank, joinLines } from './lineBuffer.js';
import { compileGlobalRegex, matches, toCaptures } from './matcher.js';
import { SINGLE_LINE, resolve } from './spanResolver.js';
import { expandTemplate } from './template.js';
import {
    AppliedRewrite,
    ConstructRule,
    EngineState,
    LineTerminator,
    MatchCaptures,
    PatchResult,
    RewriteAction,
    SourceLine
} from './types.js';

interface RuleHit {
    rule: ConstructRule;
    captures: MatchCaptures;
}

interface EmittedLine {
    text: string;
    ending: LineTerminator;
}

type SubstituteAction = Extract<RewriteAction, { kind: 'substitute' }>;

const substitutions = new WeakMap<SubstituteAction, RegExp>();

function substitutionRegex(action: SubstituteAction): RegExp {
    let regex = substitutions.get(action);
    if (!regex) {
        regex = compileGlobalRegex(action.pattern, action.flags);
        substitutions.set(action, regex);
    }
    return regex;
}

/**
 * Replaces every match of `regex` in `text`. Each match's own groups are
 * available to the replacement on top of the start line's named captures.
 */
function substituteAll(text: string, regex: RegExp, replacement: string, captures: MatchCaptures): string {
    let result = '';
    let last = 0;
    for (const match of text.matchAll(regex)) {
        const at = match.index ?? last;
        const own = toCaptures(match);
        result += text.slice(last, at);
        result += expandTemplate(replacement, {
            positional: own.positional,
            named: { ...captures.named, ...own.named }
        });
        last = at + match[0].length;
    }
    return result + text.slice(last);
}

function spanLines(buffer: LineBuffer, start: number, end: number): SourceLine[] {
    const lines: SourceLine[] = [];
    for (let i = start; i <= end; i++) {
        const line = buffer.at(i);
        if (line) {
            lines.push(line);
        }
    }
    return lines;
}

/**
 * Lines written in place of the span [start, end]. Lines kept from the span
 * keep their terminators; template lines take the buffer's usual one.
 */
function rewriteSpan(action: RewriteAction, buffer: LineBuffer, start: number, end: number, captures: MatchCaptures): EmittedLine[] {
    const generated = (text: string): EmittedLine => ({ text, ending: buffer.lineEnding });
    switch (action.kind) {
        case 'delete':
            return [];
        case 'replaceLines':
            return action.template.map(line => generated(expandTemplate(line, captures)));
        case 'replaceHeaderKeepBody': {
            const body = spanLines(buffer, start + 1, end).map(({ text, ending }) => ({ text, ending }));
            return [generated(expandTemplate(action.template, captures)), ...body];
        }
        case 'substitute': {
            const regex = substitutionRegex(action);
            return spanLines(buffer, start, end).map(({ text, ending }) => ({
                text: substituteAll(text, regex, action.replacement, captures),
                ending
            }));
        }
    }
}

/**
 * Single forward pass over a line buffer.
 *
 * At each index the rules are tried in order and the first hit wins. The hit's
 * span is resolved, rewritten and skipped; any other line is copied as-is.
 * Emits `state` on every transition and `applied` for every rewrite.
 */
export class RewriteEngine {
    private readonly rules: readonly ConstructRule[];
    private readonly events = new EventEmitter();
    private currentState: EngineState = 'scanning';

    constructor(rules: readonly ConstructRule[]) {
        this.rules = rules;
    }

    get state(): EngineState {
        return this.currentState;
    }

    onApplied(listener: (rewrite: AppliedRewrite) => void): this {
        this.events.on('applied', listener);
        return this;
    }

    onStateChange(listener: (state: EngineState) => void): this {
        this.events.on('state', listener);
        return this;
    }

    private transition(state: EngineState): void {
        if (state !== this.currentState) {
            this.currentState = state;
            this.events.emit('state', state);
        }
    }

    private firstHit(buffer: LineBuffer, index: number): RuleHit | undefined {
        for (const rule of this.rules) {
            const captures = matches(rule, buffer, index);
            if (captures) {
                return { rule, captures };
            }
        }
        return undefined;
    }

    /**
     * @throws UnterminatedConstructError if a matched construct never ends; no result is produced
     */
    run(buffer: LineBuffer): PatchResult {
        const output: EmittedLine[] = [];
        const applied: AppliedRewrite[] = [];
        this.transition('scanning');

        try {
            let index = 0;
            while (index < buffer.length) {
                const hit = this.firstHit(buffer, index);
                if (!hit) {
                    const line = buffer.at(index);
                    if (line) {
                        output.push({ text: line.text, ending: line.ending });
                    }
                    index++;
                    continue;
                }

                this.transition('inSpan');
                const { rule, captures } = hit;
                let end = resolve(rule.span ?? SINGLE_LINE, buffer, index, rule.id);
                const emitted = rewriteSpan(rule.action, buffer, index, end, captures);
                const following = buffer.peek(end, 1);
                if (rule.consumeTrailingBlank && following !== undefined && isBlank(following)) {
                    end++;
                }

                output.push(...emitted);
                const rewrite: AppliedRewrite = {
                    ruleId: rule.id,
                    action: rule.action.kind,
                    startIndex: index,
                    endIndex: end,
                    emitted: emitted.length
                };
                applied.push(rewrite);
                this.events.emit('applied', rewrite);

                index = end + 1;
                this.transition('scanning');
            }
        } finally {
            this.transition('done');
        }

        return {
            outputLines: output.map(line => line.text),
            outputEndings: output.map(line => line.ending),
            applied,
            inputLineCount: buffer.length,
            lineEnding: buffer.lineEnding,
            finalNewline: buffer.finalNewline
        };
    }
}

/**
 * Runs `rules` once over `buffer`
 */
export function applyRules(rules: readonly ConstructRule[], buffer: LineBuffer): PatchResult {
    return new RewriteEngine(rules).run(buffer);
}

/**
 * Re-joins a result's lines with their terminators and the input's final newline
 */
export function renderResult(result: PatchResult): string {
    return joinLines(result.outputLines, result.outputEndings, result.lineEnding, result.finalNewline);
}
