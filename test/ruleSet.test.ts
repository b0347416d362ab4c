import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AmbiguousMatchError, PatchIOError, RuleSetError } from '../src/errors.js';
import { LineBuffer } from '../src/lineBuffer.js';
import { applyRules, renderResult } from '../src/rewriteEngine.js';
import {
    assertUnambiguous,
    builtInRuleSetNames,
    findAmbiguousMatches,
    loadRuleSetFile,
    parseRuleSet,
    resolveRuleSet,
    validateRules
} from '../src/ruleSet.js';
import { ConstructRule } from '../src/types.js';

const FIXTURES = new URL('./fixtures/', import.meta.url);

async function fixture(name: string): Promise<string> {
    return fs.readFile(new URL(name, FIXTURES), 'utf8');
}

function deleteRule(id: string, text: string): ConstructRule {
    return { id, start: { kind: 'contains', text }, action: { kind: 'delete' } };
}

describe('parseRuleSet', () => {
    it('accepts a minimal rule set and fills in the delimiter depth', () => {
        const ruleSet = parseRuleSet({
            name: 'blocks',
            rules: [{
                id: 'drop-block',
                start: { kind: 'prefix', text: 'block' },
                span: { kind: 'balancedDelimiters', open: '{', close: '}' },
                action: { kind: 'delete' }
            }]
        }, 'test');

        expect(ruleSet.rules[0].span).toEqual({ kind: 'balancedDelimiters', open: '{', close: '}', initialDepth: 0 });
    });

    it('reports schema violations with their path', () => {
        const attempt = () => parseRuleSet({
            name: 'broken',
            rules: [{ id: 'x', start: { kind: 'glob', text: '*' }, action: { kind: 'delete' } }]
        }, 'broken.json');

        expect(attempt).toThrow(RuleSetError);
        expect(attempt).toThrow(/^Invalid rule set broken\.json: rules\.0\.start\.kind: /);
    });

    it('rejects duplicate ids and regexes that do not compile', () => {
        const attempt = () => parseRuleSet({
            name: 'dupes',
            rules: [
                { id: 'same', start: { kind: 'contains', text: 'a' }, action: { kind: 'delete' } },
                { id: 'same', start: { kind: 'regex', source: '(' }, action: { kind: 'delete' } }
            ]
        }, 'dupes.json');

        try {
            attempt();
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(RuleSetError);
            const issues = error instanceof RuleSetError ? error.issues : [];
            expect(issues).toHaveLength(2);
            expect(issues[0]).toBe('duplicate rule id "same"');
            expect(issues[1]).toMatch(/^same: start: Invalid regular expression/);
        }
    });
});

describe('validateRules', () => {
    it('flags template references the start patterns cannot supply', () => {
        const rules: ConstructRule[] = [{
            id: 'rewrite',
            start: { kind: 'regex', source: '^(?<head>.*)call\\((\\w+)\\)' },
            followedBy: { kind: 'regex', source: '(?<next>\\w+)' },
            action: { kind: 'replaceLines', template: ['$<indent>$<head>$<next>$2', '$<tail>$3'] }
        }];

        expect(validateRules(rules)).toEqual([
            'rewrite: template references unknown capture $<tail>',
            'rewrite: template references missing group $3'
        ]);
    });

    it('checks a substitution pattern and the groups its replacement uses', () => {
        const rules: ConstructRule[] = [
            {
                id: 'bad-pattern',
                start: { kind: 'contains', text: 'x' },
                action: { kind: 'substitute', pattern: '(', replacement: '' }
            },
            {
                id: 'groups',
                start: { kind: 'regex', source: '^(?<lead>\\s*)call' },
                action: { kind: 'substitute', pattern: 'f\\((?<arg>\\w+)\\)', replacement: '$<lead>g($<arg>)$1$<gone>$2' }
            }
        ];

        const issues = validateRules(rules);

        expect(issues).toHaveLength(3);
        expect(issues[0]).toMatch(/^bad-pattern: action\.pattern: Invalid regular expression/);
        expect(issues.slice(1)).toEqual([
            'groups: template references unknown capture $<gone>',
            'groups: template references missing group $2'
        ]);
    });

    it('flags identical open and close delimiters', () => {
        const rules: ConstructRule[] = [{
            id: 'quotes',
            start: { kind: 'contains', text: '"' },
            span: { kind: 'balancedDelimiters', open: '"', close: '"', initialDepth: 0 },
            action: { kind: 'delete' }
        }];

        expect(validateRules(rules)).toEqual(['quotes: open and close delimiters must differ']);
    });
});

describe('findAmbiguousMatches', () => {
    it('reports each line claimed by more than one rule', () => {
        const rules = [deleteRule('call', 'call('), deleteRule('await', '.await'), deleteRule('other', 'unused')];
        const buffer = LineBuffer.fromLines(['call(a).await;', 'call(b);', 'x.await;', 'call(c).await;']);

        expect(findAmbiguousMatches(rules, buffer)).toEqual([
            { index: 0, ruleIds: ['call', 'await'] },
            { index: 3, ruleIds: ['call', 'await'] }
        ]);
    });

    it('raises AmbiguousMatchError naming lines and rules', () => {
        const rules = [deleteRule('call', 'call('), deleteRule('await', '.await')];
        const buffer = LineBuffer.fromLines(['call(a).await;']);

        expect(() => assertUnambiguous(rules, buffer))
            .toThrow('Ambiguous rule set: line 1 matched by call, await');
        try {
            assertUnambiguous(rules, buffer);
        } catch (error) {
            expect(error).toBeInstanceOf(AmbiguousMatchError);
            if (error instanceof AmbiguousMatchError) {
                expect(error.indices).toEqual([0]);
                expect(error.ruleIds).toEqual(['call', 'await']);
            }
        }
    });
});

describe('built-in interceptors rule set', () => {
    it('is listed and loads cleanly', async () => {
        const ruleSet = await resolveRuleSet('interceptors');

        expect(builtInRuleSetNames()).toEqual(['interceptors']);
        expect(ruleSet.name).toBe('interceptors');
        expect(validateRules(ruleSet.rules)).toEqual([]);
    });

    it('has no two rules claiming the same line of the sample client', async () => {
        const { rules } = await resolveRuleSet('interceptors');
        const buffer = LineBuffer.fromText(await fixture('client.rs'));

        expect(findAmbiguousMatches(rules, buffer)).toEqual([]);
    });

    it('strips the interceptor facility from the sample client', async () => {
        const { rules } = await resolveRuleSet('interceptors');
        const result = applyRules(rules, LineBuffer.fromText(await fixture('client.rs')));

        expect(renderResult(result)).toBe(await fixture('client.expected.rs'));
        expect(result.applied.map(rewrite => rewrite.ruleId)).toEqual([
            'lint-allow',
            'interceptor-import',
            'rwlock-import',
            'helper-macro',
            'interceptors-field',
            'helper-macro-invocation',
            'helper-macro-invocation',
            'debug-impl-comment',
            'debug-interceptors-field',
            'helper-impl-block',
            'interceptors-init',
            'with-interceptor-method',
            'interceptors-accessor',
            'metadata-declaration',
            'metadata-reference',
            'metadata-argument',
            'hook-comment',
            'before-request-call',
            'api-error-binding',
            'hook-comment',
            'after-response-call',
            'api-error-inline'
        ]);
    });

    it('rewrites every error-handler call on a line in one pass', async () => {
        const { rules } = await resolveRuleSet('interceptors');
        const line = '        let pair = (self.handle_api_error(e, op), self.handle_api_error(f, op).await);';

        const first = applyRules(rules, LineBuffer.fromLines([line]));
        const second = applyRules(rules, LineBuffer.fromLines(first.outputLines));

        expect(first.outputLines).toEqual(['        let pair = (map_api_error(e), map_api_error(f));']);
        expect(second.applied).toEqual([]);
    });

    it('drops borrowed metadata arguments from other calls', async () => {
        const { rules } = await resolveRuleSet('interceptors');
        const input = [
            '        audit(&metadata, op);',
            '        audit(op, &mut metadata, extra);',
            '        audit(&metadata);'
        ];

        const result = applyRules(rules, LineBuffer.fromLines(input));

        expect(result.outputLines).toEqual(['        audit(op);', '        audit(op, extra);', '        audit();']);
        expect(result.applied.map(rewrite => rewrite.ruleId)).toEqual([
            'metadata-reference',
            'metadata-reference',
            'metadata-reference'
        ]);
    });

    it('matches nothing in an already patched client', async () => {
        const { rules } = await resolveRuleSet('interceptors');
        const result = applyRules(rules, LineBuffer.fromText(await fixture('client.expected.rs')));

        expect(result.applied).toEqual([]);
    });
});

describe('loadRuleSetFile', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(tmpdir(), 'struct-patch-rules-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('loads a rule set from a JSON file path', async () => {
        const file = path.join(dir, 'todo.json');
        await fs.writeFile(file, JSON.stringify({ name: 'todo', rules: [deleteRule('todo', 'TODO')] }));

        const ruleSet = await resolveRuleSet(file);

        expect(ruleSet.rules.map(rule => rule.id)).toEqual(['todo']);
    });

    it('reports malformed JSON as a rule set error', async () => {
        const file = path.join(dir, 'bad.json');
        await fs.writeFile(file, '{ "name": ');

        await expect(loadRuleSetFile(file)).rejects.toThrow(RuleSetError);
        await expect(loadRuleSetFile(file)).rejects.toThrow(/not valid JSON/);
    });

    it('reports a missing file as an I/O error', async () => {
        await expect(loadRuleSetFile(path.join(dir, 'missing.json'))).rejects.toBeInstanceOf(PatchIOError);
    });
});
