import { promises as fs } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { AmbiguousMatchError, PatchIOError, RuleSetError, describeError } from './errors.js';
import { LineBuffer } from './lineBuffer.js';
import { compileRegex, matchingRuleIds } from './matcher.js';
import { templateReferences } from './template.js';
import { AmbiguousLine, ConstructRule, LinePattern, RuleSet } from './types.js';

const negate = z.boolean().optional();
const regexFlags = z.string().regex(/^[dgimsuy]*$/, 'unknown regex flag').optional();

export const LinePatternSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('contains'), text: z.string().min(1), negate }),
    z.object({ kind: z.literal('prefix'), text: z.string().min(1), negate }),
    z.object({ kind: z.literal('trimmed'), text: z.string(), negate }),
    z.object({
        kind: z.literal('regex'),
        source: z.string().min(1),
        flags: regexFlags,
        negate
    })
]);

export const SpanStrategySchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('single') }),
    z.object({
        kind: z.literal('fixedPattern'),
        terminator: LinePatternSchema,
        followedBy: LinePatternSchema.optional(),
        includeFollowing: z.boolean().optional()
    }),
    z.object({
        kind: z.literal('balancedDelimiters'),
        open: z.string().length(1),
        close: z.string().length(1),
        initialDepth: z.number().int().min(0).default(0)
    }),
    z.object({ kind: z.literal('blankOrDedent'), baseIndent: z.number().int().min(0).optional() })
]);

export const RewriteActionSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('delete') }),
    z.object({ kind: z.literal('replaceLines'), template: z.array(z.string()) }),
    z.object({ kind: z.literal('replaceHeaderKeepBody'), template: z.string() }),
    z.object({
        kind: z.literal('substitute'),
        pattern: z.string().min(1),
        flags: regexFlags,
        replacement: z.string()
    })
]);

export const ConstructRuleSchema = z.object({
    id: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'rule ids are kebab-case'),
    description: z.string().optional(),
    start: LinePatternSchema,
    precededBy: LinePatternSchema.optional(),
    followedBy: LinePatternSchema.optional(),
    span: SpanStrategySchema.optional(),
    action: RewriteActionSchema,
    consumeTrailingBlank: z.boolean().optional()
});

export const RuleSetSchema = z.object({
    name: z.string().min(1),
    description: z.string().optional(),
    rules: z.array(ConstructRuleSchema)
});

const BUILT_IN_RULE_SETS = new Map<string, string>([
    ['interceptors', 'interceptors.json']
]);

const RULES_DIRECTORY = fileURLToPath(new URL('../rules/', import.meta.url));

interface RegexShape {
    groupCount: number;
    names: string[];
}

/**
 * Number of groups and group names of a regex, read off an empty-string match
 * of `source|`, which always succeeds through the empty alternative.
 */
function regexShape(pattern: LinePattern | undefined): RegexShape {
    if (!pattern || pattern.kind !== 'regex' || pattern.negate) {
        return { groupCount: 0, names: [] };
    }
    const match = compileRegex(`${pattern.source}|`, pattern.flags).exec('');
    return {
        groupCount: match ? match.length - 1 : 0,
        names: Object.keys(match?.groups ?? {})
    };
}

function patternIssues(label: string, pattern: LinePattern | undefined): string[] {
    if (!pattern || pattern.kind !== 'regex') {
        return [];
    }
    try {
        compileRegex(pattern.source, pattern.flags);
        return [];
    } catch (error) {
        return [`${label}: ${describeError(error)}`];
    }
}

function ruleIssues(rule: ConstructRule): string[] {
    const patterns: Array<[string, LinePattern | undefined]> = [
        ['start', rule.start],
        ['precededBy', rule.precededBy],
        ['followedBy', rule.followedBy]
    ];
    if (rule.span?.kind === 'fixedPattern') {
        patterns.push(['span.terminator', rule.span.terminator], ['span.followedBy', rule.span.followedBy]);
    }

    if (rule.action.kind === 'substitute') {
        patterns.push(['action.pattern', { kind: 'regex', source: rule.action.pattern, flags: rule.action.flags }]);
    }

    const issues = patterns.flatMap(([label, pattern]) => patternIssues(label, pattern));
    if (issues.length > 0) {
        return issues.map(issue => `${rule.id}: ${issue}`);
    }

    if (rule.span?.kind === 'balancedDelimiters' && rule.span.open === rule.span.close) {
        issues.push(`${rule.id}: open and close delimiters must differ`);
    }

    // A substitution's numbered groups come from its own pattern
    const start = regexShape(rule.start);
    const own = rule.action.kind === 'substitute'
        ? regexShape({ kind: 'regex', source: rule.action.pattern, flags: rule.action.flags })
        : start;
    const available = new Set([
        'indent',
        ...start.names,
        ...own.names,
        ...regexShape(rule.precededBy).names,
        ...regexShape(rule.followedBy).names
    ]);
    const templates: string[] = rule.action.kind === 'replaceLines' ? rule.action.template
        : rule.action.kind === 'replaceHeaderKeepBody' ? [rule.action.template]
            : rule.action.kind === 'substitute' ? [rule.action.replacement]
                : [];
    for (const reference of templates.flatMap(templateReferences)) {
        if (reference.kind === 'named' && !available.has(reference.name)) {
            issues.push(`${rule.id}: template references unknown capture $<${reference.name}>`);
        }
        if (reference.kind === 'positional' && reference.index > own.groupCount) {
            issues.push(`${rule.id}: template references missing group $${reference.index}`);
        }
    }
    return issues;
}

/**
 * Checks a parsed rule set for authoring defects. Returns every issue found.
 */
export function validateRules(rules: readonly ConstructRule[]): string[] {
    const issues: string[] = [];
    const seen = new Set<string>();
    for (const rule of rules) {
        if (seen.has(rule.id)) {
            issues.push(`duplicate rule id "${rule.id}"`);
        }
        seen.add(rule.id);
        issues.push(...ruleIssues(rule));
    }
    return issues;
}

/**
 * Validates raw data (typically parsed JSON) as a rule set
 *
 * @param source Where the data came from, for error messages
 */
export function parseRuleSet(data: unknown, source: string): RuleSet {
    const parsed = RuleSetSchema.safeParse(data);
    if (!parsed.success) {
        throw new RuleSetError(source, parsed.error.issues.map(issue =>
            `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`));
    }

    const ruleSet: RuleSet = parsed.data;
    const issues = validateRules(ruleSet.rules);
    if (issues.length > 0) {
        throw new RuleSetError(source, issues);
    }
    return ruleSet;
}

export async function loadRuleSetFile(filePath: string): Promise<RuleSet> {
    let content: string;
    try {
        content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
        throw new PatchIOError(filePath, error);
    }

    let data: unknown;
    try {
        data = JSON.parse(content);
    } catch (error) {
        throw new RuleSetError(filePath, [`not valid JSON: ${describeError(error)}`]);
    }
    return parseRuleSet(data, filePath);
}

export function builtInRuleSetNames(): string[] {
    return [...BUILT_IN_RULE_SETS.keys()];
}

/**
 * Loads a built-in rule set by name, or any other argument as a JSON file path
 */
export async function resolveRuleSet(nameOrPath: string): Promise<RuleSet> {
    const builtIn = BUILT_IN_RULE_SETS.get(nameOrPath);
    if (builtIn !== undefined) {
        return loadRuleSetFile(`${RULES_DIRECTORY}${builtIn}`);
    }
    return loadRuleSetFile(nameOrPath);
}

/**
 * Every line at which more than one rule's start predicate holds
 */
export function findAmbiguousMatches(rules: readonly ConstructRule[], buffer: LineBuffer): AmbiguousLine[] {
    const ambiguous: AmbiguousLine[] = [];
    for (let index = 0; index < buffer.length; index++) {
        const ruleIds = matchingRuleIds(rules, buffer, index);
        if (ruleIds.length > 1) {
            ambiguous.push({ index, ruleIds });
        }
    }
    return ambiguous;
}

/**
 * @throws AmbiguousMatchError listing each contested line
 */
export function assertUnambiguous(rules: readonly ConstructRule[], buffer: LineBuffer): void {
    const ambiguous = findAmbiguousMatches(rules, buffer);
    if (ambiguous.length > 0) {
        throw new AmbiguousMatchError(ambiguous);
    }
}
