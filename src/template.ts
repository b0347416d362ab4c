import { MatchCaptures } from './types.js';

// $$, $<name> or $1..$9
const REFERENCE = /\$(?:(\$)|<([A-Za-z_][A-Za-z0-9_]*)>|([1-9]))/g;

export type TemplateReference = { kind: 'named'; name: string } | { kind: 'positional'; index: number };

/**
 * Expands a replacement line against the captures of a start line.
 * Unknown references expand to ''.
 */
export function expandTemplate(template: string, captures: MatchCaptures): string {
    return template.replace(REFERENCE, (_whole, dollar?: string, name?: string, digit?: string) => {
        if (dollar) {
            return '$';
        }
        if (name !== undefined) {
            return captures.named[name] ?? '';
        }
        return captures.positional[Number(digit)] ?? '';
    });
}

export function templateReferences(template: string): TemplateReference[] {
    const references: TemplateReference[] = [];
    for (const match of template.matchAll(REFERENCE)) {
        if (match[2] !== undefined) {
            references.push({ kind: 'named', name: match[2] });
        } else if (match[3] !== undefined) {
            references.push({ kind: 'positional', index: Number(match[3]) });
        }
    }
    return references;
}
