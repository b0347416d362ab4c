import { parseArgs } from 'util';
import { PatchError, describeError } from './errors.js';
import { patchFile } from './filePatcher.js';
import { resolveRuleSet } from './ruleSet.js';
import { AppliedRewrite, FilePatchReport } from './types.js';

export const DEFAULT_RULE_SET = 'interceptors';

export const USAGE = 'Usage: struct-patch <file> [--rules <name|path.json>] [--dry-run] [--backup] [--check] [--quiet]';

export interface CliOutput {
    out(line: string): void;
    err(line: string): void;
}

const consoleOutput: CliOutput = {
    out: line => console.log(line),
    err: line => console.error(line)
};

export function formatSummary(report: FilePatchReport): string {
    if (report.applied.length === 0) {
        return `No constructs matched in ${report.filePath}`;
    }
    const verb = report.dryRun ? 'Would patch' : 'Patched';
    const ruleIds = report.applied.map(rewrite => rewrite.ruleId).join(', ');
    return `${verb} ${report.filePath}: ${report.removed} removed, ${report.rewritten} rewritten (${ruleIds})`;
}

export function formatRewrite(rewrite: AppliedRewrite): string {
    const lines = rewrite.startIndex === rewrite.endIndex
        ? `line ${rewrite.startIndex + 1}`
        : `lines ${rewrite.startIndex + 1}-${rewrite.endIndex + 1}`;
    return `  ${rewrite.ruleId}: ${rewrite.action} ${lines}`;
}

function parseCliArgs(args: string[]) {
    return parseArgs({
        args,
        allowPositionals: true,
        options: {
            rules: { type: 'string', short: 'r', default: DEFAULT_RULE_SET },
            'dry-run': { type: 'boolean', short: 'n', default: false },
            backup: { type: 'boolean', short: 'b', default: false },
            check: { type: 'boolean', default: false },
            quiet: { type: 'boolean', short: 'q', default: false },
            help: { type: 'boolean', short: 'h', default: false }
        }
    });
}

/**
 * Runs the command line tool and resolves to its exit code
 */
export async function runCli(args: string[], output: CliOutput = consoleOutput): Promise<number> {
    let parsed: ReturnType<typeof parseCliArgs>;
    try {
        parsed = parseCliArgs(args);
    } catch (error) {
        output.err(`Error: ${describeError(error)}`);
        output.err(USAGE);
        return 1;
    }

    const { values, positionals } = parsed;
    if (values.help) {
        output.out(USAGE);
        return 0;
    }
    if (positionals.length !== 1) {
        output.err(USAGE);
        return 1;
    }

    const [filePath] = positionals;
    const showDiff = values['dry-run'] === true;
    const check = values.check === true;
    try {
        const ruleSet = await resolveRuleSet(values.rules ?? DEFAULT_RULE_SET);
        const report = await patchFile(filePath, ruleSet.rules, {
            dryRun: showDiff || check,
            createBackup: values.backup === true,
            onApplied: values.quiet ? undefined : rewrite => output.err(formatRewrite(rewrite))
        });

        if (showDiff && report.diff !== undefined && report.applied.length > 0) {
            output.out(report.diff);
        }
        output.out(formatSummary(report));
        return check && report.applied.length > 0 ? 1 : 0;
    } catch (error) {
        if (!(error instanceof PatchError)) {
            throw error;
        }
        output.err(`Error: ${error.message}`);
        return 1;
    }
}
