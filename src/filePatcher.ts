import { randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import * as diff from 'diff';
import { PatchIOError } from './errors.js';
import { LineBuffer } from './lineBuffer.js';
import { RewriteEngine, renderResult } from './rewriteEngine.js';
import { ConstructRule, FilePatchOptions, FilePatchReport, PatchResult } from './types.js';

export const TEMP_SUFFIX = '.tmp';
export const BACKUP_SUFFIX = '.bak';

const DEFAULT_FILE_PATCH_OPTIONS: Required<Pick<FilePatchOptions, 'dryRun' | 'createBackup'>> = {
    dryRun: false,
    createBackup: false
};

async function readSource(filePath: string): Promise<string> {
    try {
        return await fs.readFile(filePath, 'utf8');
    } catch (error) {
        throw new PatchIOError(filePath, error);
    }
}

async function createBackup(filePath: string): Promise<string> {
    const backupPath = `${filePath}${BACKUP_SUFFIX}`;
    try {
        await fs.copyFile(filePath, backupPath);
    } catch (error) {
        throw new PatchIOError(backupPath, error);
    }
    return backupPath;
}

/**
 * Sibling of `filePath` that no other writer picks, e.g. `client.rs.4242.9f1c03ab.tmp`
 */
export function tempPathFor(filePath: string): string {
    return `${filePath}.${process.pid}.${randomBytes(4).toString('hex')}${TEMP_SUFFIX}`;
}

/**
 * Writes next to the target and renames over it, so the original is either
 * fully replaced or left as it was.
 */
export async function replaceAtomically(filePath: string, content: string): Promise<void> {
    const tempPath = tempPathFor(filePath);
    try {
        await fs.writeFile(tempPath, content, 'utf8');
        await fs.rename(tempPath, filePath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw new PatchIOError(filePath, error);
    }
}

export function summarize(result: PatchResult): Pick<FilePatchReport, 'removed' | 'rewritten'> {
    const removed = result.applied.filter(rewrite => rewrite.emitted === 0).length;
    return { removed, rewritten: result.applied.length - removed };
}

/**
 * Reads `filePath`, runs `rules` over it and writes the result back.
 *
 * Nothing is written when no rule fired, when `dryRun` is set, or when the
 * engine fails; a dry run reports the change as a unified diff instead.
 */
export async function patchFile(
    filePath: string,
    rules: readonly ConstructRule[],
    options: FilePatchOptions = {}
): Promise<FilePatchReport> {
    const dryRun = options.dryRun ?? DEFAULT_FILE_PATCH_OPTIONS.dryRun;
    const backup = options.createBackup ?? DEFAULT_FILE_PATCH_OPTIONS.createBackup;

    const original = await readSource(filePath);
    const engine = new RewriteEngine(rules);
    if (options.onApplied) {
        engine.onApplied(options.onApplied);
    }
    const result = engine.run(LineBuffer.fromText(original));
    const patched = renderResult(result);
    const changed = result.applied.length > 0 && patched !== original;

    const report: FilePatchReport = {
        filePath,
        changed,
        dryRun,
        applied: result.applied,
        ...summarize(result),
        inputLineCount: result.inputLineCount,
        outputLineCount: result.outputLines.length
    };

    if (dryRun) {
        report.diff = diff.createTwoFilesPatch(filePath, filePath, original, patched, 'original', 'patched');
        return report;
    }
    if (!changed) {
        return report;
    }

    if (backup) {
        report.backupPath = await createBackup(filePath);
    }
    await replaceAtomically(filePath, patched);
    return report;
}
