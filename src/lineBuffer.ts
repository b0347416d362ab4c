import { LineEnding, LineTerminator, SourceLine } from './types.js';

interface LineEntry {
    text: string;
    ending: LineTerminator;
}

function toTerminator(value: string | undefined): LineTerminator {
    return value === '\r\n' || value === '\n' ? value : '';
}

/**
 * The terminator most lines use; on a tie, the first one seen
 */
function dominantEnding(entries: readonly LineEntry[]): LineEnding {
    let crlf = 0;
    let lf = 0;
    let first: LineEnding | undefined;
    for (const { ending } of entries) {
        if (ending === '') {
            continue;
        }
        first = first ?? ending;
        if (ending === '\r\n') {
            crlf++;
        } else {
            lf++;
        }
    }
    if (crlf !== lf) {
        return crlf > lf ? '\r\n' : '\n';
    }
    return first ?? '\n';
}

/**
 * Immutable, indexed view of a file's lines
 */
export class LineBuffer {
    private readonly lines: readonly SourceLine[];

    private constructor(
        entries: readonly LineEntry[],
        readonly lineEnding: LineEnding,
        readonly finalNewline: boolean
    ) {
        this.lines = Object.freeze(entries.map(({ text, ending }, index) => Object.freeze({ index, text, ending })));
    }

    /**
     * Splits on \n or \r\n and keeps each line's own terminator.
     */
    static fromText(content: string): LineBuffer {
        if (content.length === 0) {
            return new LineBuffer([], '\n', false);
        }

        // text, terminator, text, ..., text
        const parts = content.split(/(\r?\n)/);
        const entries: LineEntry[] = [];
        for (let i = 0; i < parts.length; i += 2) {
            entries.push({ text: parts[i], ending: toTerminator(parts[i + 1]) });
        }

        const last = entries[entries.length - 1];
        const finalNewline = entries.length > 1 && last.text === '' && last.ending === '';
        if (finalNewline) {
            entries.pop();
        }
        return new LineBuffer(entries, dominantEnding(entries), finalNewline);
    }

    static fromLines(texts: readonly string[], lineEnding: LineEnding = '\n', finalNewline = true): LineBuffer {
        const withNewline = finalNewline && texts.length > 0;
        const entries = texts.map((text, index): LineEntry => ({
            text,
            ending: index < texts.length - 1 || withNewline ? lineEnding : ''
        }));
        return new LineBuffer(entries, lineEnding, withNewline);
    }

    get length(): number {
        return this.lines.length;
    }

    at(index: number): SourceLine | undefined {
        return index >= 0 && index < this.lines.length ? this.lines[index] : undefined;
    }

    /**
     * Text at index + offset, or undefined outside the buffer
     */
    peek(index: number, offset: number): string | undefined {
        return this.at(index + offset)?.text;
    }

    texts(): string[] {
        return this.lines.map(line => line.text);
    }

    toText(): string {
        return joinLines(this.texts(), this.lines.map(line => line.ending), this.lineEnding, this.finalNewline);
    }
}

/**
 * Re-joins lines with their own terminators. A line without one gets
 * `lineEnding`; the last line gets one only when `finalNewline` is set.
 */
export function joinLines(
    texts: readonly string[],
    endings: readonly LineTerminator[],
    lineEnding: LineEnding,
    finalNewline: boolean
): string {
    const last = texts.length - 1;
    return texts.map((text, i) => {
        if (i === last && !finalNewline) {
            return text;
        }
        return text + (endings[i] || lineEnding);
    }).join('');
}

export function indentOf(text: string): string {
    const match = text.match(/^[ \t]*/);
    return match ? match[0] : '';
}

export function isBlank(text: string): boolean {
    return text.trim().length === 0;
}
