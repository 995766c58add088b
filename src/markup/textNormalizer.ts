import { TableMarkupError } from '../errors';

function isBlank(line: string): boolean {
    return line.trim().length === 0;
}

function indentOf(line: string): number {
    return line.length - line.trimStart().length;
}

/**
 * Splits `text` into lines, drops blank lines around the table and removes the common indentation.
 *
 * The indentation is the smaller of the first two lines' indents: a Markdown header without
 * leading pipe may sit further left than its separator row.
 */
export function normalizeTableText(text: string): string[] {
    const lines = text.split(/\r?\n/).map((line) => line.trimEnd());

    let start = 0;
    let end = lines.length;
    while (start < end && isBlank(lines[start])) start++;
    while (end > start && isBlank(lines[end - 1])) end--;

    if (start === end) {
        throw new TableMarkupError('The table text is empty');
    }

    const body = lines.slice(start, end);
    const indent = Math.min(...body.slice(0, 2).map(indentOf));
    return body.map((line) => line.slice(Math.min(indent, indentOf(line))));
}
