/**
 * reStructuredText simple tables.
 *
 *     ====== =======
 *      key    value
 *     (str)
 *     ====== =======
 *      'a'    1
 *      'b'    2
 *     ====== =======
 *
 * Column spans are the `=` runs of the top border. Every line between the first two borders belongs
 * to the header; a body line whose first column is blank continues the previous row.
 */
import { TableMarkupError } from '../errors';
import type { TableData, TableFormat } from './types';

interface ColumnSpan {
    from: number;
    to: number;
}

const BORDER_PATTERN = /^ *[= ]*= *$/;

function isBorder(line: string): boolean {
    return BORDER_PATTERN.test(line);
}

function parseBorder(line: string): ColumnSpan[] {
    const spans: ColumnSpan[] = [];
    for (const match of line.matchAll(/=+/g)) {
        const from = match.index ?? 0;
        spans.push({ from, to: from + match[0].length });
    }
    return spans;
}

function sameSpans(a: readonly ColumnSpan[], b: readonly ColumnSpan[]): boolean {
    return a.length === b.length && a.every((span, i) => span.from === b[i].from && span.to === b[i].to);
}

/**
 * Slices one text line into per-column cell text. Text in the gap between two columns is an error;
 * the last column runs to the end of the line.
 */
function sliceColumns(line: string, spans: readonly ColumnSpan[], lineNumber: number): string[] {
    return spans.map((span, i) => {
        const next = spans[i + 1];
        if (next && line.slice(span.to, next.from).trim().length > 0) {
            throw new TableMarkupError(
                `Text in the column margin at line ${lineNumber}: '${line.slice(span.to, next.from).trim()}'`
            );
        }
        return line.slice(span.from, next ? span.to : undefined).trim();
    });
}

function mergeCells(pieces: readonly string[][]): string[] {
    const merged: string[] = [];
    for (const piece of pieces) {
        piece.forEach((text, i) => {
            if (text.length === 0) return;
            merged[i] = merged[i] ? `${merged[i]} ${text}` : text;
        });
    }
    return Array.from({ length: pieces[0]?.length ?? 0 }, (_, i) => merged[i] ?? '');
}

export function parseSimpleTable(lines: readonly string[]): TableData {
    const spans = parseBorder(lines[0]);
    const borders = lines.flatMap((line, i) => (isBorder(line) ? [i] : []));

    if (borders.length !== 3) {
        throw new TableMarkupError(
            `A simple table needs a top border, a header separator and a bottom border; found ${borders.length} border lines`
        );
    }
    if (borders[2] !== lines.length - 1) {
        throw new TableMarkupError('Text after the bottom border of the simple table');
    }
    for (const index of borders) {
        if (!sameSpans(parseBorder(lines[index]), spans)) {
            throw new TableMarkupError(`Border at line ${index + 1} does not match the top border`);
        }
    }

    const headerPieces: string[][] = [];
    for (let i = borders[0] + 1; i < borders[1]; i++) {
        if (lines[i].trim().length === 0) continue;
        headerPieces.push(sliceColumns(lines[i], spans, i + 1));
    }
    if (headerPieces.length === 0) {
        throw new TableMarkupError('The simple table has no header');
    }

    const rowPieces: string[][][] = [];
    for (let i = borders[1] + 1; i < borders[2]; i++) {
        if (lines[i].trim().length === 0) continue;
        const cells = sliceColumns(lines[i], spans, i + 1);
        const current = rowPieces[rowPieces.length - 1];
        if (cells[0].length === 0) {
            if (!current) {
                throw new TableMarkupError(`The first body line ${i + 1} has an empty first column`);
            }
            current.push(cells);
        } else {
            rowPieces.push([cells]);
        }
    }

    return {
        headers: mergeCells(headerPieces),
        rows: rowPieces.map(mergeCells),
    };
}

export const SIMPLE_TABLE_FORMAT: TableFormat = {
    name: 'simple',
    canAccept: (lines) => lines.length > 0 && isBorder(lines[0]) && isBorder(lines[lines.length - 1]),
    parse: parseSimpleTable,
};
