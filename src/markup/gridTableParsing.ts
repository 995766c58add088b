/**
 * reStructuredText grid tables.
 *
 *     +-------+-------+
 *     |  key  | value |
 *     | (str) |       |
 *     +=======+=======+
 *     | 'a'   | 1     |
 *     +-------+-------+
 *
 * Column boundaries are the `+` positions of the top border. Spanning cells are not supported.
 */
import { TableMarkupError } from '../errors';
import type { TableData, TableFormat } from './types';

const BORDER_PATTERN = /^ *\+[-+]*-\+ *$/;
const SEPARATOR_PATTERN = /^\+(?:-+\+)+$|^\+(?:=+\+)+$/;

function plusPositions(line: string): number[] {
    const positions: number[] = [];
    for (let i = 0; i < line.length; i++) {
        if (line[i] === '+') positions.push(i);
    }
    return positions;
}

function samePositions(a: readonly number[], b: readonly number[]): boolean {
    return a.length === b.length && a.every((position, i) => position === b[i]);
}

function sliceCells(line: string, boundaries: readonly number[], lineNumber: number): string[] {
    const framed = boundaries.every((position) => line[position] === '|');
    if (!framed || line.length !== boundaries[boundaries.length - 1] + 1) {
        throw new TableMarkupError(
            `Malformed grid table line ${lineNumber}: every column boundary needs a '|' (spanning cells are not supported)`
        );
    }
    return boundaries.slice(1).map((to, i) => line.slice(boundaries[i] + 1, to).trim());
}

function mergeLines(pieces: readonly string[][], width: number): string[] {
    return Array.from({ length: width }, (_, column) =>
        pieces
            .map((cells) => cells[column])
            .filter((text) => text.length > 0)
            .join(' ')
    );
}

export function parseGridTable(lines: readonly string[]): TableData {
    const boundaries = plusPositions(lines[0]);
    const width = boundaries.length - 1;

    const headerPieces: string[][] = [];
    const rows: string[][] = [];
    let current: string[][] = [];
    let inHeader = true;

    for (let i = 1; i < lines.length; i++) {
        const line = lines[i];

        if (!SEPARATOR_PATTERN.test(line)) {
            current.push(sliceCells(line, boundaries, i + 1));
            continue;
        }

        if (!samePositions(plusPositions(line), boundaries)) {
            throw new TableMarkupError(`Separator at line ${i + 1} does not match the top border`);
        }
        if (current.length === 0) {
            throw new TableMarkupError(`Empty row before line ${i + 1}`);
        }

        const isHeaderSeparator = line.includes('=');
        if (isHeaderSeparator && !inHeader) {
            throw new TableMarkupError(`Second header separator at line ${i + 1}`);
        }

        if (inHeader) {
            headerPieces.push(...current);
        } else {
            rows.push(mergeLines(current, width));
        }
        current = [];
        if (isHeaderSeparator) inHeader = false;
    }

    if (current.length > 0) {
        throw new TableMarkupError('The grid table does not end with a border');
    }
    if (inHeader) {
        throw new TableMarkupError("The grid table has no header separator ('+===+')");
    }

    return { headers: mergeLines(headerPieces, width), rows };
}

export const GRID_TABLE_FORMAT: TableFormat = {
    name: 'grid',
    canAccept: (lines) =>
        lines.length > 0 && BORDER_PATTERN.test(lines[0]) && BORDER_PATTERN.test(lines[lines.length - 1]),
    parse: parseGridTable,
};
