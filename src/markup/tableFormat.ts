/**
 * Dialect detection. Formats are tried in a fixed order; the first that accepts the lines parses them.
 */
import { TableMarkupError } from '../errors';
import { GRID_TABLE_FORMAT } from './gridTableParsing';
import { MARKDOWN_TABLE_FORMAT } from './markdownTableParsing';
import { SIMPLE_TABLE_FORMAT } from './simpleTableParsing';
import type { TableFormat, TableFormatName } from './types';

export const TABLE_FORMATS: readonly TableFormat[] = [SIMPLE_TABLE_FORMAT, GRID_TABLE_FORMAT, MARKDOWN_TABLE_FORMAT];

const MIN_TABLE_LINES = 3;

export function getTableFormat(name: TableFormatName): TableFormat {
    const format = TABLE_FORMATS.find((candidate) => candidate.name === name);
    if (!format) {
        throw new TableMarkupError(`Unknown table format '${name}'`);
    }
    return format;
}

function checkTableLength(lines: readonly string[]): void {
    if (lines.length < MIN_TABLE_LINES) {
        throw new TableMarkupError(`A table needs at least ${MIN_TABLE_LINES} lines, got ${lines.length}`);
    }
}

export function detectTableFormat(lines: readonly string[]): TableFormat {
    checkTableLength(lines);
    const format = TABLE_FORMATS.find((candidate) => candidate.canAccept(lines));
    if (!format) {
        throw new TableMarkupError('The table format is unknown.');
    }
    return format;
}

/**
 * Detects the format, or checks that the lines fit the one asked for.
 */
export function resolveTableFormat(lines: readonly string[], name: 'auto' | TableFormatName): TableFormat {
    if (name === 'auto') {
        return detectTableFormat(lines);
    }
    checkTableLength(lines);
    const format = getTableFormat(name);
    if (!format.canAccept(lines)) {
        throw new TableMarkupError(`The text is not a ${format.name} table`);
    }
    return format;
}
