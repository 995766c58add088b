/**
 * Parses GFM markdown tables into TableData.
 *
 *     | key (str) | value |
 *     |-----------|-------|
 *     | a         | 1     |
 *
 * The Lezer markdown parser (GFM extension) decides whether the header and delimiter rows open a
 * table block; `splitMarkdownTableRow()` then extracts the cells of every line. Alignment markers
 * are accepted and ignored.
 */
import type { SyntaxNode } from '@lezer/common';
import { GFM, parser as markdownParser } from '@lezer/markdown';
import { TableMarkupError } from '../errors';
import { splitMarkdownTableRow } from './markdownTableRowScanner';
import type { TableData, TableFormat } from './types';

const gfmParser = markdownParser.configure(GFM);

/**
 * Check if a line is a valid separator row (contains only dashes, colons, pipes, spaces)
 */
export function isSeparatorRow(line: string): boolean {
    const trimmed = line.trim();
    // Must have at least one dash
    if (!trimmed.includes('-')) return false;
    // Should only contain valid separator characters
    return /^[\s|:-]+$/.test(trimmed);
}

function findTableNode(text: string): SyntaxNode | null {
    const top = gfmParser.parse(text).topNode;
    const first = top.firstChild;
    return first && first.name === 'Table' ? first : null;
}

export function parseMarkdownTable(lines: readonly string[]): TableData {
    // Only the header and delimiter rows go through Lezer: a body line without outer pipes that
    // starts with `*`, `-` or `+` would otherwise open a list and end the table block.
    const head = lines.slice(0, 2).join('\n');
    const table = findTableNode(head);
    if (!table || table.from !== 0 || head.slice(table.to).trim().length > 0) {
        throw new TableMarkupError('The text is not a markdown table');
    }

    const body = lines.slice(2);
    const blank = body.findIndex((line) => line.trim().length === 0);
    if (blank >= 0) {
        throw new TableMarkupError(`Blank line inside the markdown table at line ${blank + 3}`);
    }

    return {
        headers: splitMarkdownTableRow(lines[0]),
        rows: body.map(splitMarkdownTableRow),
    };
}

export const MARKDOWN_TABLE_FORMAT: TableFormat = {
    name: 'markdown',
    canAccept: (lines) => lines.length >= 2 && lines[0].includes('|') && isSeparatorRow(lines[1]),
    parse: parseMarkdownTable,
};
