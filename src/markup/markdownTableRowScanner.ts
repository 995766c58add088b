/**
 * Scans a markdown table row and returns indices of pipe delimiters.
 *
 * IMPORTANT: All markdown cell boundary logic MUST use this scanner. Do not split on '|' manually.
 *
 * Handles: escaped pipes (\|).
 *
 * Architecture:
 * 1. Lezer confirms the text is a GFM table block (Table node)
 * 2. This scanner detects cell boundaries
 */

export interface TableRowScanResult {
    readonly delimiters: number[];
}

export function scanMarkdownTableRow(line: string): TableRowScanResult {
    const delimiters: number[] = [];
    let isEscaped = false;

    for (let i = 0; i < line.length; i++) {
        const ch = line[i];

        if (isEscaped) {
            isEscaped = false;
            continue;
        }

        if (ch === '\\') {
            isEscaped = true;
            continue;
        }

        if (ch === '|') {
            delimiters.push(i);
        }
    }

    return { delimiters };
}

/**
 * Splits a row into trimmed cell texts. Leading/trailing pipes are optional; `\|` becomes `|`.
 */
export function splitMarkdownTableRow(line: string): string[] {
    const trimmed = line.trim();
    const { delimiters: allDelimiters } = scanMarkdownTableRow(trimmed);

    // Find boundaries (trim leading/trailing pipe)
    let innerFrom = 0;
    let innerTo = trimmed.length;
    if (allDelimiters.length > 0 && allDelimiters[0] === 0) {
        innerFrom += 1;
    }
    if (allDelimiters.length > 0 && allDelimiters[allDelimiters.length - 1] === trimmed.length - 1) {
        innerTo -= 1;
    }

    const delimiters = allDelimiters.filter((i) => i >= innerFrom && i < innerTo);

    const cells: string[] = [];
    let segmentStart = innerFrom;
    for (const delimiterIndex of delimiters) {
        cells.push(trimmed.slice(segmentStart, delimiterIndex));
        segmentStart = delimiterIndex + 1;
    }
    cells.push(trimmed.slice(segmentStart, Math.max(segmentStart, innerTo)));

    return cells.map((cell) => cell.trim().replace(/\\\|/g, '|'));
}
