import { TableMarkupError } from '../errors';

export interface ColumnHeader {
    label: string;
    directive: string;
}

// `name (directive)`; the directive may also come from a merged header sub-line.
const HEADER_PATTERN = /^([A-Za-z_][A-Za-z0-9_]*)\s*(\([A-Za-z0-9_]*\))$/;

/**
 * Splits a merged header cell into its label and its directive (empty when there is none).
 */
export function splitHeader(header: string, column: number): ColumnHeader {
    const text = header.trim();
    if (text.length === 0) {
        throw new TableMarkupError(`Column ${column + 1} has no label`);
    }

    const match = HEADER_PATTERN.exec(text);
    if (match) {
        return { label: match[1], directive: match[2] };
    }
    return { label: text, directive: '' };
}

export function splitHeaders(headers: readonly string[]): ColumnHeader[] {
    const result = headers.map(splitHeader);

    const seen = new Set<string>();
    for (const { label } of result) {
        if (seen.has(label)) {
            throw new TableMarkupError(`Duplicate label '${label}'`);
        }
        seen.add(label);
    }
    return result;
}
