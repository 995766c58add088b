/**
 * Raw grid extracted from table text, before any cell is evaluated.
 */
export interface TableData {
    /** One merged header string per column, e.g. `A (cond)`. */
    headers: string[];
    /** Body rows of raw cell text, positionally aligned with `headers`. */
    rows: string[][];
}

export type TableFormatName = 'simple' | 'grid' | 'markdown';

export interface TableFormat {
    readonly name: TableFormatName;
    /** Cheap structural check on normalized lines; `parse()` does the full validation. */
    canAccept(lines: readonly string[]): boolean;
    parse(lines: readonly string[]): TableData;
}
