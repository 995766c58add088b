/**
 * Table compiler: raw text -> normalized lines -> raw grid -> typed rows.
 */
import { resolveCompileOptions, type CompileOptions } from './config';
import { InlineTableError, TableMarkupError, withContext } from './errors';
import type { Bindings } from './expression/evaluator';
import { logger } from './logger';
import { splitHeaders } from './markup/labelDirective';
import { resolveTableFormat } from './markup/tableFormat';
import { normalizeTableText } from './markup/textNormalizer';
import { resolveColumnType } from './tableModel/columnTypes';
import { Table } from './tableModel/table';
import type { CellValue } from './tableModel/types';

/**
 * Compiles a table written as a reStructuredText simple or grid table, or a markdown table.
 *
 * Cells are evaluated once, here, with `variables` as the only names visible besides the built-ins.
 *
 * @example
 * ```ts
 * const transitions = compile(`
 *     ====== ======= ======
 *     state  event   next
 *     ====== ======= ======
 *     'stop' 'accel' 'run'
 *     'run'  'brake' 'stop'
 *     ====== ======= ======
 * `);
 * transitions.selectWithLabels({ state: 'stop', event: 'accel' }).next; // 'run'
 * ```
 *
 * @throws TableMarkupError - the text is not a supported table, or a directive is unknown
 * @throws NameResolutionError - a cell references a name missing from `variables`
 */
export function compile(text: string, variables: Bindings = {}, options: CompileOptions = {}): Table {
    const { format: formatName } = resolveCompileOptions(options);

    const lines = normalizeTableText(text);
    const format = resolveTableFormat(lines, formatName);

    const { headers, rows } = format.parse(lines);
    const columns = splitHeaders(headers);
    const columnTypes = columns.map(({ directive }) => resolveColumnType(directive));
    const table = new Table(columns.map(({ label }) => label), columnTypes);

    rows.forEach((cells, rowIndex) => {
        if (cells.length !== columns.length) {
            throw new TableMarkupError(
                `Row ${rowIndex + 1} has ${cells.length} cells but the table has ${columns.length} columns`
            );
        }

        const row: CellValue[] = cells.map((cell, i) => {
            const { label } = columns[i];
            try {
                return columnTypes[i].evaluate(cell, variables, label);
            } catch (error) {
                if (error instanceof InlineTableError) {
                    throw withContext(error, `Row ${rowIndex + 1}, column '${label}', cell '${cell}'`);
                }
                throw error;
            }
        });
        table.insert(row);
    });

    logger.debug(`Compiled ${format.name} table: ${table.columnCount} columns, ${table.rowCount} rows`);
    return table;
}
