/**
 * The compiled table and its query engine.
 *
 * Labels and column types are fixed at construction. Rows are appended with `insert()` while the table
 * is being built and are frozen on the way in; queries never modify them.
 */
import { TableLookupError, TableTypeError } from '../errors';
import { formatValue } from '../expression/values';
import { ValueColumn, type ColumnType } from './columnTypes';
import { AbsentColumn, combineColumnTypes, type JoinColumnType, type JoinCombinator } from './joinTypes';
import { isNotApplicable, isSentinel, Wildcard } from './sentinels';
import type { CellValue, LabeledRow, QueryCondition, Row } from './types';
import { logger } from '../logger';

type IndexedCondition = ReadonlyArray<{ index: number; label: string; value: unknown }>;

function formatList(items: readonly string[]): string {
    return `[${items.join(', ')}]`;
}

function isPositional(value: QueryCondition | readonly unknown[]): value is readonly unknown[] {
    return Array.isArray(value);
}

function formatCondition(condition: QueryCondition): string {
    const pairs = Object.entries(condition).map(([label, value]) => `${label}=${formatValue(value)}`);
    return `{${pairs.join(', ')}}`;
}

export class Table implements Iterable<Row> {
    private readonly _labels: readonly string[];
    private readonly _columnTypes: readonly ColumnType[];
    private readonly _rows: Row[] = [];

    /**
     * @param columnTypes - One per label; defaults to `(value)` for every column.
     */
    constructor(labels: readonly string[], columnTypes?: readonly ColumnType[]) {
        const duplicate = labels.find((label, i) => labels.indexOf(label) !== i);
        if (duplicate !== undefined) {
            throw new TableTypeError(`Duplicate label '${duplicate}' in ${formatList(labels)}`);
        }
        if (columnTypes && columnTypes.length !== labels.length) {
            throw new TableTypeError(
                `Number of column types does not match number of labels: ${columnTypes.length} != ${labels.length}`
            );
        }

        this._labels = Object.freeze([...labels]);
        this._columnTypes = Object.freeze(columnTypes ? [...columnTypes] : labels.map(() => ValueColumn));
    }

    get labels(): readonly string[] {
        return this._labels;
    }

    get columnTypes(): readonly ColumnType[] {
        return this._columnTypes;
    }

    get columnCount(): number {
        return this._labels.length;
    }

    get rowCount(): number {
        return this._rows.length;
    }

    /**
     * Appends a row. Meant for compile and construction code only.
     */
    insert(row: readonly CellValue[]): void {
        if (row.length !== this.columnCount) {
            throw new TableTypeError(
                `Row width does not match the table: ${row.length} != ${this.columnCount}`
            );
        }
        this._rows.push(Object.freeze([...row]));
    }

    /**
     * Returns the first row matching `condition`, with every queried column replaced by the
     * query value (so a Wildcard cell reads back as the value asked for).
     *
     * @throws TableLookupError - empty condition, unknown label, no matching row, or the first
     *   matching row holds N/A.
     */
    select(condition: QueryCondition): Row {
        const indexed = this.indexCondition(condition);
        if (indexed.length === 0) {
            throw new TableLookupError('The query condition is empty');
        }

        for (const row of this._rows) {
            if (!this.matches(row, indexed)) continue;
            if (row.some(isNotApplicable)) {
                throw new TableLookupError(`The result is not applicable: query = ${formatCondition(condition)}`);
            }
            return this.resolve(row, indexed);
        }

        throw new TableLookupError(`No row is found for the query: ${formatCondition(condition)}`);
    }

    /**
     * Like `select()`, but keyed by label.
     */
    selectWithLabels(condition: QueryCondition): LabeledRow {
        return this.toLabeled(this.select(condition));
    }

    /**
     * Every matching row in table order, resolved as in `select()`. Rows holding N/A are skipped when
     * the condition is non-empty; an empty condition returns every stored row.
     */
    selectAll(condition: QueryCondition = {}): Row[] {
        const indexed = this.indexCondition(condition);
        if (indexed.length === 0) {
            return [...this._rows];
        }

        const result: Row[] = [];
        for (const row of this._rows) {
            if (!this.matches(row, indexed) || row.some(isNotApplicable)) continue;
            result.push(this.resolve(row, indexed));
        }
        return result;
    }

    /**
     * A fresh pass over the stored rows, Wildcard and N/A cells included.
     */
    *[Symbol.iterator](): Iterator<Row> {
        yield* this._rows;
    }

    /**
     * A fresh pass over the rows that hold neither Wildcard nor N/A.
     */
    *applicableRows(): IterableIterator<Row> {
        for (const row of this._rows) {
            if (!row.some(isSentinel)) {
                yield row;
            }
        }
    }

    /**
     * The stored row at `index`.
     *
     * @throws TableLookupError - index out of range, or the row holds Wildcard or N/A.
     */
    rowAt(index: number): Row {
        const row = Number.isInteger(index) ? this._rows[index] : undefined;
        if (!row) {
            throw new TableLookupError(`Row index ${index} is out of range (${this.rowCount} rows)`);
        }
        if (row.some(isSentinel)) {
            throw new TableLookupError(`The ${index}-th row is not applicable.`);
        }
        return row;
    }

    /**
     * True when `value` (a label->value record, or a full-width positional row) can be selected.
     */
    contains(value: QueryCondition | readonly unknown[]): boolean {
        let condition: QueryCondition;
        if (isPositional(value)) {
            if (value.length !== this.columnCount) return false;
            condition = Object.fromEntries(this._labels.map((label, i) => [label, value[i]]));
        } else {
            condition = value;
        }

        try {
            this.select(condition);
            return true;
        } catch (error) {
            if (error instanceof TableLookupError) return false;
            throw error;
        }
    }

    /**
     * Rows of this table followed by rows of `other`. Both must have the same labels and column types.
     */
    union(other: Table): Table {
        if (this.columnCount !== other.columnCount) {
            throw new TableTypeError(`Table widths differ: ${this.columnCount} != ${other.columnCount}`);
        }
        if (this._labels.some((label, i) => label !== other._labels[i])) {
            throw new TableTypeError(
                `Table labels differ: ${formatList(this._labels)} != ${formatList(other._labels)}`
            );
        }
        const directives = (table: Table) => table._columnTypes.map((type) => type.directive);
        if (this._columnTypes.some((type, i) => type.tag !== other._columnTypes[i].tag)) {
            throw new TableTypeError(
                `Table column types differ: ${formatList(directives(this))} != ${formatList(directives(other))}`
            );
        }

        const table = new Table(this._labels, this._columnTypes);
        for (const row of [...this._rows, ...other._rows]) {
            table.insert(row);
        }
        return table;
    }

    /**
     * Natural join over the union of both label sets. A label missing on one side reads as Wildcard there;
     * shared labels are intersected cell by cell according to both column types.
     */
    join(other: Table): Table {
        const labels = [...this._labels, ...other._labels.filter((label) => !this._labels.includes(label))];
        const positions = labels.map((label) => ({
            left: this._labels.indexOf(label),
            right: other._labels.indexOf(label),
        }));

        const sideType = (table: Table, index: number): JoinColumnType =>
            index >= 0 ? table._columnTypes[index] : AbsentColumn;
        const combinators = positions.map(({ left, right }) =>
            combineColumnTypes(sideType(this, left), sideType(other, right))
        );

        const table = new Table(
            labels,
            combinators.map((combinator) => combinator.resultType)
        );

        let dropped = 0;
        for (const leftRow of this._rows) {
            for (const rightRow of other._rows) {
                const joined = this.joinRows(leftRow, rightRow, positions, combinators);
                if (joined) {
                    table.insert(joined);
                } else {
                    dropped++;
                }
            }
        }

        logger.debug(`Joined ${this.rowCount}x${other.rowCount} rows into ${table.rowCount}; ${dropped} pairs dropped`);
        return table;
    }

    /**
     * Tab-separated text: labels, directives, then one line per row.
     */
    toString(): string {
        const lines = [
            this._labels.join('\t'),
            this._columnTypes.map((type) => type.directive).join('\t'),
            ...this._rows.map((row) => row.map(formatValue).join('\t')),
        ];
        return lines.join('\n');
    }

    private joinRows(
        leftRow: Row,
        rightRow: Row,
        positions: ReadonlyArray<{ left: number; right: number }>,
        combinators: readonly JoinCombinator[]
    ): CellValue[] | null {
        const joined: CellValue[] = [];
        for (let i = 0; i < positions.length; i++) {
            const { left, right } = positions[i];
            const intersection = combinators[i].intersect(
                left >= 0 ? leftRow[left] : Wildcard,
                right >= 0 ? rightRow[right] : Wildcard
            );
            if (!intersection.compatible) return null;
            joined.push(intersection.value);
        }
        return joined;
    }

    private indexCondition(condition: QueryCondition): IndexedCondition {
        return Object.entries(condition).map(([label, value]) => {
            const index = this._labels.indexOf(label);
            if (index < 0) {
                throw new TableLookupError(`The label '${label}' is invalid`);
            }
            return { index, label, value };
        });
    }

    private matches(row: Row, condition: IndexedCondition): boolean {
        return condition.every(({ index, value }) => this._columnTypes[index].match(row[index], value));
    }

    private resolve(row: Row, condition: IndexedCondition): Row {
        const resolved = [...row];
        for (const { index, value } of condition) {
            resolved[index] = value;
        }
        return Object.freeze(resolved);
    }

    private toLabeled(row: Row): LabeledRow {
        return Object.fromEntries(this._labels.map((label, i) => [label, row[i]]));
    }
}
