import { describe, expect, it } from '@jest/globals';
import { TableLookupError, TableTypeError } from '../errors';
import { ConditionColumn, ValueColumn } from '../tableModel/columnTypes';
import { NotApplicable, Wildcard } from '../tableModel/sentinels';
import { Table } from '../tableModel/table';
import type { CellValue } from '../tableModel/types';

function makeTable(labels: string[], rows: CellValue[][]): Table {
    const table = new Table(labels);
    rows.forEach((row) => table.insert(row));
    return table;
}

describe('Table', () => {
    describe('construction', () => {
        it('keeps labels in order and defaults every column to (value)', () => {
            const table = new Table(['keyA', 'keyB', 'keyC']);
            expect(table.labels).toEqual(['keyA', 'keyB', 'keyC']);
            expect(table.columnTypes).toEqual([ValueColumn, ValueColumn, ValueColumn]);
            expect(table.rowCount).toBe(0);
        });

        it('rejects duplicate labels', () => {
            expect(() => new Table(['A', 'A'])).toThrow(TableTypeError);
        });

        it('rejects rows of the wrong width', () => {
            const table = new Table(['A', 'B']);
            expect(() => table.insert([1])).toThrow('Row width does not match the table: 1 != 2');
        });
    });

    describe('select', () => {
        it('returns the first matching row', () => {
            const table = makeTable(['keyA', 'keyB'], [
                ['value1A', 'value1B'],
                ['value2A', 'value2B'],
            ]);
            expect(table.select({ keyA: 'value1A' })).toEqual(['value1A', 'value1B']);
            expect(table.select({ keyB: 'value2B' })).toEqual(['value2A', 'value2B']);
        });

        it('replaces a matched wildcard with the query value', () => {
            const table = makeTable(['A', 'B'], [
                [1, 1],
                [Wildcard, 2],
            ]);
            expect(table.select({ A: 2 })).toEqual([2, 2]);
        });

        it('keeps wildcards in columns that were not queried', () => {
            const table = makeTable(['A', 'B'], [[1, Wildcard]]);
            expect(table.select({ A: 1 })).toEqual([1, Wildcard]);
        });

        it('fails when the first match holds N/A', () => {
            const table = makeTable(['A', 'B'], [[1, NotApplicable]]);
            expect(() => table.select({ A: 1 })).toThrow(TableLookupError);
            expect(() => table.select({ A: 1 })).toThrow('The result is not applicable: query = {A=1}');
        });

        it('never matches an N/A key cell', () => {
            const table = makeTable(['A', 'B'], [
                [NotApplicable, 1],
                [1, 2],
            ]);
            expect(table.select({ A: 1 })).toEqual([1, 2]);
        });

        it('rejects unknown labels and empty conditions', () => {
            const table = makeTable(['keyA', 'keyB'], [['a', 'b']]);
            expect(() => table.select({ keyC: 1 })).toThrow("The label 'keyC' is invalid");
            expect(() => table.select({})).toThrow(TableLookupError);
        });

        it('fails when nothing matches', () => {
            const table = new Table(['key']);
            expect(() => table.select({ key: 'value' })).toThrow("No row is found for the query: {key='value'}");
        });

        it('returns equal results for repeated queries', () => {
            const table = makeTable(['A', 'B'], [[Wildcard, 3]]);
            expect(table.select({ A: 7 })).toEqual(table.select({ A: 7 }));
        });

        it('keys the result by label with selectWithLabels', () => {
            const table = makeTable(['keyA', 'keyB'], [
                ['value1A', 'value1B'],
                ['value2A', 'value2B'],
            ]);
            expect(table.selectWithLabels({ keyB: 'value2B' })).toEqual({ keyA: 'value2A', keyB: 'value2B' });
        });
    });

    describe('selectAll', () => {
        const table = makeTable(['A', 'B'], [
            [1, NotApplicable],
            [1, 2],
            [Wildcard, 3],
            [2, 4],
        ]);

        it('returns every stored row for an empty condition', () => {
            expect(table.selectAll()).toEqual([
                [1, NotApplicable],
                [1, 2],
                [Wildcard, 3],
                [2, 4],
            ]);
        });

        it('skips N/A rows and resolves wildcards', () => {
            expect(table.selectAll({ A: 1 })).toEqual([
                [1, 2],
                [1, 3],
            ]);
        });

        it('returns an empty list when nothing matches', () => {
            expect(table.selectAll({ B: 9 })).toEqual([]);
        });
    });

    describe('iteration', () => {
        const table = makeTable(['A', 'B'], [
            [1, 2],
            [2, NotApplicable],
            [Wildcard, 0],
        ]);

        it('restarts on every pass', () => {
            const partial = table[Symbol.iterator]();
            partial.next();

            expect([...table]).toEqual([
                [1, 2],
                [2, NotApplicable],
                [Wildcard, 0],
            ]);
            expect([...table]).toEqual([...table]);
        });

        it('lists only applicable rows through applicableRows', () => {
            expect([...table.applicableRows()]).toEqual([[1, 2]]);
        });

        it('returns rows by index unless they hold a sentinel', () => {
            expect(table.rowAt(0)).toEqual([1, 2]);
            expect(() => table.rowAt(1)).toThrow('The 1-th row is not applicable.');
            expect(() => table.rowAt(3)).toThrow(TableLookupError);
        });
    });

    describe('contains', () => {
        const table = makeTable(['A', 'B'], [[1, 2]]);

        it('accepts label records', () => {
            expect(table.contains({ A: 1 })).toBe(true);
            expect(table.contains({ A: 2 })).toBe(false);
        });

        it('accepts full-width positional rows', () => {
            expect(table.contains([1, 2])).toBe(true);
            expect(table.contains([1])).toBe(false);
        });

        it('is false for N/A rows', () => {
            const na = makeTable(['A', 'B'], [[1, NotApplicable]]);
            expect(na.contains({ A: 1 })).toBe(false);
        });
    });

    describe('union', () => {
        it('appends the other rows in order', () => {
            const left = makeTable(['A', 'B'], [[1, 2]]);
            const right = makeTable(['A', 'B'], [
                [3, 4],
                [5, 6],
            ]);
            const union = left.union(right);
            expect(union.labels).toEqual(['A', 'B']);
            expect([...union]).toEqual([
                [1, 2],
                [3, 4],
                [5, 6],
            ]);
        });

        it('names a width mismatch', () => {
            const left = new Table(['A', 'B']);
            const right = new Table(['A', 'B', 'C']);
            expect(() => left.union(right)).toThrow(TableTypeError);
            expect(() => left.union(right)).toThrow('Table widths differ: 2 != 3');
        });

        it('names a label mismatch', () => {
            expect(() => new Table(['A', 'B']).union(new Table(['A', 'C']))).toThrow(
                'Table labels differ: [A, B] != [A, C]'
            );
        });

        it('names a column type mismatch', () => {
            const left = new Table(['A'], [ValueColumn]);
            const right = new Table(['A'], [ConditionColumn]);
            expect(() => left.union(right)).toThrow('Table column types differ: [(value)] != [(condition)]');
        });
    });

    it('renders as tab-separated text', () => {
        const table = makeTable(['A', 'B'], [
            [1, 'x'],
            [Wildcard, NotApplicable],
        ]);
        expect(table.toString()).toBe("A\tB\n(value)\t(value)\n1\t'x'\n*\tN/A");
    });
});
