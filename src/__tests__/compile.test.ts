import { describe, expect, it } from '@jest/globals';
import { compile } from '../compile';
import { NameResolutionError, TableMarkupError, TableValueError } from '../errors';
import { Wildcard } from '../tableModel/sentinels';
import type { Table } from '../tableModel/table';

// Mock the logger to avoid console output during tests
jest.mock('../logger', () => ({
    logger: {
        debug: jest.fn(),
    },
}));

import { logger } from '../logger';
const mockLoggerDebug = jest.mocked(logger.debug);

const SIMPLE = `
    ===== ===== =======
     key  value limit
    (str)       (cond)
    ===== ===== =======
    a     1     l < 5
    b     2 + 3 *
    ===== ===== =======
`;

const GRID = `
    +-----+-------+--------+
    | key | value | limit  |
    |(str)|       | (cond) |
    +=====+=======+========+
    | a   | 1     | l < 5  |
    +-----+-------+--------+
    | b   | 2 + 3 | *      |
    +-----+-------+--------+
`;

const MARKDOWN = `
    | key (str) | value | limit (cond) |
    |-----------|-------|--------------|
    | a         | 1     | l < 5        |
    | b         | 2 + 3 | *            |
`;

describe('compile', () => {
    describe('dialects', () => {
        const tables: Array<[string, Table]> = [
            ['simple', compile(SIMPLE)],
            ['grid', compile(GRID)],
            ['markdown', compile(MARKDOWN)],
        ];

        it.each(tables)('reads the %s table header and directives', (_name, table) => {
            expect(table.labels).toEqual(['key', 'value', 'limit']);
            expect(table.columnTypes.map((type) => type.tag)).toEqual(['string', 'value', 'condition']);
        });

        it.each(tables)('evaluates the %s table cells', (_name, table) => {
            const rows = [...table];
            expect(rows).toHaveLength(2);
            expect(rows[0].slice(0, 2)).toEqual(['a', 1]);
            expect(rows[1]).toEqual(['b', 5, Wildcard]);
        });

        it.each(tables)('answers the same queries from the %s table', (_name, table) => {
            expect(table.select({ limit: 3 })).toEqual(['a', 1, 3]);
            expect(table.select({ limit: 10 })).toEqual(['b', 5, 10]);
        });

        it('validates a forced format', () => {
            expect(() => compile(SIMPLE, {}, { format: 'grid' })).toThrow('The text is not a grid table');
            expect(compile(MARKDOWN, {}, { format: 'markdown' }).labels).toEqual(['key', 'value', 'limit']);
        });
    });

    describe('cells', () => {
        it('evaluates operators', () => {
            const table = compile(`
                === === ========
                 a   b   aplusb
                === === ========
                 1   1   1 + 1
                === === ========
            `);
            expect(table.selectWithLabels({ a: 1, b: 1 }).aplusb).toBe(2);
        });

        it('evaluates variables', () => {
            const table = compile(
                `
                === ===
                 A   B
                === ===
                 1   a
                 2   b
                === ===
            `,
                { a: 1, b: 2 }
            );
            expect(table.selectWithLabels({ A: 1 }).B).toBe(1);
            expect(table.selectWithLabels({ A: 2 }).B).toBe(2);
        });

        it('evaluates built-ins', () => {
            const table = compile(`
                ======
                  A
                ======
                str(1)
                ======
            `);
            expect(table.select({ A: '1' })).toEqual(['1']);
        });

        it.each(['re', 'table', 'process'])('does not leak the name %s', (name) => {
            const text = `
                =======
                   A
                =======
                ${name}
                =======
            `;
            expect(() => compile(text)).toThrow(NameResolutionError);
        });

        it('merges continuation lines of a simple table row', () => {
            const table = compile(`
                ===== =====
                 A     B
                ===== =====
                 1    'x' +
                      'y'
                 2    'z'
                ===== =====
            `);
            expect(table.selectWithLabels({ A: 1 }).B).toBe('xy');
            expect(table.rowCount).toBe(2);
        });

        it('matches regex columns from the start of the query', () => {
            const table = compile(`
                ======== =====
                name(re)  id
                ======== =====
                'ab+c'    1
                r'\\d+'    2
                ======== =====
            `);
            expect(table.select({ name: 'abbc' })).toEqual(['abbc', 1]);
            expect(table.select({ name: '42' })).toEqual(['42', 2]);
            expect(table.contains({ name: 'xyz' })).toBe(false);
        });

        it('rejects collection cells without membership', () => {
            const text = `
                ========
                A (coll)
                ========
                5
                ========
            `;
            expect(() => compile(text)).toThrow(TableValueError);
            expect(() => compile(text)).toThrow("Row 1, column 'A', cell '5'");
        });

        it('unescapes pipes in markdown cells', () => {
            const table = compile(`
                | A (str)  |
                |----------|
                | a \\| b  |
            `);
            expect(table.select({ A: 'a | b' })).toEqual(['a | b']);
        });

        it('reads markdown tables without outer pipes', () => {
            const table = compile(`
                A | B
                --|--
                1 | 2
            `);
            expect(table.select({ A: 1 })).toEqual([1, 2]);
        });
    });

    describe('markdown rows that look like list items', () => {
        it('reads a wildcard first cell without outer pipes', () => {
            const table = compile('A | B\n--|--\n1 | 1\n* | 2');
            expect(table.select({ A: 2 })).toEqual([2, 2]);
            expect([...table][1]).toEqual([Wildcard, 2]);
        });

        it('reads signed numbers without outer pipes', () => {
            const table = compile('A | B\n--|--\n- 1 | 1\n+ 2 | 2');
            expect(table.select({ A: -1 })).toEqual([-1, 1]);
            expect(table.select({ A: 2 })).toEqual([2, 2]);
        });
    });

    describe('markup errors', () => {
        it('names an unknown directive', () => {
            const text = `
                =======
                A (foo)
                =======
                1
                =======
            `;
            expect(() => compile(text)).toThrow(TableMarkupError);
            expect(() => compile(text)).toThrow("Unknown directive '(foo)'");
        });

        it('rejects text in no known format', () => {
            expect(() => compile('hello\nworld\nagain')).toThrow('The table format is unknown.');
        });

        it('rejects tables shorter than three lines', () => {
            expect(() => compile('===\n===')).toThrow(TableMarkupError);
        });

        it('rejects short tables whether the format is detected or forced', () => {
            expect(() => compile('A | B\n--|--')).toThrow('A table needs at least 3 lines, got 2');
            expect(() => compile('A | B\n--|--', {}, { format: 'markdown' })).toThrow(
                'A table needs at least 3 lines, got 2'
            );
        });

        it('rejects blank text', () => {
            expect(() => compile('   \n  ')).toThrow('The table text is empty');
        });

        it('rejects ragged markdown rows', () => {
            const text = `
                | A | B |
                |---|---|
                | 1 |
            `;
            expect(() => compile(text)).toThrow('Row 1 has 1 cells but the table has 2 columns');
        });
    });

    it('logs the detected format', () => {
        mockLoggerDebug.mockClear();
        compile(`
            === ===
             A   B
            === ===
             1   2
            === ===
        `);
        expect(mockLoggerDebug).toHaveBeenCalledWith('Compiled simple table: 2 columns, 1 rows');
    });
});
