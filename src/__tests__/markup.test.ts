import { describe, expect, it } from '@jest/globals';
import { TableMarkupError } from '../errors';
import { parseGridTable } from '../markup/gridTableParsing';
import { splitHeader, splitHeaders } from '../markup/labelDirective';
import { isSeparatorRow, parseMarkdownTable } from '../markup/markdownTableParsing';
import { parseSimpleTable } from '../markup/simpleTableParsing';
import { detectTableFormat } from '../markup/tableFormat';
import { normalizeTableText } from '../markup/textNormalizer';

describe('normalizeTableText', () => {
    it('drops surrounding blank lines and common indentation', () => {
        expect(normalizeTableText('\n\n    === ===\n     A   B\n    === ===\n   \n')).toEqual([
            '=== ===',
            ' A   B',
            '=== ===',
        ]);
    });

    it('uses the smaller indent of the first two lines', () => {
        expect(normalizeTableText('\n   | A |\n  |---|\n   | 1 |')).toEqual([' | A |', '|---|', ' | 1 |']);
    });

    it('never cuts into text indented less than the table', () => {
        expect(normalizeTableText('    a\n    b\n  c')).toEqual(['a', 'b', 'c']);
    });

    it('rejects blank text', () => {
        expect(() => normalizeTableText(' \n\t\n')).toThrow(TableMarkupError);
    });
});

describe('splitHeader', () => {
    it('splits the label from its directive', () => {
        expect(splitHeader('limit (cond)', 0)).toEqual({ label: 'limit', directive: '(cond)' });
        expect(splitHeader('name(re)', 0)).toEqual({ label: 'name', directive: '(re)' });
    });

    it('gives a bare label the empty directive', () => {
        expect(splitHeader('value', 1)).toEqual({ label: 'value', directive: '' });
    });

    it('rejects an empty header', () => {
        expect(() => splitHeader('', 2)).toThrow('Column 3 has no label');
    });

    it('rejects duplicate labels', () => {
        expect(() => splitHeaders(['A', 'B (str)', 'A (cond)'])).toThrow("Duplicate label 'A'");
    });
});

describe('parseSimpleTable', () => {
    it('merges multi-line headers', () => {
        const data = parseSimpleTable(['===== =====', ' key  value', '(str)', '===== =====', 'a     1', '===== =====']);
        expect(data).toEqual({ headers: ['key (str)', 'value'], rows: [['a', '1']] });
    });

    it('rejects text in a column margin', () => {
        expect(() => parseSimpleTable(['=== ===', ' A   B', '=== ===', '12345 6', '=== ==='])).toThrow(
            "Text in the column margin at line 4: '4'"
        );
    });

    it('requires a header separator', () => {
        expect(() => parseSimpleTable(['=== ===', ' 1   2', '=== ==='])).toThrow(TableMarkupError);
    });
});

describe('parseGridTable', () => {
    const lines = ['+---+-----+', '| A | B   |', '+===+=====+', "| 1 | 'x' |", '+---+-----+'];

    it('reads header and body cells', () => {
        expect(parseGridTable(lines)).toEqual({ headers: ['A', 'B'], rows: [['1', "'x'"]] });
    });

    it('requires a header separator', () => {
        expect(() => parseGridTable(['+---+', '| A |', '+---+', '| 1 |', '+---+'])).toThrow(TableMarkupError);
    });
});

describe('parseMarkdownTable', () => {
    it('reads the header and skips the delimiter row', () => {
        expect(parseMarkdownTable(['| A | B (str) |', '|:--|--:|', '| 1 | x |'])).toEqual({
            headers: ['A', 'B (str)'],
            rows: [['1', 'x']],
        });
    });

    it('reads every body line as a row, list markers included', () => {
        expect(parseMarkdownTable(['A | B', '--|--', '* | 1', '- 2 | x'])).toEqual({
            headers: ['A', 'B'],
            rows: [
                ['*', '1'],
                ['- 2', 'x'],
            ],
        });
    });

    it('rejects a blank line inside the table', () => {
        expect(() => parseMarkdownTable(['| A |', '|---|', '| 1 |', '', '| 2 |'])).toThrow(
            'Blank line inside the markdown table at line 4'
        );
    });

    it('rejects a header that does not open a table', () => {
        expect(() => parseMarkdownTable(['A', 'B', 'C'])).toThrow('The text is not a markdown table');
    });

    it('recognizes delimiter rows', () => {
        expect(isSeparatorRow('|:---|---:|')).toBe(true);
        expect(isSeparatorRow('| a | b |')).toBe(false);
    });
});

describe('detectTableFormat', () => {
    it('detects each dialect from its first lines', () => {
        expect(detectTableFormat(['===', ' A', '===', '1', '===']).name).toBe('simple');
        expect(detectTableFormat(['+---+', '| A |', '+---+']).name).toBe('grid');
        expect(detectTableFormat(['| A |', '|---|', '| 1 |']).name).toBe('markdown');
    });

    it('rejects fewer than three lines', () => {
        expect(() => detectTableFormat(['| A |', '|---|'])).toThrow('A table needs at least 3 lines, got 2');
    });
});
