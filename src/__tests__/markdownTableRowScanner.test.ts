import { describe, expect, it } from '@jest/globals';
import { scanMarkdownTableRow, splitMarkdownTableRow } from '../markup/markdownTableRowScanner';

describe('scanMarkdownTableRow', () => {
    it('returns all unescaped pipe indices', () => {
        expect(scanMarkdownTableRow('| a | b |').delimiters).toEqual([0, 4, 8]);
    });

    it('skips escaped pipes', () => {
        expect(scanMarkdownTableRow('| a \\| b | c |').delimiters).toEqual([0, 9, 13]);
    });

    it('treats a backslash before any character as an escape', () => {
        expect(scanMarkdownTableRow('| \\d+ | 1 |').delimiters).toEqual([0, 6, 10]);
    });
});

describe('splitMarkdownTableRow', () => {
    it('strips the outer pipes and trims cells', () => {
        expect(splitMarkdownTableRow('| key (str) |  value | limit (cond) |')).toEqual([
            'key (str)',
            'value',
            'limit (cond)',
        ]);
    });

    it('accepts rows without outer pipes', () => {
        expect(splitMarkdownTableRow('1 + 1 | 2')).toEqual(['1 + 1', '2']);
    });

    it('unescapes pipes inside cells', () => {
        expect(splitMarkdownTableRow("| 'a \\| b' | 1 |")).toEqual(["'a | b'", '1']);
    });

    it('keeps empty cells', () => {
        expect(splitMarkdownTableRow('| a |  | c |')).toEqual(['a', '', 'c']);
    });
});
