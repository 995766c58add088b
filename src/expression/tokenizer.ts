/**
 * Tokenizer for cell expressions.
 *
 * Produces a flat token list; the parser in `parser.ts` is the only consumer.
 * Keywords (`and`, `or`, `not`, `in`, `True`, ...) are emitted as identifiers and resolved by the parser.
 */
import { ExpressionSyntaxError } from '../errors';

export type Punctuation = '(' | ')' | '[' | ']' | '{' | '}' | ',' | ':';

export type Operator =
    | '+'
    | '-'
    | '*'
    | '/'
    | '//'
    | '%'
    | '**'
    | '=='
    | '!='
    | '<'
    | '<='
    | '>'
    | '>='
    | '!'
    | '&&'
    | '||';

export type Token =
    | { type: 'number'; value: number; pos: number }
    | { type: 'string'; value: string; pos: number }
    | { type: 'ident'; value: string; pos: number }
    | { type: 'op'; value: Operator; pos: number }
    | { type: 'punct'; value: Punctuation; pos: number };

// Longest first so '**' wins over '*' and '<=' over '<'.
const OPERATORS: readonly Operator[] = [
    '**',
    '//',
    '==',
    '!=',
    '<=',
    '>=',
    '&&',
    '||',
    '+',
    '-',
    '*',
    '/',
    '%',
    '<',
    '>',
    '!',
];

const PUNCTUATION = '()[]{},:';

const ESCAPES: Record<string, string> = {
    n: '\n',
    t: '\t',
    r: '\r',
    '0': '\0',
    '\\': '\\',
    "'": "'",
    '"': '"',
};

function isPunctuation(ch: string): ch is Punctuation {
    return PUNCTUATION.includes(ch);
}

function readString(expr: string, start: number, raw: boolean): { value: string; end: number } {
    const quote = expr[start];
    let value = '';
    let i = start + 1;

    while (i < expr.length) {
        const ch = expr[i];
        if (ch === quote) {
            return { value, end: i + 1 };
        }
        if (ch === '\\' && i + 1 < expr.length) {
            const next = expr[i + 1];
            if (raw) {
                // Raw strings keep the backslash; it only stops the quote from closing the string.
                value += ch + next;
            } else {
                value += ESCAPES[next] ?? ch + next;
            }
            i += 2;
            continue;
        }
        value += ch;
        i++;
    }

    throw new ExpressionSyntaxError(`Unterminated string starting at column ${start}`);
}

function readNumber(expr: string, start: number): { value: number; end: number } {
    const match = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/.exec(expr.slice(start));
    if (!match) {
        throw new ExpressionSyntaxError(`Invalid number at column ${start}`);
    }
    const text = match[0];
    const value = Number(text);
    // Integers past 2^53 would silently round to a neighbour.
    if (/^\d+$/.test(text) && !Number.isSafeInteger(value)) {
        throw new ExpressionSyntaxError(`Integer literal ${text} at column ${start} is too large`);
    }
    return { value, end: start + text.length };
}

export function tokenize(expr: string): Token[] {
    const tokens: Token[] = [];
    let i = 0;

    while (i < expr.length) {
        const ch = expr[i];

        if (/\s/.test(ch)) {
            i++;
            continue;
        }

        if (/\d/.test(ch) || (ch === '.' && /\d/.test(expr[i + 1] ?? ''))) {
            const { value, end } = readNumber(expr, i);
            tokens.push({ type: 'number', value, pos: i });
            i = end;
            continue;
        }

        if (ch === "'" || ch === '"') {
            const { value, end } = readString(expr, i, false);
            tokens.push({ type: 'string', value, pos: i });
            i = end;
            continue;
        }

        // r'...' raw string prefix
        if ((ch === 'r' || ch === 'R') && (expr[i + 1] === "'" || expr[i + 1] === '"')) {
            const { value, end } = readString(expr, i + 1, true);
            tokens.push({ type: 'string', value, pos: i });
            i = end;
            continue;
        }

        if (/[A-Za-z_]/.test(ch)) {
            let ident = '';
            while (i < expr.length && /[A-Za-z0-9_]/.test(expr[i])) {
                ident += expr[i];
                i++;
            }
            tokens.push({ type: 'ident', value: ident, pos: i - ident.length });
            continue;
        }

        const op = OPERATORS.find((candidate) => expr.startsWith(candidate, i));
        if (op) {
            tokens.push({ type: 'op', value: op, pos: i });
            i += op.length;
            continue;
        }

        if (isPunctuation(ch)) {
            tokens.push({ type: 'punct', value: ch, pos: i });
            i++;
            continue;
        }

        throw new ExpressionSyntaxError(`Unexpected character '${ch}' at column ${i}`);
    }

    return tokens;
}
