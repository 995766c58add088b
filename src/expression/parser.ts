/**
 * Recursive-descent parser for cell expressions.
 *
 * Grammar (lowest precedence first):
 *   expr       = or
 *   or         = and (('or' | '||') and)*
 *   and        = not (('and' | '&&') not)*
 *   not        = ('not' | '!') not | comparison
 *   comparison = sum (compareOp sum)*          (chained: a < b < c)
 *   sum        = term (('+' | '-') term)*
 *   term       = unary (('*' | '/' | '//' | '%') unary)*
 *   unary      = ('-' | '+') unary | power
 *   power      = postfix ('**' unary)?         (right-associative)
 *   postfix    = primary (call | index)*
 *   primary    = NUMBER | STRING+ | NAME | '(' tuple ')' | '[' list ']' | '{' set-or-dict '}'
 */
import { ExpressionSyntaxError } from '../errors';
import { tokenize, type Operator, type Punctuation, type Token } from './tokenizer';

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '//' | '%' | '**';
export type CompareOperator = '==' | '!=' | '<' | '<=' | '>' | '>=' | 'in' | 'not in';

export type ExpressionNode =
    | { type: 'literal'; value: number | string | boolean | null }
    | { type: 'name'; name: string }
    | { type: 'list'; elements: ExpressionNode[] }
    | { type: 'tuple'; elements: ExpressionNode[] }
    | { type: 'set'; elements: ExpressionNode[] }
    | { type: 'dict'; entries: Array<{ key: ExpressionNode; value: ExpressionNode }> }
    | { type: 'unary'; operator: '-' | '+' | 'not'; operand: ExpressionNode }
    | { type: 'binary'; operator: ArithmeticOperator; left: ExpressionNode; right: ExpressionNode }
    | { type: 'logical'; operator: 'and' | 'or'; left: ExpressionNode; right: ExpressionNode }
    | { type: 'compare'; operators: CompareOperator[]; operands: ExpressionNode[] }
    | { type: 'call'; callee: ExpressionNode; args: ExpressionNode[] }
    | { type: 'index'; target: ExpressionNode; index: ExpressionNode };

const KEYWORD_LITERALS: Record<string, boolean | null> = {
    True: true,
    False: false,
    None: null,
    true: true,
    false: false,
    null: null,
};

const RESERVED = new Set(['and', 'or', 'not', 'in', 'if', 'else', 'lambda']);

function isCompareOperator(value: Operator): value is Operator & CompareOperator {
    return value === '==' || value === '!=' || value === '<' || value === '<=' || value === '>' || value === '>=';
}

class Parser {
    private pos = 0;

    constructor(
        private readonly tokens: Token[],
        private readonly source: string
    ) {}

    parse(): ExpressionNode {
        if (this.tokens.length === 0) {
            throw new ExpressionSyntaxError('Empty expression');
        }
        const node = this.or();
        const rest = this.peek();
        if (rest) {
            throw this.error(`Unexpected token '${String(rest.value)}'`, rest);
        }
        return node;
    }

    private error(message: string, token?: Token): ExpressionSyntaxError {
        const where = token ? ` at column ${token.pos}` : ' at end of expression';
        return new ExpressionSyntaxError(`${message}${where} in '${this.source}'`);
    }

    private peek(offset = 0): Token | undefined {
        return this.tokens[this.pos + offset];
    }

    private eat(): Token {
        const token = this.tokens[this.pos];
        if (!token) throw this.error('Unexpected end of expression');
        this.pos++;
        return token;
    }

    private isOp(value: Operator, token = this.peek()): boolean {
        return token?.type === 'op' && token.value === value;
    }

    private isPunct(value: Punctuation, token = this.peek()): boolean {
        return token?.type === 'punct' && token.value === value;
    }

    private isKeyword(value: string, token = this.peek()): boolean {
        return token?.type === 'ident' && token.value === value;
    }

    private expectPunct(value: Punctuation): void {
        const token = this.peek();
        if (!this.isPunct(value, token)) {
            throw this.error(`Expected '${value}'`, token);
        }
        this.pos++;
    }

    private or(): ExpressionNode {
        let left = this.and();
        while (this.isKeyword('or') || this.isOp('||')) {
            this.eat();
            left = { type: 'logical', operator: 'or', left, right: this.and() };
        }
        return left;
    }

    private and(): ExpressionNode {
        let left = this.not();
        while (this.isKeyword('and') || this.isOp('&&')) {
            this.eat();
            left = { type: 'logical', operator: 'and', left, right: this.not() };
        }
        return left;
    }

    private not(): ExpressionNode {
        if (this.isKeyword('not') || this.isOp('!')) {
            this.eat();
            return { type: 'unary', operator: 'not', operand: this.not() };
        }
        return this.comparison();
    }

    private compareOperator(): CompareOperator | null {
        const token = this.peek();
        if (token?.type === 'op' && isCompareOperator(token.value)) {
            this.pos++;
            return token.value;
        }
        if (this.isKeyword('in')) {
            this.pos++;
            return 'in';
        }
        if (this.isKeyword('not') && this.isKeyword('in', this.peek(1))) {
            this.pos += 2;
            return 'not in';
        }
        return null;
    }

    private comparison(): ExpressionNode {
        const first = this.sum();
        const operators: CompareOperator[] = [];
        const operands: ExpressionNode[] = [first];

        for (let op = this.compareOperator(); op; op = this.compareOperator()) {
            operators.push(op);
            operands.push(this.sum());
        }

        return operators.length === 0 ? first : { type: 'compare', operators, operands };
    }

    private sum(): ExpressionNode {
        let left = this.term();
        while (this.isOp('+') || this.isOp('-')) {
            const operator = this.isOp('+') ? '+' : '-';
            this.eat();
            left = { type: 'binary', operator, left, right: this.term() };
        }
        return left;
    }

    private term(): ExpressionNode {
        let left = this.unary();
        for (;;) {
            const token = this.peek();
            if (token?.type !== 'op') break;
            const operator = token.value;
            if (operator !== '*' && operator !== '/' && operator !== '//' && operator !== '%') break;
            this.eat();
            left = { type: 'binary', operator, left, right: this.unary() };
        }
        return left;
    }

    private unary(): ExpressionNode {
        if (this.isOp('-') || this.isOp('+')) {
            const operator = this.isOp('-') ? '-' : '+';
            this.eat();
            return { type: 'unary', operator, operand: this.unary() };
        }
        return this.power();
    }

    private power(): ExpressionNode {
        const base = this.postfix();
        if (this.isOp('**')) {
            this.eat();
            return { type: 'binary', operator: '**', left: base, right: this.unary() };
        }
        return base;
    }

    private postfix(): ExpressionNode {
        let node = this.primary();
        for (;;) {
            if (this.isPunct('(')) {
                this.eat();
                node = { type: 'call', callee: node, args: this.sequence(')') };
                this.expectPunct(')');
            } else if (this.isPunct('[')) {
                this.eat();
                node = { type: 'index', target: node, index: this.or() };
                this.expectPunct(']');
            } else {
                return node;
            }
        }
    }

    /**
     * Comma-separated expressions up to (not including) `close`; a trailing comma is allowed.
     */
    private sequence(close: Punctuation): ExpressionNode[] {
        const elements: ExpressionNode[] = [];
        while (!this.isPunct(close)) {
            elements.push(this.or());
            if (!this.isPunct(',')) break;
            this.eat();
        }
        return elements;
    }

    private primary(): ExpressionNode {
        const token = this.eat();

        switch (token.type) {
            case 'number':
                return { type: 'literal', value: token.value };
            case 'string': {
                // Adjacent string literals concatenate.
                let value = token.value;
                for (let next = this.peek(); next?.type === 'string'; next = this.peek()) {
                    value += next.value;
                    this.pos++;
                }
                return { type: 'literal', value };
            }
            case 'ident': {
                if (Object.hasOwn(KEYWORD_LITERALS, token.value)) {
                    return { type: 'literal', value: KEYWORD_LITERALS[token.value] };
                }
                if (RESERVED.has(token.value)) {
                    throw this.error(`Unexpected keyword '${token.value}'`, token);
                }
                return { type: 'name', name: token.value };
            }
            case 'punct':
                return this.bracketed(token);
            case 'op':
                throw this.error(`Unexpected operator '${token.value}'`, token);
        }
    }

    private bracketed(open: Token & { type: 'punct' }): ExpressionNode {
        switch (open.value) {
            case '(': {
                if (this.isPunct(')')) {
                    this.eat();
                    return { type: 'tuple', elements: [] };
                }
                const first = this.or();
                if (this.isPunct(')')) {
                    this.eat();
                    return first;
                }
                this.expectPunct(',');
                const elements = [first, ...this.sequence(')')];
                this.expectPunct(')');
                return { type: 'tuple', elements };
            }
            case '[': {
                const elements = this.sequence(']');
                this.expectPunct(']');
                return { type: 'list', elements };
            }
            case '{':
                return this.braced();
            default:
                throw this.error(`Unexpected '${open.value}'`, open);
        }
    }

    private braced(): ExpressionNode {
        if (this.isPunct('}')) {
            this.eat();
            return { type: 'dict', entries: [] };
        }

        const first = this.or();
        if (!this.isPunct(':')) {
            const elements = [first];
            if (this.isPunct(',')) {
                this.eat();
                elements.push(...this.sequence('}'));
            }
            this.expectPunct('}');
            return { type: 'set', elements };
        }

        const entries: Array<{ key: ExpressionNode; value: ExpressionNode }> = [];
        let key = first;
        for (;;) {
            this.expectPunct(':');
            entries.push({ key, value: this.or() });
            if (!this.isPunct(',')) break;
            this.eat();
            if (this.isPunct('}')) break;
            key = this.or();
        }
        this.expectPunct('}');
        return { type: 'dict', entries };
    }
}

export function parseExpression(source: string): ExpressionNode {
    return new Parser(tokenize(source), source).parse();
}

/**
 * Names referenced by `node` that must come from the evaluation scope.
 */
export function collectNames(node: ExpressionNode, names: Set<string> = new Set()): Set<string> {
    switch (node.type) {
        case 'literal':
            break;
        case 'name':
            names.add(node.name);
            break;
        case 'list':
        case 'tuple':
        case 'set':
            node.elements.forEach((element) => collectNames(element, names));
            break;
        case 'dict':
            node.entries.forEach(({ key, value }) => {
                collectNames(key, names);
                collectNames(value, names);
            });
            break;
        case 'unary':
            collectNames(node.operand, names);
            break;
        case 'binary':
        case 'logical':
            collectNames(node.left, names);
            collectNames(node.right, names);
            break;
        case 'compare':
            node.operands.forEach((operand) => collectNames(operand, names));
            break;
        case 'call':
            collectNames(node.callee, names);
            node.args.forEach((arg) => collectNames(arg, names));
            break;
        case 'index':
            collectNames(node.target, names);
            collectNames(node.index, names);
            break;
    }
    return names;
}
