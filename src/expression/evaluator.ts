/**
 * Sandboxed evaluation of cell expressions.
 *
 * An expression sees exactly three kinds of names: the caller's bindings, the parameters of the
 * expression (a Condition cell's column variable) and `BUILTINS`. Every free name is checked when the
 * expression is compiled, so a typo fails at table compile time even inside a branch that never runs.
 */
import { ExpressionEvaluationError, NameResolutionError } from '../errors';
import { BUILTINS, isBuiltin } from './builtins';
import { collectNames, parseExpression, type CompareOperator, type ExpressionNode } from './parser';
import { containerHas, formatValue, isContainer, isTruthy, valuesEqual } from './values';

export type Bindings = Readonly<Record<string, unknown>>;

export interface CompiledExpression {
    readonly source: string;
    evaluate(locals?: Bindings): unknown;
}

function lookup(name: string, locals: Bindings, bindings: Bindings): unknown {
    if (Object.hasOwn(locals, name)) return locals[name];
    if (Object.hasOwn(bindings, name)) return bindings[name];
    if (isBuiltin(name)) return BUILTINS[name];
    throw new NameResolutionError(name);
}

function unsupported(operator: string, left: unknown, right: unknown): ExpressionEvaluationError {
    return new ExpressionEvaluationError(
        `Unsupported operands for ${operator}: ${formatValue(left)} and ${formatValue(right)}`
    );
}

function repeat<T>(items: readonly T[], times: number): T[] {
    const result: T[] = [];
    for (let i = 0; i < times; i++) {
        result.push(...items);
    }
    return result;
}

function arithmetic(operator: string, left: unknown, right: unknown): unknown {
    if (typeof left === 'number' && typeof right === 'number') {
        switch (operator) {
            case '+':
                return left + right;
            case '-':
                return left - right;
            case '*':
                return left * right;
            case '**':
                return left ** right;
        }
        if (right === 0) {
            throw new ExpressionEvaluationError(`Division by zero in ${formatValue(left)} ${operator} 0`);
        }
        switch (operator) {
            case '/':
                return left / right;
            case '//':
                return Math.floor(left / right);
            case '%':
                // Sign follows the divisor.
                return ((left % right) + right) % right;
        }
    }

    if (operator === '+') {
        if (typeof left === 'string' && typeof right === 'string') return left + right;
        if (Array.isArray(left) && Array.isArray(right)) return [...left, ...right];
    }

    if (operator === '*') {
        if (typeof left === 'string' && typeof right === 'number' && Number.isInteger(right)) {
            return left.repeat(Math.max(0, right));
        }
        if (Array.isArray(left) && typeof right === 'number' && Number.isInteger(right)) {
            return repeat(left, right);
        }
        if (typeof left === 'number' && Number.isInteger(left) && Array.isArray(right)) {
            return repeat(right, left);
        }
    }

    throw unsupported(operator, left, right);
}

function compare(operator: CompareOperator, left: unknown, right: unknown): boolean {
    switch (operator) {
        case '==':
            return valuesEqual(left, right);
        case '!=':
            return !valuesEqual(left, right);
        case 'in':
        case 'not in': {
            if (!isContainer(right)) {
                throw unsupported(operator, left, right);
            }
            const found = containerHas(right, left);
            return operator === 'in' ? found : !found;
        }
    }

    if (typeof left === 'number' && typeof right === 'number') return ordered(operator, order(left, right));
    if (typeof left === 'string' && typeof right === 'string') return ordered(operator, order(left, right));
    throw unsupported(operator, left, right);
}

function order(a: number | string, b: number | string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    // NaN is unordered.
    return a === b ? 0 : Number.NaN;
}

function ordered(operator: '<' | '<=' | '>' | '>=', sign: number): boolean {
    switch (operator) {
        case '<':
            return sign < 0;
        case '<=':
            return sign <= 0;
        case '>':
            return sign > 0;
        case '>=':
            return sign >= 0;
    }
}

function index(target: unknown, key: unknown): unknown {
    if (target instanceof Map) {
        for (const [candidate, value] of target) {
            if (valuesEqual(candidate, key)) return value;
        }
        throw new ExpressionEvaluationError(`Key ${formatValue(key)} not found`);
    }
    if ((typeof target === 'string' || Array.isArray(target)) && typeof key === 'number' && Number.isInteger(key)) {
        const i = key < 0 ? target.length + key : key;
        if (i < 0 || i >= target.length) {
            throw new ExpressionEvaluationError(`Index ${key} out of range`);
        }
        return target[i];
    }
    throw new ExpressionEvaluationError(`${formatValue(target)} cannot be indexed by ${formatValue(key)}`);
}

function evaluateNode(node: ExpressionNode, resolve: (name: string) => unknown): unknown {
    const evaluate = (child: ExpressionNode) => evaluateNode(child, resolve);

    switch (node.type) {
        case 'literal':
            return node.value;
        case 'name':
            return resolve(node.name);
        case 'list':
        case 'tuple':
            return node.elements.map(evaluate);
        case 'set':
            return new Set(node.elements.map(evaluate));
        case 'dict':
            return new Map(node.entries.map(({ key, value }) => [evaluate(key), evaluate(value)]));
        case 'unary': {
            const operand = evaluate(node.operand);
            if (node.operator === 'not') return !isTruthy(operand);
            if (typeof operand !== 'number') {
                throw new ExpressionEvaluationError(`Bad operand for unary ${node.operator}: ${formatValue(operand)}`);
            }
            return node.operator === '-' ? -operand : operand;
        }
        case 'binary':
            return arithmetic(node.operator, evaluate(node.left), evaluate(node.right));
        case 'logical': {
            // Short-circuits and yields the deciding operand, not a coerced boolean.
            const left = evaluate(node.left);
            if (node.operator === 'and') return isTruthy(left) ? evaluate(node.right) : left;
            return isTruthy(left) ? left : evaluate(node.right);
        }
        case 'compare': {
            let left = evaluate(node.operands[0]);
            for (let i = 0; i < node.operators.length; i++) {
                const right = evaluate(node.operands[i + 1]);
                if (!compare(node.operators[i], left, right)) return false;
                left = right;
            }
            return true;
        }
        case 'call': {
            const callee = evaluate(node.callee);
            if (typeof callee !== 'function') {
                throw new ExpressionEvaluationError(`${formatValue(callee)} is not callable`);
            }
            const result: unknown = callee(...node.args.map(evaluate));
            return result;
        }
        case 'index':
            return index(evaluate(node.target), evaluate(node.index));
    }
}

/**
 * Parses `source` and checks every free name against `bindings`, `parameters` and the built-ins.
 */
export function compileExpression(
    source: string,
    bindings: Bindings,
    parameters: readonly string[] = []
): CompiledExpression {
    const node = parseExpression(source);

    for (const name of collectNames(node)) {
        if (!parameters.includes(name) && !Object.hasOwn(bindings, name) && !isBuiltin(name)) {
            throw new NameResolutionError(name, `Name '${name}' is not defined in '${source}'`);
        }
    }

    return {
        source,
        evaluate: (locals: Bindings = {}) => evaluateNode(node, (name) => lookup(name, locals, bindings)),
    };
}

export function evaluateExpression(source: string, bindings: Bindings = {}): unknown {
    return compileExpression(source, bindings).evaluate();
}
