/**
 * The only functions visible to cell expressions besides caller bindings.
 */
import { ExpressionEvaluationError } from '../errors';
import { containerItems, containerSize, formatValue, isContainer, isTruthy } from './values';

export type BuiltinFunction = (...args: unknown[]) => unknown;

function toNumber(name: string, value: unknown): number {
    if (typeof value === 'number') return value;
    if (typeof value === 'boolean') return value ? 1 : 0;
    throw new ExpressionEvaluationError(`${name}() expects a number, got ${formatValue(value)}`);
}

function iterableArgs(name: string, args: unknown[]): unknown[] {
    if (args.length === 1) {
        const [only] = args;
        if (!isContainer(only)) {
            throw new ExpressionEvaluationError(`${name}() expects an iterable, got ${formatValue(only)}`);
        }
        return containerItems(only);
    }
    return args;
}

function extreme(name: string, args: unknown[], pick: (a: number, b: number) => boolean): unknown {
    const items = iterableArgs(name, args);
    if (items.length === 0) {
        throw new ExpressionEvaluationError(`${name}() arg is an empty sequence`);
    }
    return items.reduce((best, item) => (pick(toNumber(name, item), toNumber(name, best)) ? item : best));
}

function toItems(name: string, value: unknown): unknown[] {
    if (value === undefined) return [];
    if (!isContainer(value)) {
        throw new ExpressionEvaluationError(`${name}() expects an iterable, got ${formatValue(value)}`);
    }
    return containerItems(value);
}

export const BUILTINS: Readonly<Record<string, BuiltinFunction>> = {
    str: (value) => (typeof value === 'string' ? value : formatValue(value).replace(/^'(.*)'$/s, '$1')),
    int: (value) => {
        if (typeof value === 'string') {
            if (!/^\s*[+-]?\d+\s*$/.test(value)) {
                throw new ExpressionEvaluationError(`invalid literal for int(): ${formatValue(value)}`);
            }
            return Number.parseInt(value, 10);
        }
        return Math.trunc(toNumber('int', value));
    },
    float: (value) => {
        if (typeof value === 'string') {
            const parsed = Number(value.trim());
            if (value.trim() === '' || Number.isNaN(parsed)) {
                throw new ExpressionEvaluationError(`could not convert string to float: ${formatValue(value)}`);
            }
            return parsed;
        }
        return toNumber('float', value);
    },
    bool: (value) => isTruthy(value),
    len: (value) => {
        if (!isContainer(value)) {
            throw new ExpressionEvaluationError(`len() expects a sized value, got ${formatValue(value)}`);
        }
        return containerSize(value);
    },
    abs: (value) => Math.abs(toNumber('abs', value)),
    min: (...args) => extreme('min', args, (a, b) => a < b),
    max: (...args) => extreme('max', args, (a, b) => a > b),
    round: (value, digits) => {
        const factor = 10 ** (digits === undefined ? 0 : toNumber('round', digits));
        return Math.round(toNumber('round', value) * factor) / factor;
    },
    list: (value) => toItems('list', value),
    tuple: (value) => toItems('tuple', value),
    set: (value) => new Set(toItems('set', value)),
    range: (...args) => {
        if (args.length < 1 || args.length > 3) {
            throw new ExpressionEvaluationError(`range() expects 1 to 3 arguments, got ${args.length}`);
        }
        const numbers = args.map((arg) => toNumber('range', arg));
        const [start, stop, step] = numbers.length === 1 ? [0, numbers[0], 1] : [numbers[0], numbers[1], numbers[2] ?? 1];
        if (step === 0) {
            throw new ExpressionEvaluationError('range() arg 3 must not be zero');
        }
        const result: number[] = [];
        for (let i = start; step > 0 ? i < stop : i > stop; i += step) {
            result.push(i);
        }
        return result;
    },
};

export function isBuiltin(name: string): boolean {
    return Object.hasOwn(BUILTINS, name);
}
