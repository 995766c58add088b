/**
 * Column types: how a raw cell is compiled and how a stored cell is matched against a query value.
 *
 * The set is closed. A header directive such as `(cond)` selects one of them through
 * `resolveColumnType()`; a header without a directive gets `ValueColumn`.
 */
import { TableMarkupError, TableValueError } from '../errors';
import { compileExpression, evaluateExpression, type Bindings } from '../expression/evaluator';
import { containerHas, formatValue, isContainer, isTruthy, valuesEqual } from '../expression/values';
import { classifyCell, parseSentinel } from './sentinels';
import type { CellPredicate, CellValue } from './types';

export type ColumnTag = 'value' | 'condition' | 'string' | 'regex' | 'collection';

export interface ColumnType {
    readonly tag: ColumnTag;
    /** Canonical directive, e.g. `(cond)` resolves to the type whose directive is `(condition)`. */
    readonly directive: string;
    /** Every directive token that selects this type. */
    readonly directives: readonly string[];
    /**
     * Set types (Condition, Regex, Collection) store a cell that stands for many acceptable values;
     * scalar types (Value, String) store one value compared by equality.
     */
    readonly isSet: boolean;
    evaluate(text: string, bindings: Bindings, label: string): CellValue;
    /** Wildcard always matches, NotApplicable never does; otherwise the type decides. */
    match(stored: CellValue, query: unknown): boolean;
}

interface ColumnTypeDefinition {
    tag: ColumnTag;
    directives: readonly string[];
    isSet: boolean;
    evaluate(text: string, bindings: Bindings, label: string): CellValue;
    matchConcrete(stored: unknown, query: unknown): boolean;
}

function defineColumnType(definition: ColumnTypeDefinition): ColumnType {
    const { tag, directives, isSet, evaluate, matchConcrete } = definition;
    return Object.freeze({
        tag,
        directive: directives[0],
        directives,
        isSet,
        evaluate,
        match: (stored: CellValue, query: unknown): boolean => {
            switch (classifyCell(stored)) {
                case 'wildcard':
                    return true;
                case 'notApplicable':
                    return false;
                case 'concrete':
                    return matchConcrete(stored, query);
            }
        },
    });
}

export function isCellPredicate(value: unknown): value is CellPredicate {
    return typeof value === 'function';
}

export const ValueColumn = defineColumnType({
    tag: 'value',
    directives: ['(value)', '(val)', ''],
    isSet: false,
    evaluate: (text, bindings) => parseSentinel(text) ?? evaluateExpression(text, bindings),
    matchConcrete: valuesEqual,
});

/**
 * The cell is a boolean expression over one variable named by the first letter of the column label:
 * under label `age`, `a < 0` becomes `(a) => a < 0`.
 */
export const ConditionColumn = defineColumnType({
    tag: 'condition',
    directives: ['(condition)', '(cond)'],
    isSet: true,
    evaluate: (text, bindings, label) => {
        const sentinel = parseSentinel(text);
        if (sentinel) return sentinel;

        const parameter = label[0];
        const expression = compileExpression(text, bindings, [parameter]);
        const predicate: CellPredicate = (value) => isTruthy(expression.evaluate({ [parameter]: value }));
        return predicate;
    },
    matchConcrete: (stored, query) => isCellPredicate(stored) && stored(query),
});

/**
 * Cells are taken verbatim, so `*` and `N/A` are plain text here.
 */
export const StringColumn = defineColumnType({
    tag: 'string',
    directives: ['(string)', '(str)'],
    isSet: false,
    evaluate: (text) => text,
    matchConcrete: valuesEqual,
});

/**
 * The cell is an expression producing the pattern source (so quoting and escapes work).
 * Matching is anchored at the start of the query string.
 */
export const RegexColumn = defineColumnType({
    tag: 'regex',
    directives: ['(regex)', '(re)'],
    isSet: true,
    evaluate: (text, bindings, label) => {
        const sentinel = parseSentinel(text);
        if (sentinel) return sentinel;

        const source = evaluateExpression(text, bindings);
        const pattern = source instanceof RegExp ? source.source : source;
        if (typeof pattern !== 'string') {
            throw new TableValueError(`Regex cell in column '${label}' must be a string, got ${formatValue(source)}`);
        }
        try {
            return new RegExp(pattern, 'y');
        } catch (error) {
            throw new TableValueError(`Invalid regular expression ${formatValue(pattern)} in column '${label}'`, {
                cause: error,
            });
        }
    },
    matchConcrete: (stored, query) => {
        if (!(stored instanceof RegExp) || typeof query !== 'string') return false;
        stored.lastIndex = 0;
        return stored.test(query);
    },
});

export const CollectionColumn = defineColumnType({
    tag: 'collection',
    directives: ['(collection)', '(coll)'],
    isSet: true,
    evaluate: (text, bindings, label) => {
        const sentinel = parseSentinel(text);
        if (sentinel) return sentinel;

        const value = evaluateExpression(text, bindings);
        if (!isContainer(value)) {
            throw new TableValueError(
                `Collection cell in column '${label}' does not support membership testing: ${formatValue(value)}`
            );
        }
        return value;
    },
    matchConcrete: (stored, query) => isContainer(stored) && containerHas(stored, query),
});

/**
 * Resolution order; the first type listing the directive wins.
 */
export const COLUMN_TYPES: readonly ColumnType[] = [
    ValueColumn,
    ConditionColumn,
    StringColumn,
    RegexColumn,
    CollectionColumn,
];

export function resolveColumnType(directive: string): ColumnType {
    const type = COLUMN_TYPES.find((candidate) => candidate.directives.includes(directive));
    if (!type) {
        throw new TableMarkupError(`Unknown directive '${directive}'`);
    }
    return type;
}
