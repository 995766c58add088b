/**
 * Column-type algebra for `Table.join()`.
 *
 * Each pair of (left, right) column types sharing a label yields a combinator that intersects one left
 * cell with one right cell. Dispatch is a closed 2x2 table on whether each side is a scalar or a set type.
 */
import { ConditionColumn, isCellPredicate, type ColumnType } from './columnTypes';
import { TableTypeError } from '../errors';
import { classifyCell, NotApplicable } from './sentinels';
import type { CellPredicate, CellValue } from './types';

export type Intersection = { readonly compatible: true; readonly value: CellValue } | { readonly compatible: false };

export type JoinCase = 'valueValue' | 'valueSet' | 'setValue' | 'setSet' | 'leftOnly' | 'rightOnly';

export interface JoinCombinator {
    readonly joinCase: JoinCase;
    /** Column type of the joined table at this label. */
    readonly resultType: ColumnType;
    intersect(left: CellValue, right: CellValue): Intersection;
}

/**
 * Stand-in for a label one side of the join does not have. Every row of that side reads as Wildcard there.
 */
export interface AbsentColumnType {
    readonly tag: 'absent';
}

export const AbsentColumn: AbsentColumnType = Object.freeze({ tag: 'absent' });

export type JoinColumnType = ColumnType | AbsentColumnType;

const INCOMPATIBLE: Intersection = Object.freeze({ compatible: false });

function compatible(value: CellValue): Intersection {
    return { compatible: true, value };
}

function isAbsent(type: JoinColumnType): type is AbsentColumnType {
    return type.tag === 'absent';
}

/**
 * A set cell as a predicate, so it can live in a column that is matched by calling the cell.
 */
function asPredicate(type: ColumnType, value: CellValue): CellPredicate {
    return isCellPredicate(value) ? value : (query) => type.match(value, query);
}

type Lift = (value: CellValue) => CellValue;

const identity: Lift = (value) => value;

/**
 * Shared sentinel rules, applied before any type-specific rule:
 * Wildcard is the identity, N/A meets only N/A. Returns `null` when both cells are concrete.
 */
function intersectSentinels(
    left: CellValue,
    right: CellValue,
    liftLeft: Lift = identity,
    liftRight: Lift = identity
): Intersection | null {
    const leftKind = classifyCell(left);
    const rightKind = classifyCell(right);

    if (leftKind === 'wildcard') {
        return compatible(rightKind === 'concrete' ? liftRight(right) : right);
    }
    if (rightKind === 'wildcard') {
        return compatible(leftKind === 'concrete' ? liftLeft(left) : left);
    }
    if (leftKind === 'notApplicable' && rightKind === 'notApplicable') {
        return compatible(NotApplicable);
    }
    if (leftKind === 'notApplicable' || rightKind === 'notApplicable') {
        return INCOMPATIBLE;
    }
    return null;
}

/**
 * Result type for a scalar column that met a set column: concrete cells compare like `scalar`,
 * predicate cells (a set cell that met a Wildcard) are called.
 */
function mixedResultType(scalar: ColumnType): ColumnType {
    return Object.freeze({
        ...scalar,
        match: (stored: CellValue, query: unknown) =>
            isCellPredicate(stored) ? stored(query) : scalar.match(stored, query),
    });
}

function passthrough(joinCase: 'leftOnly' | 'rightOnly', type: ColumnType): JoinCombinator {
    return {
        joinCase,
        resultType: type,
        intersect: (left, right) => compatible(joinCase === 'leftOnly' ? left : right),
    };
}

const COMBINATORS: Record<
    'valueValue' | 'valueSet' | 'setValue' | 'setSet',
    (left: ColumnType, right: ColumnType) => JoinCombinator
> = {
    valueValue: (left) => ({
        joinCase: 'valueValue',
        resultType: left,
        intersect: (a, b) => intersectSentinels(a, b) ?? (left.match(a, b) ? compatible(a) : INCOMPATIBLE),
    }),
    valueSet: (left, right) => ({
        joinCase: 'valueSet',
        resultType: mixedResultType(left),
        intersect: (a, b) =>
            intersectSentinels(a, b, identity, (value) => asPredicate(right, value)) ??
            (right.match(b, a) ? compatible(a) : INCOMPATIBLE),
    }),
    setValue: (left, right) => ({
        joinCase: 'setValue',
        resultType: mixedResultType(right),
        intersect: (a, b) =>
            intersectSentinels(a, b, (value) => asPredicate(left, value)) ??
            (left.match(a, b) ? compatible(b) : INCOMPATIBLE),
    }),
    setSet: (left, right) => ({
        joinCase: 'setSet',
        resultType: ConditionColumn,
        intersect: (a, b) =>
            intersectSentinels(
                a,
                b,
                (value) => asPredicate(left, value),
                (value) => asPredicate(right, value)
            ) ?? compatible((query: unknown) => left.match(a, query) && right.match(b, query)),
    }),
};

export function combineColumnTypes(left: JoinColumnType, right: JoinColumnType): JoinCombinator {
    if (isAbsent(left)) {
        if (isAbsent(right)) {
            throw new TableTypeError('A joined label must exist on at least one side');
        }
        return passthrough('rightOnly', right);
    }
    if (isAbsent(right)) {
        return passthrough('leftOnly', left);
    }

    const joinCase = `${left.isSet ? 'set' : 'value'}${right.isSet ? 'Set' : 'Value'}` as const;
    return COMBINATORS[joinCase](left, right);
}
