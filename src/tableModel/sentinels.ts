/**
 * The two special cell values usable in every column type except `(string)`.
 *
 * - `Wildcard` (`*` in table text) matches any query value.
 * - `NotApplicable` (`N/A` in table text) matches nothing, and a selected row holding it is an error.
 *
 * Both are frozen singletons compared by identity; code branches on `classifyCell()` rather than
 * on custom equality.
 */

export const WILDCARD_SYMBOL = '*';
export const NOT_APPLICABLE_SYMBOL = 'N/A';

export interface WildcardValue {
    readonly kind: 'wildcard';
    readonly symbol: typeof WILDCARD_SYMBOL;
}

export interface NotApplicableValue {
    readonly kind: 'notApplicable';
    readonly symbol: typeof NOT_APPLICABLE_SYMBOL;
}

export type Sentinel = WildcardValue | NotApplicableValue;

export const Wildcard: WildcardValue = Object.freeze({
    kind: 'wildcard',
    symbol: WILDCARD_SYMBOL,
    toString: () => WILDCARD_SYMBOL,
});

export const NotApplicable: NotApplicableValue = Object.freeze({
    kind: 'notApplicable',
    symbol: NOT_APPLICABLE_SYMBOL,
    toString: () => NOT_APPLICABLE_SYMBOL,
});

export type CellKind = 'wildcard' | 'notApplicable' | 'concrete';

export function classifyCell(value: unknown): CellKind {
    if (value === Wildcard) return 'wildcard';
    if (value === NotApplicable) return 'notApplicable';
    return 'concrete';
}

export function isWildcard(value: unknown): value is WildcardValue {
    return value === Wildcard;
}

export function isNotApplicable(value: unknown): value is NotApplicableValue {
    return value === NotApplicable;
}

export function isSentinel(value: unknown): value is Sentinel {
    return classifyCell(value) !== 'concrete';
}

/**
 * Maps a raw cell text to its sentinel, or `null` when the text is an ordinary expression.
 */
export function parseSentinel(text: string): Sentinel | null {
    if (text === WILDCARD_SYMBOL) return Wildcard;
    if (text === NOT_APPLICABLE_SYMBOL) return NotApplicable;
    return null;
}
