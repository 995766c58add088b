/**
 * Runtime helpers shared by the expression evaluator and the column types:
 * structural equality, membership, truthiness and display formatting.
 */
import { isNotApplicable, isWildcard } from '../tableModel/sentinels';

/**
 * Anything that answers a membership test.
 */
export type Container = readonly unknown[] | ReadonlySet<unknown> | ReadonlyMap<unknown, unknown> | string;

export function isContainer(value: unknown): value is Container {
    return typeof value === 'string' || Array.isArray(value) || value instanceof Set || value instanceof Map;
}

export function valuesEqual(a: unknown, b: unknown): boolean {
    if (a === b) return true;

    if (Array.isArray(a) && Array.isArray(b)) {
        return a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]));
    }

    if (a instanceof Set && b instanceof Set) {
        if (a.size !== b.size) return false;
        for (const item of a) {
            if (!containerHas(b, item)) return false;
        }
        return true;
    }

    if (a instanceof Map && b instanceof Map) {
        if (a.size !== b.size) return false;
        for (const [key, value] of a) {
            if (!b.has(key) || !valuesEqual(value, b.get(key))) return false;
        }
        return true;
    }

    if (a instanceof RegExp && b instanceof RegExp) {
        return a.source === b.source && a.flags === b.flags;
    }

    return false;
}

function isSequence(container: Container): container is readonly unknown[] {
    return Array.isArray(container);
}

function isMapping(container: Container): container is ReadonlyMap<unknown, unknown> {
    return container instanceof Map;
}

export function containerHas(container: Container, item: unknown): boolean {
    if (typeof container === 'string') {
        return typeof item === 'string' && container.includes(item);
    }
    if (isSequence(container)) {
        return container.some((member) => valuesEqual(member, item));
    }
    if (container.has(item)) return true;
    // Maps test their keys.
    const members = isMapping(container) ? container.keys() : container.values();
    for (const member of members) {
        if (valuesEqual(member, item)) return true;
    }
    return false;
}

export function containerSize(container: Container): number {
    if (typeof container === 'string' || isSequence(container)) {
        return container.length;
    }
    return container.size;
}

export function containerItems(container: Container): unknown[] {
    if (typeof container === 'string') return [...container];
    if (isMapping(container)) return [...container.keys()];
    return [...container];
}

export function isTruthy(value: unknown): boolean {
    if (value === null || value === undefined || value === false) return false;
    if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
    if (isContainer(value)) return containerSize(value) > 0;
    return true;
}

/**
 * Renders a value the way it would be written in a table cell.
 */
export function formatValue(value: unknown): string {
    if (isWildcard(value) || isNotApplicable(value)) return value.symbol;
    if (value === null || value === undefined) return 'None';
    if (value === true) return 'True';
    if (value === false) return 'False';
    if (typeof value === 'string') return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
    if (typeof value === 'number') return String(value);
    if (Array.isArray(value)) return `[${value.map(formatValue).join(', ')}]`;
    if (value instanceof Set) return `{${[...value].map(formatValue).join(', ')}}`;
    if (value instanceof Map) {
        const entries = [...value.entries()].map(([k, v]) => `${formatValue(k)}: ${formatValue(v)}`);
        return `{${entries.join(', ')}}`;
    }
    if (value instanceof RegExp) return `/${value.source}/`;
    if (typeof value === 'function') return '<condition>';
    return String(value);
}
