/**
 * Shared types for compiled tables.
 */
import type { Sentinel } from './sentinels';

/**
 * A compiled cell: literal data, a Condition predicate, a compiled Regex, a collection, or a sentinel.
 * Cells hold whatever the caller's bindings produce, so the concrete part stays `unknown`.
 */
export type CellValue = Sentinel | unknown;

/**
 * A Condition cell after compilation.
 */
export type CellPredicate = (value: unknown) => boolean;

/**
 * One table row, positionally aligned with the table's labels.
 */
export type Row = readonly CellValue[];

/**
 * Label -> query value. For `select` it must name at least one column.
 */
export type QueryCondition = Readonly<Record<string, unknown>>;

/**
 * A row keyed by label, as returned by `Table.selectWithLabels()`.
 */
export type LabeledRow = Readonly<Record<string, CellValue>>;
