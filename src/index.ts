export { compile } from './compile';
export { DEFAULT_COMPILE_OPTIONS, resolveCompileOptions, type CompileOptions } from './config';
export {
    ExpressionEvaluationError,
    ExpressionSyntaxError,
    InlineTableError,
    NameResolutionError,
    TableLookupError,
    TableMarkupError,
    TableTypeError,
    TableValueError,
} from './errors';
export { compileExpression, evaluateExpression, type Bindings, type CompiledExpression } from './expression/evaluator';
export { formatValue } from './expression/values';
export { getLogLevel, setLogLevel, type LogLevel } from './logger';
export type { TableData, TableFormatName } from './markup/types';
export { detectTableFormat, resolveTableFormat } from './markup/tableFormat';
export { normalizeTableText } from './markup/textNormalizer';
export {
    COLUMN_TYPES,
    CollectionColumn,
    ConditionColumn,
    RegexColumn,
    StringColumn,
    ValueColumn,
    resolveColumnType,
    type ColumnTag,
    type ColumnType,
} from './tableModel/columnTypes';
export { combineColumnTypes, type Intersection, type JoinCase, type JoinCombinator } from './tableModel/joinTypes';
export {
    NOT_APPLICABLE_SYMBOL,
    NotApplicable,
    WILDCARD_SYMBOL,
    Wildcard,
    classifyCell,
    isNotApplicable,
    isWildcard,
    type CellKind,
    type NotApplicableValue,
    type Sentinel,
    type WildcardValue,
} from './tableModel/sentinels';
export { Table } from './tableModel/table';
export type { CellPredicate, CellValue, LabeledRow, QueryCondition, Row } from './tableModel/types';
