/**
 * Error classes raised by the table compiler and the query engine.
 * Every error carries a stable `code` so callers can branch without `instanceof` chains.
 */

export abstract class InlineTableError extends Error {
    abstract readonly code: string;
    override readonly cause?: unknown;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message);
        this.name = this.constructor.name;
        this.cause = options?.cause;
    }
}

/**
 * The table text cannot be parsed: unknown dialect, bad directive, ragged rows.
 */
export class TableMarkupError extends InlineTableError {
    readonly code = 'TABLE_MARKUP' as const;
}

/**
 * A cell expression references a name that is neither bound nor built in.
 */
export class NameResolutionError extends InlineTableError {
    readonly code = 'NAME_RESOLUTION' as const;
    readonly identifier: string;

    constructor(identifier: string, message?: string, options?: { cause?: unknown }) {
        super(message ?? `Name '${identifier}' is not defined`, options);
        this.identifier = identifier;
    }
}

export class ExpressionSyntaxError extends InlineTableError {
    readonly code = 'EXPRESSION_SYNTAX' as const;
}

export class ExpressionEvaluationError extends InlineTableError {
    readonly code = 'EXPRESSION_EVALUATION' as const;
}

/**
 * A query found nothing usable: invalid label, empty condition, no row, or a not-applicable row.
 */
export class TableLookupError extends InlineTableError {
    readonly code = 'TABLE_LOOKUP' as const;
}

/**
 * Two tables (or a table and a row) disagree on shape.
 */
export class TableTypeError extends InlineTableError {
    readonly code = 'TABLE_TYPE' as const;
}

export class TableValueError extends InlineTableError {
    readonly code = 'TABLE_VALUE' as const;
}

/**
 * Rebuilds `error` with `context` prepended to its message, keeping its class.
 */
export function withContext(error: InlineTableError, context: string): InlineTableError {
    const message = `${context}: ${error.message}`;
    if (error instanceof NameResolutionError) {
        return new NameResolutionError(error.identifier, message, { cause: error });
    }
    if (error instanceof ExpressionSyntaxError) return new ExpressionSyntaxError(message, { cause: error });
    if (error instanceof ExpressionEvaluationError) return new ExpressionEvaluationError(message, { cause: error });
    if (error instanceof TableValueError) return new TableValueError(message, { cause: error });
    if (error instanceof TableLookupError) return new TableLookupError(message, { cause: error });
    if (error instanceof TableTypeError) return new TableTypeError(message, { cause: error });
    return new TableMarkupError(message, { cause: error });
}
