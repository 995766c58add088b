import { TableMarkupError } from './errors';
import type { TableFormatName } from './markup/types';

export interface CompileOptions {
    /**
     * Table dialect. `'auto'` detects it from the text; a named format skips detection
     * but still validates the structure.
     */
    format?: 'auto' | TableFormatName;
}

export const DEFAULT_COMPILE_OPTIONS: Required<CompileOptions> = {
    format: 'auto',
};

const FORMAT_NAMES: ReadonlySet<string> = new Set(['auto', 'simple', 'grid', 'markdown']);

export function resolveCompileOptions(options: CompileOptions = {}): Required<CompileOptions> {
    const resolved = { format: options.format ?? DEFAULT_COMPILE_OPTIONS.format };
    // Options may come from untyped callers.
    if (!FORMAT_NAMES.has(resolved.format)) {
        throw new TableMarkupError(`Unknown table format '${String(resolved.format)}'`);
    }
    return resolved;
}
