import type { Token } from '../classes/Lexer';

/**
 * Kinds of line-scoped faults
 */
export type CalcErrorKind =
    | 'invalid-variable-name'
    | 'malformed-assignment'
    | 'undefined-variable'
    | 'division-by-zero'
    | 'invalid-expression';

export interface CalcError {
    kind: CalcErrorKind;
    message: string;
    column?: number; // 0-based offset in the trimmed line, when known
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: CalcError };

/**
 * Outcome of one non-blank input line
 */
export interface LineOutcome {
    readonly lineNumber: number; // 1-based
    readonly source: string; // trimmed line text
    readonly assigned: string | null; // target of a successful assignment
    readonly postfix: readonly Token[];
    readonly result: Result<bigint>;
}

export interface SessionReport {
    readonly outcomes: readonly LineOutcome[];
    readonly variables: ReadonlyMap<string, bigint>; // first-assignment order, final values
    readonly errors: readonly string[];
}
