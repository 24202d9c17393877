/**
 * Utility for formatting errors with code context
 */

import type { CalcError } from '../types/Report.type';

/**
 * Session error list entry: "Line <n>: <message>"
 */
export function formatLineError(lineNumber: number, error: CalcError): string {
    return `Line ${lineNumber}: ${error.message}`;
}

/**
 * Source line with a caret under the error position
 *
 * @param code - Source text of the line
 * @param column - 0-based column of the error
 * @returns Two indented lines: the code and the caret
 */
export function formatCaretSnippet(code: string, column: number): string {
    const caret = ' '.repeat(Math.min(Math.max(0, column), code.length)) + '^';
    return `  ${code}\n  ${caret}`;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
