/**
 * Parser for variable assignments
 * Handles: name = expression
 */

import type { Result } from '../types/Report.type';
import { isValidVariableName } from './ParserUtils';

export interface Assignment {
    targetName: string;
    expression: string; // text after '=', untrimmed
    expressionColumn: number; // offset of expression within the line
}

export class AssignmentParser {
    /**
     * Check whether a line is an assignment
     */
    static isAssignment(line: string): boolean {
        return line.includes('=');
    }

    /**
     * Split an assignment line into target and expression and validate the target.
     * A line with more than one '=' is malformed; the target must start with a
     * letter and continue with letters or digits.
     *
     * @param line - Trimmed line containing at least one '='
     */
    static parse(line: string): Result<Assignment> {
        const parts = line.split('=');
        if (parts.length !== 2) {
            return {
                ok: false,
                error: {
                    kind: 'malformed-assignment',
                    message: "Malformed assignment: expected a single '='",
                    column: line.indexOf('=', line.indexOf('=') + 1)
                }
            };
        }

        const [rawTarget, expression] = parts;
        const targetName = rawTarget.trim();
        if (targetName.length === 0 || !isValidVariableName(targetName)) {
            return {
                ok: false,
                error: {
                    kind: 'invalid-variable-name',
                    message: `Invalid variable name '${targetName}'`,
                    column: rawTarget.length - rawTarget.trimStart().length
                }
            };
        }

        return {
            ok: true,
            value: {
                targetName,
                expression,
                expressionColumn: rawTarget.length + 1
            }
        };
    }
}
