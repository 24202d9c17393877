/**
 * LineProcessor - runs one input line through parsing, checking and evaluation
 *
 * Line states: start -> assignment | expression -> validated -> evaluated -> done,
 * with any step able to end the line as faulted.
 */

import { Lexer, TokenKind } from './Lexer';
import type { Token } from './Lexer';
import { PostfixEvaluator } from './PostfixEvaluator';
import { AssignmentParser } from '../parsers/AssignmentParser';
import { toPostfix } from '../parsers/PostfixParser';
import { tokensToString } from '../parsers/ParserUtils';
import { formatLineError } from '../utils/errorFormatter';
import { debugLog } from '../utils/debug';
import type { Environment } from '../types/Environment.type';
import type { CalcError, LineOutcome, Result } from '../types/Report.type';

export class LineProcessor {
    private environment: Environment;

    constructor(environment: Environment) {
        this.environment = environment;
    }

    /**
     * Process a single line and record its outcome in the environment.
     * Faults never throw: they become the outcome's result and a session error.
     *
     * @param line - Raw line text
     * @param lineNumber - 1-based line number
     * @returns The outcome, or null for a blank line
     */
    process(line: string, lineNumber: number): LineOutcome | null {
        const source = line.trim();
        if (source.length === 0) {
            return null;
        }

        let target: string | null = null;
        let expression = source;
        let offset = 0;

        if (AssignmentParser.isAssignment(source)) {
            const assignment = AssignmentParser.parse(source);
            if (!assignment.ok) {
                return this.fault(lineNumber, source, [], assignment.error);
            }
            target = assignment.value.targetName;
            expression = assignment.value.expression;
            offset = assignment.value.expressionColumn;
        }

        debugLog('LineProcessor', `line ${lineNumber}: ${target ? `assignment to ${target}` : 'expression'}`);

        const tokens = Lexer.tokenize(expression);

        // Undefined variables are reported before anything is evaluated
        const undefinedToken = this.findUndefinedVariable(tokens);
        if (undefinedToken) {
            return this.fault(lineNumber, source, [], {
                kind: 'undefined-variable',
                message: `Undefined variable '${undefinedToken.text}'`,
                column: offset + undefinedToken.column
            });
        }

        const postfix = toPostfix(tokens);
        debugLog('LineProcessor', `line ${lineNumber}: postfix ${tokensToString(postfix)}`);

        const result = new PostfixEvaluator(this.environment.variables).evaluate(postfix);
        if (!result.ok) {
            const { column } = result.error;
            return this.fault(lineNumber, source, postfix, {
                ...result.error,
                column: column === undefined ? undefined : offset + column
            });
        }

        if (target !== null) {
            this.environment.variables.set(target, result.value);
            this.environment.usedVariables.add(target);
        }

        return this.record({ lineNumber, source, assigned: target, postfix, result });
    }

    private findUndefinedVariable(tokens: readonly Token[]): Token | undefined {
        return tokens.find((token) => token.kind === TokenKind.IDENTIFIER && !this.environment.variables.has(token.text));
    }

    private fault(lineNumber: number, source: string, postfix: Token[], error: CalcError): LineOutcome {
        this.environment.errors.push(formatLineError(lineNumber, error));
        const result: Result<bigint> = { ok: false, error };
        return this.record({ lineNumber, source, assigned: null, postfix, result });
    }

    private record(outcome: LineOutcome): LineOutcome {
        debugLog('LineProcessor', `line ${outcome.lineNumber}: ${outcome.result.ok ? `= ${outcome.result.value}` : outcome.result.error.kind}`);
        this.environment.outcomes.push(outcome);
        return outcome;
    }
}
