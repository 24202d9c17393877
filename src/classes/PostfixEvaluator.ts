/**
 * PostfixEvaluator class for evaluating postfix token sequences
 */

import { TokenKind } from './Lexer';
import type { Operator, Token } from './Lexer';
import type { CalcError, Result } from '../types/Report.type';

const INVALID_EXPRESSION = 'Invalid expression';

// bigint division truncates; these floor so that a == floorDiv(a, b) * b + floorMod(a, b)
function floorDiv(a: bigint, b: bigint): bigint {
    const quotient = a / b;
    return a % b !== 0n && (a < 0n) !== (b < 0n) ? quotient - 1n : quotient;
}

function floorMod(a: bigint, b: bigint): bigint {
    const remainder = a % b;
    return remainder !== 0n && (remainder < 0n) !== (b < 0n) ? remainder + b : remainder;
}

export class PostfixEvaluator {
    private variables: ReadonlyMap<string, bigint>;

    /**
     * @param variables - Bindings visible to the expression; never modified
     */
    constructor(variables: ReadonlyMap<string, bigint>) {
        this.variables = variables;
    }

    /**
     * Evaluate a postfix sequence with an operand stack.
     * Division rounds toward negative infinity and the remainder takes the sign of the divisor.
     */
    evaluate(postfix: readonly Token[]): Result<bigint> {
        const stack: bigint[] = [];

        for (const token of postfix) {
            switch (token.kind) {
                case TokenKind.NUMBER:
                    stack.push(token.value);
                    break;

                case TokenKind.IDENTIFIER: {
                    const value = this.variables.get(token.text);
                    if (value === undefined) {
                        return this.fail({
                            kind: 'undefined-variable',
                            message: `Undefined variable '${token.text}'`,
                            column: token.column
                        });
                    }
                    stack.push(value);
                    break;
                }

                case TokenKind.OPERATOR: {
                    const b = stack.pop();
                    const a = stack.pop();
                    if (a === undefined || b === undefined) {
                        return this.fail({ kind: 'invalid-expression', message: INVALID_EXPRESSION, column: token.column });
                    }
                    const applied = this.apply(a, b, token.text);
                    if (!applied.ok) {
                        return this.fail({ ...applied.error, column: token.column });
                    }
                    stack.push(applied.value);
                    break;
                }

                // An unmatched '(' left in the output by the converter
                case TokenKind.LPAREN:
                    return this.fail({ kind: 'invalid-expression', message: INVALID_EXPRESSION, column: token.column });
            }
        }

        if (stack.length !== 1) {
            return this.fail({ kind: 'invalid-expression', message: INVALID_EXPRESSION });
        }
        return { ok: true, value: stack[0] };
    }

    private apply(a: bigint, b: bigint, op: Operator): Result<bigint> {
        switch (op) {
            case '+': return { ok: true, value: a + b };
            case '-': return { ok: true, value: a - b };
            case '*': return { ok: true, value: a * b };
            case '/':
                if (b === 0n) return this.fail({ kind: 'division-by-zero', message: 'Division by zero' });
                return { ok: true, value: floorDiv(a, b) };
            case '%':
                if (b === 0n) return this.fail({ kind: 'division-by-zero', message: 'Division by zero' });
                return { ok: true, value: floorMod(a, b) };
        }
    }

    private fail(error: CalcError): Result<bigint> {
        return { ok: false, error };
    }
}
