/**
 * Parser utilities and shared helper methods
 */

import type { Token } from '../classes/Lexer';
import { TokenKind } from '../classes/Lexer';

/**
 * Operator precedence
 * - 2: *, /, %
 * - 1: +, -
 * - 0: anything else, including '('
 */
export function precedence(token: Token): number {
    if (token.kind !== TokenKind.OPERATOR) {
        return 0;
    }
    switch (token.text) {
        case '*':
        case '/':
        case '%':
            return 2;
        case '+':
        case '-':
            return 1;
    }
}

/**
 * Join token texts with single spaces (postfix display form)
 */
export function tokensToString(tokens: readonly Token[]): string {
    return tokens.map((token) => token.text).join(' ');
}

const VARIABLE_NAME = /^[A-Za-z][A-Za-z0-9]*$/;

export function isValidVariableName(name: string): boolean {
    return VARIABLE_NAME.test(name);
}
