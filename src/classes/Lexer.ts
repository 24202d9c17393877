/**
 * Lexer class for tokenizing LineCalc expressions
 */

// ============================================================================
// Token Types
// ============================================================================

/**
 * Token kinds for LineCalc expressions
 * Using const object instead of enum for better compatibility
 */
export const TokenKind = {
    NUMBER: 'NUMBER',           // 42, 007
    IDENTIFIER: 'IDENTIFIER',   // x, total, x1
    OPERATOR: 'OPERATOR',       // + - * / %
    LPAREN: 'LPAREN',           // (
    RPAREN: 'RPAREN',           // )
} as const;

export type TokenKind = typeof TokenKind[keyof typeof TokenKind];

export const OPERATORS = ['+', '-', '*', '/', '%'] as const;

export type Operator = typeof OPERATORS[number];

interface TokenBase {
    text: string;           // Original text from source
    column: number;         // 0-based column offset in the tokenized text
}

export interface NumberToken extends TokenBase {
    kind: typeof TokenKind.NUMBER;
    value: bigint;
}

export interface IdentifierToken extends TokenBase {
    kind: typeof TokenKind.IDENTIFIER;
}

export interface OperatorToken extends TokenBase {
    kind: typeof TokenKind.OPERATOR;
    text: Operator;
}

export interface ParenToken extends TokenBase {
    kind: typeof TokenKind.LPAREN | typeof TokenKind.RPAREN;
}

/**
 * A single token in an expression
 */
export type Token = NumberToken | IdentifierToken | OperatorToken | ParenToken;

export function isOperator(char: string): char is Operator {
    return OPERATORS.some((op) => op === char);
}

const isDigit = (char: string): boolean => {
    return char >= '0' && char <= '9';
};

const isAlpha = (char: string): boolean => {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z');
};

const isAlphaNumeric = (char: string): boolean => {
    return isAlpha(char) || isDigit(char);
};

// ============================================================================
// Lexer Implementation
// ============================================================================

export class Lexer {
    /**
     * Tokenize an expression into Token objects.
     * Characters that belong to no token (whitespace included) are skipped.
     *
     * @param source - Expression text (single line, no assignment target)
     * @returns Tokens in source order
     */
    static tokenize(source: string): Token[] {
        const tokens: Token[] = [];
        let i = 0;

        while (i < source.length) {
            const char = source[i];

            // Integer literal: maximal run of digits
            if (isDigit(char)) {
                const start = i;
                while (i < source.length && isDigit(source[i])) {
                    i++;
                }
                const text = source.slice(start, i);
                tokens.push({ kind: TokenKind.NUMBER, text, column: start, value: BigInt(text) });
                continue;
            }

            // Identifier: letter followed by letters/digits
            if (isAlpha(char)) {
                const start = i;
                while (i < source.length && isAlphaNumeric(source[i])) {
                    i++;
                }
                tokens.push({ kind: TokenKind.IDENTIFIER, text: source.slice(start, i), column: start });
                continue;
            }

            if (isOperator(char)) {
                tokens.push({ kind: TokenKind.OPERATOR, text: char, column: i });
                i++;
                continue;
            }

            if (char === '(') {
                tokens.push({ kind: TokenKind.LPAREN, text: char, column: i });
                i++;
                continue;
            }

            if (char === ')') {
                tokens.push({ kind: TokenKind.RPAREN, text: char, column: i });
                i++;
                continue;
            }

            // Anything else is not part of the language
            i++;
        }

        return tokens;
    }
}
