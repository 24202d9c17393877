/**
 * Parser for infix expressions
 * Converts tokens into postfix (Reverse Polish) order with the Shunting Yard algorithm
 */

import { TokenStream } from '../classes/TokenStream';
import { TokenKind } from '../classes/Lexer';
import type { Token } from '../classes/Lexer';
import { precedence } from './ParserUtils';

/**
 * Convert an infix token sequence into postfix order.
 *
 * Operators of equal precedence are left-associative. Parentheses are not
 * balance-checked: an unmatched ')' pops whatever is on the stack and an
 * unmatched '(' ends up in the output, where evaluation rejects it.
 *
 * @param tokens - Tokens as produced by Lexer.tokenize
 * @returns Postfix token sequence
 */
export function toPostfix(tokens: readonly Token[]): Token[] {
    const stream = new TokenStream(tokens);
    const output: Token[] = [];
    const operators: Token[] = [];

    for (let token = stream.current(); token !== null; token = stream.current()) {
        stream.next();

        switch (token.kind) {
            case TokenKind.NUMBER:
            case TokenKind.IDENTIFIER:
                output.push(token);
                break;

            case TokenKind.LPAREN:
                operators.push(token);
                break;

            case TokenKind.RPAREN: {
                let top = operators[operators.length - 1];
                while (top && top.kind !== TokenKind.LPAREN) {
                    output.push(top);
                    operators.pop();
                    top = operators[operators.length - 1];
                }
                // Discard the matching '(' if there is one
                if (top) {
                    operators.pop();
                }
                break;
            }

            case TokenKind.OPERATOR: {
                const prec = precedence(token);
                let top = operators[operators.length - 1];
                while (top && precedence(top) >= prec) {
                    output.push(top);
                    operators.pop();
                    top = operators[operators.length - 1];
                }
                operators.push(token);
                break;
            }
        }
    }

    while (operators.length > 0) {
        const top = operators.pop();
        if (top) {
            output.push(top);
        }
    }

    return output;
}
