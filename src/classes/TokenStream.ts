/**
 * TokenStream - A stream of tokens for parsing
 *
 * Provides methods for inspecting and consuming tokens
 * during conversion, with debug logging.
 */

import type { Token } from './Lexer';
import { debugLog } from '../utils/debug';

export class TokenStream {
    private tokens: readonly Token[];
    private position: number = 0;

    constructor(tokens: readonly Token[]) {
        this.tokens = tokens;
    }

    /**
     * Get the current token without consuming it
     * @returns The current token, or null if at end
     */
    current(): Token | null {
        return this.position < this.tokens.length ? this.tokens[this.position] : null;
    }

    /**
     * Consume and return the current token
     * @returns The current token, or null if at end
     */
    next(): Token | null {
        const token = this.current();
        if (!token) {
            debugLog('TokenStream', `next() - At end of stream (total tokens: ${this.tokens.length})`);
            return null;
        }

        this.position++;

        debugLog('TokenStream', `next() - Advanced to position ${this.position}`, {
            kind: token.kind,
            text: token.text,
            column: token.column
        });
        return token;
    }
}
