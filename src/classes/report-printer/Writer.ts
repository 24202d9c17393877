/**
 * Writer - Efficient string building for report output
 *
 * Avoids repeated string concatenation by using an array-based approach.
 */
export class Writer {
    private parts: string[] = [];

    /**
     * Push a line of text followed by a newline
     */
    pushLine(text: string): void {
        this.parts.push(text);
        this.parts.push('\n');
    }

    /**
     * Push every line of a multi-line block
     */
    pushLines(text: string): void {
        for (const line of text.split('\n')) {
            this.pushLine(line);
        }
    }

    pushBlankLine(): void {
        this.parts.push('\n');
    }

    /**
     * Get the final string
     */
    toString(): string {
        return this.parts.join('');
    }
}
