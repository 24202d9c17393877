import type { LineOutcome, SessionReport } from '../../types/Report.type';
import { DEFAULT_RENDER_OPTIONS, type RenderOptions } from '../../utils/config';
import { formatCaretSnippet } from '../../utils/errorFormatter';
import { tokensToString } from '../../parsers/ParserUtils';
import { Writer } from './Writer';

/**
 * ReportPrinter class - SessionReport → text
 *
 * Pure: the same report, source and options always give the same text.
 */
export class ReportPrinter {
    private options: RenderOptions;

    constructor(options: Partial<RenderOptions> = {}) {
        this.options = { ...DEFAULT_RENDER_OPTIONS, ...options };
    }

    /**
     * Render a report
     *
     * @param report - Report of a session run
     * @param source - Program text the session ran over (echoed when showInput is set)
     */
    print(report: SessionReport, source: string): string {
        const writer = new Writer();

        if (this.options.showInput) {
            writer.pushLine('Input lines:');
            writer.pushLine(source);
            writer.pushBlankLine();
        }

        writer.pushLine('Output:');
        for (const outcome of report.outcomes) {
            this.printOutcome(outcome, writer);
        }

        writer.pushLine(this.options.separator);
        writer.pushLine('Variables used:');
        if (report.variables.size === 0) {
            writer.pushLine('No variables were used');
        }
        for (const [name, value] of report.variables) {
            writer.pushLine(this.options.showValues ? `${name} = ${value}` : name);
        }

        writer.pushLine(this.options.separator);
        writer.pushLine('Errors found:');
        if (report.errors.length === 0) {
            writer.pushLine('No errors detected');
        }
        for (const error of report.errors) {
            writer.pushLine(error);
        }

        return writer.toString();
    }

    /**
     * Display form of a line result: the value, or "Error: <message>"
     */
    static formatResult(outcome: LineOutcome): string {
        return outcome.result.ok ? outcome.result.value.toString() : `Error: ${outcome.result.error.message}`;
    }

    private printOutcome(outcome: LineOutcome, writer: Writer): void {
        writer.pushLine(`Line ${outcome.lineNumber}: ${outcome.source}`);
        writer.pushLine(`Postfix: ${tokensToString(outcome.postfix)}`);
        writer.pushLine(`Result: ${ReportPrinter.formatResult(outcome)}`);

        if (this.options.errorContext && !outcome.result.ok && outcome.result.error.column !== undefined) {
            writer.pushLines(formatCaretSnippet(outcome.source, outcome.result.error.column));
        }

        writer.pushBlankLine();
    }
}
