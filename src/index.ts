/**
 * LineCalc Interpreter
 *
 * Each input line is an assignment (`name = expression`) or a bare expression
 * over integers and variables with + - * / % and parentheses.
 */

import { Session, ReportPrinter } from './classes';
import type { RenderOptions } from './utils';
import type { SessionReport } from './types/Report.type';

// Re-export for external use
export {
    Lexer,
    TokenKind,
    OPERATORS,
    isOperator,
    TokenStream,
    PostfixEvaluator,
    LineProcessor,
    Session,
    ReportPrinter,
    Writer,
    InputReadError,
    ConfigError,
    UsageError
} from './classes';
export type { Token, NumberToken, IdentifierToken, OperatorToken, ParenToken, Operator } from './classes';
export { AssignmentParser, toPostfix, precedence, tokensToString, isValidVariableName } from './parsers';
export type { Assignment } from './parsers';
export {
    formatLineError,
    formatCaretSnippet,
    errorMessage,
    parseConfig,
    loadConfig,
    DEFAULT_CONFIG,
    DEFAULT_RENDER_OPTIONS,
    setDebug,
    isDebugEnabled
} from './utils';
export type { RenderOptions, LineCalcConfig } from './utils';
export type { CalcError, CalcErrorKind, Result, LineOutcome, SessionReport } from './types/Report.type';
export type { Environment, VariableStore } from './types/Environment.type';
export { createEnvironment } from './types/Environment.type';

/**
 * Facade: run a program and render its report
 *
 * @example
 * ```typescript
 * const calc = new LineCalc();
 * const report = calc.run('x = 5\nx + 1');
 * console.log(calc.render(report, 'x = 5\nx + 1'));
 * ```
 */
export class LineCalc {
    private printer: ReportPrinter;

    constructor(options?: { render?: Partial<RenderOptions> }) {
        this.printer = new ReportPrinter(options?.render);
    }

    /**
     * Run a program in a fresh session
     */
    run(source: string): SessionReport {
        return new Session().run(source);
    }

    render(report: SessionReport, source: string): string {
        return this.printer.print(report, source);
    }

    /**
     * Run a program and render the report in one step
     */
    execute(source: string): string {
        return this.render(this.run(source), source);
    }
}
