/**
 * Barrel export for all LineCalc classes
 */

export { Lexer, TokenKind, OPERATORS, isOperator } from './Lexer';
export type { Token, NumberToken, IdentifierToken, OperatorToken, ParenToken, Operator } from './Lexer';
export { TokenStream } from './TokenStream';
export { PostfixEvaluator } from './PostfixEvaluator';
export { LineProcessor } from './LineProcessor';
export { Session } from './Session';
export { InputReadError, ConfigError, UsageError } from './exceptions';
export { ReportPrinter, Writer } from './report-printer';
