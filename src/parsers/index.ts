/**
 * Parsers
 * Each parser handles one step of turning a line into something evaluable
 */

export { AssignmentParser, type Assignment } from './AssignmentParser';
export { toPostfix } from './PostfixParser';
export { precedence, tokensToString, isValidVariableName } from './ParserUtils';
