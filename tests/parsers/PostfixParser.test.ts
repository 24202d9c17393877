import { describe, it, expect } from 'vitest';
import { Lexer } from '../../src/classes/Lexer';
import { toPostfix } from '../../src/parsers/PostfixParser';
import { tokensToString, precedence } from '../../src/parsers/ParserUtils';

const postfixOf = (expr: string): string => tokensToString(toPostfix(Lexer.tokenize(expr)));

describe('toPostfix', () => {
  it('respects precedence', () => {
    expect(postfixOf('2 + 3 * 4')).toBe('2 3 4 * +');
    expect(postfixOf('2 * 3 + 4')).toBe('2 3 * 4 +');
    expect(postfixOf('a % b - c / d')).toBe('a b % c d / -');
  });

  it('is left-associative for operators of equal precedence', () => {
    expect(postfixOf('10 - 4 - 3')).toBe('10 4 - 3 -');
    expect(postfixOf('8 / 2 * 3')).toBe('8 2 / 3 *');
  });

  it('uses parentheses to override precedence', () => {
    expect(postfixOf('(2 + 3) * 4')).toBe('2 3 + 4 *');
    expect(postfixOf('((1 + 2) * (3 + 4))')).toBe('1 2 + 3 4 + *');
    expect(postfixOf('x * (y - (z + 1))')).toBe('x y z 1 + - *');
  });

  it('passes operands through unchanged', () => {
    expect(postfixOf('42')).toBe('42');
    expect(postfixOf('total')).toBe('total');
  });

  it('returns an empty sequence for no tokens', () => {
    expect(toPostfix([])).toEqual([]);
  });

  it('tolerates an unmatched closing parenthesis', () => {
    expect(postfixOf('1 + 2)')).toBe('1 2 +');
    expect(postfixOf(') 3')).toBe('3');
  });

  it('leaves an unmatched opening parenthesis in the output', () => {
    expect(postfixOf('(1 + 2')).toBe('1 2 + (');
  });

  it('does not validate operator arity', () => {
    expect(postfixOf('+ *')).toBe('* +');
  });
});

describe('precedence', () => {
  it('ranks multiplicative operators above additive ones and parentheses lowest', () => {
    const [plus, star, paren] = Lexer.tokenize('+*(');
    expect(precedence(plus)).toBe(1);
    expect(precedence(star)).toBe(2);
    expect(precedence(paren)).toBe(0);
  });
});
