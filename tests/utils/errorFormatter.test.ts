import { describe, it, expect } from 'vitest';
import { formatLineError, formatCaretSnippet, errorMessage } from '../../src/utils/errorFormatter';

describe('errorFormatter', () => {
  it('prefixes line errors with the line number', () => {
    expect(formatLineError(7, { kind: 'division-by-zero', message: 'Division by zero' })).toBe('Line 7: Division by zero');
  });

  it('places the caret under the column', () => {
    expect(formatCaretSnippet('a + b', 4)).toBe('  a + b\n      ^');
    expect(formatCaretSnippet('a + b', 0)).toBe('  a + b\n  ^');
  });

  it('clamps the caret to the line', () => {
    expect(formatCaretSnippet('ab', 10)).toBe('  ab\n    ^');
  });

  it('extracts messages from thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
