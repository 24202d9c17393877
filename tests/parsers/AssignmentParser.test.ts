import { describe, it, expect } from 'vitest';
import { AssignmentParser } from '../../src/parsers/AssignmentParser';

describe('AssignmentParser', () => {
  it('detects assignment lines', () => {
    expect(AssignmentParser.isAssignment('x = 1')).toBe(true);
    expect(AssignmentParser.isAssignment('x + 1')).toBe(false);
  });

  it('splits a line into target and expression', () => {
    expect(AssignmentParser.parse('total = a + 1')).toEqual({
      ok: true,
      value: { targetName: 'total', expression: ' a + 1', expressionColumn: 7 },
    });
  });

  it('accepts letters followed by digits', () => {
    const result = AssignmentParser.parse('x1=2');
    expect(result).toEqual({ ok: true, value: { targetName: 'x1', expression: '2', expressionColumn: 3 } });
  });

  it('rejects a target starting with a digit', () => {
    expect(AssignmentParser.parse('1x = 2')).toEqual({
      ok: false,
      error: { kind: 'invalid-variable-name', message: "Invalid variable name '1x'", column: 0 },
    });
  });

  it('rejects an empty target', () => {
    const result = AssignmentParser.parse('= 2');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('invalid-variable-name');
      expect(result.error.message).toBe("Invalid variable name ''");
    }
  });

  it('rejects targets with non-alphanumeric characters', () => {
    for (const line of ['my_var = 1', 'a b = 1', 'x+y = 3']) {
      const result = AssignmentParser.parse(line);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('invalid-variable-name');
      }
    }
  });

  it('rejects more than one =', () => {
    expect(AssignmentParser.parse('a = b = 3')).toEqual({
      ok: false,
      error: { kind: 'malformed-assignment', message: "Malformed assignment: expected a single '='", column: 6 },
    });
    expect(AssignmentParser.parse('x == 1').ok).toBe(false);
  });
});
