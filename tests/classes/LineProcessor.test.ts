import { describe, it, expect, beforeEach } from 'vitest';
import { LineProcessor } from '../../src/classes/LineProcessor';
import { createEnvironment, type Environment } from '../../src/types/Environment.type';
import { tokensToString } from '../../src/parsers/ParserUtils';

describe('LineProcessor', () => {
  let environment: Environment;
  let processor: LineProcessor;

  beforeEach(() => {
    environment = createEnvironment();
    processor = new LineProcessor(environment);
  });

  it('evaluates a bare expression without touching the store', () => {
    const outcome = processor.process('  2 + 3 * 4  ', 1);
    expect(outcome).not.toBeNull();
    expect(outcome?.source).toBe('2 + 3 * 4');
    expect(outcome?.assigned).toBeNull();
    expect(tokensToString(outcome?.postfix ?? [])).toBe('2 3 4 * +');
    expect(outcome?.result).toEqual({ ok: true, value: 14n });
    expect(environment.variables.size).toBe(0);
    expect(environment.errors).toEqual([]);
  });

  it('binds the target of a successful assignment', () => {
    const outcome = processor.process('x = 5', 1);
    expect(outcome?.assigned).toBe('x');
    expect(outcome?.result).toEqual({ ok: true, value: 5n });
    expect(environment.variables.get('x')).toBe(5n);
    expect([...environment.usedVariables]).toEqual(['x']);
  });

  it('uses bindings from earlier lines', () => {
    processor.process('x = 5', 1);
    const outcome = processor.process('x + 1', 2);
    expect(outcome?.result).toEqual({ ok: true, value: 6n });
  });

  it('lets an assignment refer to its own previous value', () => {
    processor.process('n = 1', 1);
    processor.process('n = n + 1', 2);
    expect(environment.variables.get('n')).toBe(2n);
  });

  it('skips blank lines', () => {
    expect(processor.process('   \t ', 4)).toBeNull();
    expect(environment.outcomes).toEqual([]);
    expect(environment.errors).toEqual([]);
  });

  it('rejects an invalid target before tokenizing', () => {
    const outcome = processor.process('1x = 2', 3);
    expect(outcome?.postfix).toEqual([]);
    expect(outcome?.assigned).toBeNull();
    expect(outcome?.result).toEqual({
      ok: false,
      error: { kind: 'invalid-variable-name', message: "Invalid variable name '1x'", column: 0 },
    });
    expect(environment.variables.size).toBe(0);
    expect(environment.errors).toEqual(["Line 3: Invalid variable name '1x'"]);
  });

  it('rejects a line with several =', () => {
    const outcome = processor.process('a = b = 1', 1);
    expect(outcome?.result.ok).toBe(false);
    if (outcome && !outcome.result.ok) {
      expect(outcome.result.error.kind).toBe('malformed-assignment');
    }
    expect(environment.errors).toEqual(["Line 1: Malformed assignment: expected a single '='"]);
  });

  it('reports the first undefined variable before evaluating', () => {
    const outcome = processor.process('y = 4 / 0 + z + w', 2);
    expect(outcome?.postfix).toEqual([]);
    expect(outcome?.result).toEqual({
      ok: false,
      error: { kind: 'undefined-variable', message: "Undefined variable 'z'", column: 12 },
    });
    expect(environment.errors).toEqual(["Line 2: Undefined variable 'z'"]);
  });

  it('never treats an unbound name as zero', () => {
    const outcome = processor.process('z + 1', 1);
    expect(outcome?.result.ok).toBe(false);
    if (outcome && !outcome.result.ok) {
      expect(outcome.result.error.message).toBe("Undefined variable 'z'");
    }
  });

  it('keeps the target unbound when evaluation fails', () => {
    const outcome = processor.process('y = 4 / 0', 1);
    expect(tokensToString(outcome?.postfix ?? [])).toBe('4 0 /');
    expect(outcome?.result).toEqual({
      ok: false,
      error: { kind: 'division-by-zero', message: 'Division by zero', column: 6 },
    });
    expect(environment.variables.has('y')).toBe(false);
    expect(environment.usedVariables.has('y')).toBe(false);
    expect(environment.errors).toEqual(['Line 1: Division by zero']);
  });

  it('keeps the previous value when a reassignment fails', () => {
    processor.process('x = 3', 1);
    processor.process('x = x % 0', 2);
    expect(environment.variables.get('x')).toBe(3n);
  });

  it('reports an empty assignment expression as invalid', () => {
    const outcome = processor.process('x =', 1);
    expect(outcome?.result).toEqual({ ok: false, error: { kind: 'invalid-expression', message: 'Invalid expression' } });
    expect(environment.errors).toEqual(['Line 1: Invalid expression']);
  });

  it('records every outcome in line order', () => {
    processor.process('a = 1', 1);
    processor.process('a +', 2);
    processor.process('a * 2', 3);
    expect(environment.outcomes.map((o) => o.lineNumber)).toEqual([1, 2, 3]);
  });
});
