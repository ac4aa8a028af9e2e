import { describe, it, expect } from 'vitest';
import { ExpressionError } from './errors.js';
import { assertWellFormed } from './syntax.js';

describe('expression:syntax', () => {
  it.each([
    'a',
    'NOT NOT a',
    'a > 1 AND (b OR NOT c)',
    'COUNT()',
    'MAX(a, MIN(b, 2)) >= 3',
    "nombre == 'Talleres SL'",
    'insolvencia_actual == true AND meses_desde_insolvencia > 2',
  ])('accepts %s', (expression) => {
    expect(() => assertWellFormed(expression)).not.toThrow();
  });

  it.each([
    ['a AND', 'Expected an operand, found end of expression in "a AND"'],
    ['a = true', `Unexpected operator '=' in "a = true"`],
    ['(a, b)', `Expected ')', found ',' in "(a, b)"`],
    ['(a > 1', `Expected ')', found end of expression in "(a > 1"`],
    ['a > 1)', `Unexpected ')' in "a > 1)"`],
    ['a b', `Unexpected 'b' in "a b"`],
    ['MIN a', `Function MIN must be followed by '(' in "MIN a"`],
    ['MIN(a,,b)', `Expected an operand, found ',' in "MIN(a,,b)"`],
    ['process.exit(1)', `Unexpected '(' in "process.exit(1)"`],
  ])('rejects %s', (expression, message) => {
    let caught: unknown;
    try {
      assertWellFormed(expression);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ExpressionError);
    expect(caught instanceof ExpressionError && caught.message).toBe(message);
  });
});
