/**
 * @concursal/expression
 *
 * Sandboxed condition language for rulebooks: literals, identifiers,
 * comparisons, AND/OR/NOT, parentheses and MIN/MAX/COUNT/SUM.
 *
 * @example
 * ```typescript
 * import { evaluate } from '@concursal/expression';
 *
 * evaluate('COUNT(a, b, c) >= 2', { a: 1, b: null, c: 3 }); // true
 * evaluate('deuda > "x"', { deuda: 10 }); // null (type mismatch)
 * ```
 */

export { ExpressionEvaluator, evaluate } from './evaluator.js';
export type { ExpressionEvaluatorOptions } from './evaluator.js';
export { ExpressionError } from './errors.js';
export { assertWellFormed } from './syntax.js';
export { BUILTIN_FUNCTIONS } from './functions.js';
export type { BuiltinFunction } from './functions.js';
export {
  tokenize,
  collectIdentifiers,
  classifyWord,
  COMPARISON_OPERATORS,
  CONNECTIVES,
  FUNCTION_NAMES,
} from './tokenizer.js';
export type { Token, ComparisonOperator, Connective, FunctionName } from './tokenizer.js';
