/**
 * Built-in aggregate functions. The set is closed: rule text cannot register
 * or reach anything else.
 */

import type { VariableValue } from '@concursal/domain/variables';
import type { FunctionName } from './tokenizer.js';

export type BuiltinFunction = (args: readonly VariableValue[]) => VariableValue;

function numericArguments(args: readonly VariableValue[]): number[] {
  return args.filter((arg): arg is number => typeof arg === 'number');
}

/** Non-numeric arguments (null included) are ignored; none left gives null. */
function min(args: readonly VariableValue[]): VariableValue {
  const values = numericArguments(args);
  return values.length > 0 ? Math.min(...values) : null;
}

function max(args: readonly VariableValue[]): VariableValue {
  const values = numericArguments(args);
  return values.length > 0 ? Math.max(...values) : null;
}

/** Number of present (non-null) arguments. */
function count(args: readonly VariableValue[]): VariableValue {
  return args.filter((arg) => arg !== null).length;
}

/** Non-numeric arguments contribute zero. */
function sum(args: readonly VariableValue[]): VariableValue {
  let total = 0;
  for (const arg of args) {
    if (typeof arg === 'number') total += arg;
  }
  return total;
}

export const BUILTIN_FUNCTIONS: Readonly<Record<FunctionName, BuiltinFunction>> = Object.freeze({
  MIN: min,
  MAX: max,
  COUNT: count,
  SUM: sum,
});
