/**
 * Case Variable Environment
 *
 * Flat name -> value mapping built once per case by the case-assembly
 * collaborator. Values are a closed sum type; the engine never mutates it.
 */

import { computeContentHash } from './canonical.js';
import type { ContentHash } from './types.js';

export type VariableValue = boolean | number | string | null;

export type CaseVariables = Readonly<Record<string, VariableValue>>;

export type VariableKind = 'boolean' | 'number' | 'string' | 'null';

export function isVariableValue(value: unknown): value is VariableValue {
  if (value === null) return true;
  if (typeof value === 'number') return Number.isFinite(value);
  return typeof value === 'boolean' || typeof value === 'string';
}

export function kindOf(value: VariableValue): VariableKind {
  if (value === null) return 'null';
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'number') return 'number';
  return 'string';
}

/**
 * Own-property lookup only: names such as "constructor" or "__proto__" never
 * resolve to prototype members.
 */
export function hasVariable(variables: CaseVariables, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(variables, name);
}

/**
 * Resolves a variable; absent names resolve to null.
 */
export function resolveVariable(variables: CaseVariables, name: string): VariableValue {
  return hasVariable(variables, name) ? variables[name] : null;
}

export function missingVariables(variables: CaseVariables, required: readonly string[]): string[] {
  return required.filter((name) => !hasVariable(variables, name));
}

/**
 * Frozen shallow copy. Each evaluation works on its own snapshot.
 */
export function snapshotVariables(variables: CaseVariables): CaseVariables {
  const snapshot: Record<string, VariableValue> = Object.create(null);
  for (const name of Object.keys(variables)) {
    snapshot[name] = variables[name];
  }
  return Object.freeze(snapshot);
}

/**
 * Truthiness shared by the evaluator and the ladders.
 */
export function isTruthy(value: VariableValue): boolean {
  if (value === null) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  return value.length > 0;
}

export function computeVariablesHash(variables: CaseVariables): ContentHash {
  return computeContentHash(variables);
}
