/**
 * Expression Evaluator
 *
 * Evaluates rule conditions over a flat variable environment.
 *
 * Evaluation order:
 * 1. Innermost parenthesized group (or function call) first, substituting its
 *    scalar result back into the token stream, until no parentheses remain
 * 2. Unary NOT (right-most first)
 * 3. Comparisons, one operator type at a time: == != >= <= > <
 * 4. AND, then OR, each folded left to right
 *
 * CRITICAL: evaluation never throws to the caller. Type mismatches, unknown
 * tokens and malformed expressions all surface as a null result.
 */

import type { EngineLogger } from '@concursal/domain/logger';
import { describeError } from '@concursal/domain/logger';
import type { CaseVariables, VariableValue } from '@concursal/domain/variables';
import { isTruthy, kindOf, resolveVariable, snapshotVariables } from '@concursal/domain/variables';
import { ExpressionError } from './errors.js';
import { BUILTIN_FUNCTIONS } from './functions.js';
import {
  COMPARISON_OPERATORS,
  describeToken,
  tokenize,
  type ComparisonOperator,
  type Token,
} from './tokenizer.js';

type Operand = Extract<Token, { kind: 'literal' } | { kind: 'identifier' }>;

export interface ExpressionEvaluatorOptions {
  logger?: Pick<EngineLogger, 'warn'>;
}

function literal(value: VariableValue): Token {
  return { kind: 'literal', value };
}

function isOperand(token: Token | undefined): token is Operand {
  return token !== undefined && (token.kind === 'literal' || token.kind === 'identifier');
}

function compare(operator: ComparisonOperator, left: VariableValue, right: VariableValue): boolean {
  if (operator === '==') return left === right;
  if (operator === '!=') return left !== right;

  let order: number;
  if (typeof left === 'number' && typeof right === 'number') {
    order = left - right;
  } else if (typeof left === 'string' && typeof right === 'string') {
    order = left < right ? -1 : left > right ? 1 : 0;
  } else {
    throw new ExpressionError(`Cannot apply '${operator}' to ${kindOf(left)} and ${kindOf(right)}`);
  }

  switch (operator) {
    case '>':
      return order > 0;
    case '<':
      return order < 0;
    case '>=':
      return order >= 0;
    case '<=':
      return order <= 0;
  }
}

function splitArguments(tokens: readonly Token[]): Token[][] {
  if (tokens.length === 0) return [];
  const args: Token[][] = [[]];
  for (const token of tokens) {
    if (token.kind === 'comma') {
      args.push([]);
    } else {
      args[args.length - 1].push(token);
    }
  }
  if (args.some((arg) => arg.length === 0)) {
    throw new ExpressionError('Empty function argument');
  }
  return args;
}

function findLastIndex(tokens: readonly Token[], predicate: (token: Token) => boolean): number {
  for (let index = tokens.length - 1; index >= 0; index--) {
    if (predicate(tokens[index])) return index;
  }
  return -1;
}

export class ExpressionEvaluator {
  private readonly variables: CaseVariables;
  private readonly logger: Pick<EngineLogger, 'warn'>;

  constructor(variables: CaseVariables, options: ExpressionEvaluatorOptions = {}) {
    this.variables = snapshotVariables(variables);
    this.logger = options.logger ?? console;
  }

  /**
   * Evaluates a condition to true, false or null.
   * Non-boolean results are reduced to their truthiness; null stays null.
   */
  evaluate(expression: string): boolean | null {
    try {
      const value = this.compute(expression);
      if (value === null || typeof value === 'boolean') return value;
      return isTruthy(value);
    } catch (error) {
      this.logger.warn(`[Expression] Could not evaluate "${expression}": ${describeError(error)}`);
      return null;
    }
  }

  /**
   * Evaluates to the raw scalar value. Throws ExpressionError on any failure.
   */
  compute(expression: string): VariableValue {
    try {
      return this.evaluateTokens(tokenize(expression));
    } catch (error) {
      if (error instanceof ExpressionError && error.expression === undefined) {
        throw new ExpressionError(error.message, expression);
      }
      throw error;
    }
  }

  private resolve(token: Operand): VariableValue {
    return token.kind === 'literal' ? token.value : resolveVariable(this.variables, token.name);
  }

  private evaluateTokens(tokens: readonly Token[]): VariableValue {
    const stream = [...tokens];

    for (;;) {
      const open = findLastIndex(stream, (token) => token.kind === 'lparen');
      if (open === -1) break;

      const offset = stream.slice(open + 1).findIndex((token) => token.kind === 'rparen');
      if (offset === -1) {
        throw new ExpressionError("Unbalanced '('");
      }
      const close = open + 1 + offset;
      const inner = stream.slice(open + 1, close);
      const callee = open > 0 ? stream[open - 1] : undefined;

      if (callee?.kind === 'function') {
        const args = splitArguments(inner).map((arg) => this.evaluateFlat(arg));
        const result = BUILTIN_FUNCTIONS[callee.name](args);
        stream.splice(open - 1, close - open + 2, literal(result));
      } else {
        if (inner.some((token) => token.kind === 'comma')) {
          throw new ExpressionError("Unexpected ',' outside a function call");
        }
        stream.splice(open, close - open + 1, literal(this.evaluateFlat(inner)));
      }
    }

    if (stream.some((token) => token.kind === 'rparen')) {
      throw new ExpressionError("Unbalanced ')'");
    }

    return this.evaluateFlat(stream);
  }

  private evaluateFlat(tokens: readonly Token[]): VariableValue {
    if (tokens.length === 0) {
      throw new ExpressionError('Empty expression');
    }

    const stream = [...tokens];
    for (const token of stream) {
      if (token.kind === 'function') {
        throw new ExpressionError(`Function ${token.name} must be followed by '('`);
      }
      if (token.kind === 'comma' || token.kind === 'lparen' || token.kind === 'rparen') {
        throw new ExpressionError(`Unexpected '${describeToken(token)}'`);
      }
    }

    for (;;) {
      const index = findLastIndex(stream, (t) => t.kind === 'connective' && t.connective === 'NOT');
      if (index === -1) break;
      const operand = stream[index + 1];
      if (!isOperand(operand)) {
        throw new ExpressionError('NOT requires an operand');
      }
      stream.splice(index, 2, literal(!isTruthy(this.resolve(operand))));
    }

    for (const operator of COMPARISON_OPERATORS) {
      this.foldBinary(
        stream,
        (t) => t.kind === 'comparison' && t.operator === operator,
        (left, right) => compare(operator, left, right)
      );
    }

    this.foldBinary(
      stream,
      (t) => t.kind === 'connective' && t.connective === 'AND',
      (left, right) => (isTruthy(left) ? right : left)
    );
    this.foldBinary(
      stream,
      (t) => t.kind === 'connective' && t.connective === 'OR',
      (left, right) => (isTruthy(left) ? left : right)
    );

    const [result] = stream;
    if (stream.length !== 1 || !isOperand(result)) {
      throw new ExpressionError(`Malformed expression near '${stream.map(describeToken).join(' ')}'`);
    }
    return this.resolve(result);
  }

  private foldBinary(
    stream: Token[],
    matches: (token: Token) => boolean,
    apply: (left: VariableValue, right: VariableValue) => VariableValue
  ): void {
    for (;;) {
      const index = stream.findIndex(matches);
      if (index === -1) return;

      const left = stream[index - 1];
      const right = stream[index + 1];
      if (!isOperand(left) || !isOperand(right)) {
        throw new ExpressionError(`Operator '${describeToken(stream[index])}' requires two operands`);
      }
      stream.splice(index - 1, 3, literal(apply(this.resolve(left), this.resolve(right))));
    }
  }
}

/**
 * One-shot evaluation with a fresh evaluator and its own variable snapshot.
 */
export function evaluate(
  expression: string,
  variables: CaseVariables,
  options: ExpressionEvaluatorOptions = {}
): boolean | null {
  return new ExpressionEvaluator(variables, options).evaluate(expression);
}
