/**
 * Expression Tokenizer
 *
 * Turns a rule condition into a tagged-variant token stream. The closed set
 * of token kinds is the whole language: anything else is rejected here, so
 * condition text never reaches a host evaluation facility.
 */

import type { VariableValue } from '@concursal/domain/variables';
import { ExpressionError } from './errors.js';

export const COMPARISON_OPERATORS = ['==', '!=', '>=', '<=', '>', '<'] as const;
export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export const CONNECTIVES = ['AND', 'OR', 'NOT'] as const;
export type Connective = (typeof CONNECTIVES)[number];

export const FUNCTION_NAMES = ['MIN', 'MAX', 'COUNT', 'SUM'] as const;
export type FunctionName = (typeof FUNCTION_NAMES)[number];

export type Token =
  | { kind: 'literal'; value: VariableValue }
  | { kind: 'identifier'; name: string }
  | { kind: 'comparison'; operator: ComparisonOperator }
  | { kind: 'connective'; connective: Connective }
  | { kind: 'function'; name: FunctionName }
  | { kind: 'lparen' }
  | { kind: 'rparen' }
  | { kind: 'comma' };

const LITERAL_WORDS: Readonly<Record<string, VariableValue>> = {
  true: true,
  True: true,
  false: false,
  False: false,
  null: null,
};

const INTEGER_PATTERN = /^-?\d+$/;
const DECIMAL_PATTERN = /^-?(\d+\.\d*|\.\d+)$/;
const IDENTIFIER_PATTERN = /^[\p{L}_][\p{L}\p{N}_.]*$/u;
const WORD_CHAR = /[\p{L}\p{N}_.]/u;

function isWordChar(char: string | undefined): boolean {
  return char !== undefined && WORD_CHAR.test(char);
}

function isConnective(word: string): word is Connective {
  return (CONNECTIVES as readonly string[]).includes(word);
}

function isFunctionName(word: string): word is FunctionName {
  return (FUNCTION_NAMES as readonly string[]).includes(word);
}

/**
 * Keywords are only recognized as whole words, so an identifier such as
 * "ANDALUCIA_sede" or "NOTAS" stays an identifier.
 */
function matchKeyword(expression: string, index: number): Connective | FunctionName | null {
  if (isWordChar(expression[index - 1])) return null;
  for (const keyword of [...FUNCTION_NAMES, ...CONNECTIVES]) {
    if (expression.startsWith(keyword, index) && !isWordChar(expression[index + keyword.length])) {
      return keyword;
    }
  }
  return null;
}

function matchComparison(expression: string, index: number): ComparisonOperator | null {
  for (const operator of COMPARISON_OPERATORS) {
    if (expression.startsWith(operator, index)) return operator;
  }
  return null;
}

/**
 * Classifies an accumulated word as a literal or an identifier.
 */
export function classifyWord(word: string, expression?: string): Token {
  if (Object.prototype.hasOwnProperty.call(LITERAL_WORDS, word)) {
    return { kind: 'literal', value: LITERAL_WORDS[word] };
  }
  if (INTEGER_PATTERN.test(word)) {
    return { kind: 'literal', value: parseInt(word, 10) };
  }
  if (DECIMAL_PATTERN.test(word)) {
    return { kind: 'literal', value: parseFloat(word) };
  }
  if (IDENTIFIER_PATTERN.test(word)) {
    return { kind: 'identifier', name: word };
  }
  throw new ExpressionError(`Unexpected token '${word}'`, expression);
}

function readQuoted(expression: string, start: number): { value: string; end: number } {
  const quote = expression[start];
  let value = '';
  let index = start + 1;
  while (index < expression.length) {
    const char = expression[index];
    if (char === '\\' && index + 1 < expression.length) {
      value += expression[index + 1];
      index += 2;
      continue;
    }
    if (char === quote) {
      return { value, end: index + 1 };
    }
    value += char;
    index++;
  }
  throw new ExpressionError('Unterminated string literal', expression);
}

/**
 * Tokenizes left to right. Multi-character operators and keywords are matched
 * greedily before falling back to word accumulation; whitespace, parentheses
 * and commas end the current word.
 */
export function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let current = '';

  const flush = (): void => {
    if (current) {
      tokens.push(classifyWord(current, expression));
      current = '';
    }
  };

  let index = 0;
  while (index < expression.length) {
    const char = expression[index];

    if (/\s/.test(char)) {
      flush();
      index++;
      continue;
    }

    if (char === '(' || char === ')' || char === ',') {
      flush();
      tokens.push(char === '(' ? { kind: 'lparen' } : char === ')' ? { kind: 'rparen' } : { kind: 'comma' });
      index++;
      continue;
    }

    if ((char === '"' || char === "'") && !current) {
      const { value, end } = readQuoted(expression, index);
      tokens.push({ kind: 'literal', value });
      index = end;
      continue;
    }

    const operator = matchComparison(expression, index);
    if (operator) {
      flush();
      tokens.push({ kind: 'comparison', operator });
      index += operator.length;
      continue;
    }

    if (!current) {
      const keyword = matchKeyword(expression, index);
      if (keyword) {
        tokens.push(
          isFunctionName(keyword)
            ? { kind: 'function', name: keyword }
            : { kind: 'connective', connective: keyword }
        );
        index += keyword.length;
        continue;
      }
    }

    if (char === '=' || char === '!') {
      throw new ExpressionError(`Unexpected operator '${char}'`, expression);
    }

    current += char;
    index++;
  }

  flush();
  return tokens;
}

/**
 * Identifiers referenced by an expression, in first-seen order.
 */
export function collectIdentifiers(expression: string): string[] {
  const seen = new Set<string>();
  for (const token of tokenize(expression)) {
    if (token.kind === 'identifier') seen.add(token.name);
  }
  return [...seen];
}

export function describeToken(token: Token): string {
  switch (token.kind) {
    case 'literal':
      return JSON.stringify(token.value);
    case 'identifier':
      return token.name;
    case 'comparison':
      return token.operator;
    case 'connective':
      return token.connective;
    case 'function':
      return token.name;
    case 'lparen':
      return '(';
    case 'rparen':
      return ')';
    case 'comma':
      return ',';
  }
}
