/**
 * Condition Syntax Check
 *
 * Walks the token stream once without resolving any variable, so a malformed
 * condition is reported as such instead of evaluating to null:
 *
 *   expression := unary ((comparison | AND | OR) unary)*
 *   unary      := NOT* primary
 *   primary    := literal | identifier | '(' expression ')'
 *               | FUNCTION '(' [expression (',' expression)*] ')'
 */

import { ExpressionError } from './errors.js';
import { describeToken, tokenize, type Token } from './tokenizer.js';

function isBinaryOperator(token: Token | undefined): boolean {
  return (
    token !== undefined &&
    (token.kind === 'comparison' || (token.kind === 'connective' && token.connective !== 'NOT'))
  );
}

/**
 * @throws ExpressionError naming the first token that breaks the grammar
 */
export function assertWellFormed(expression: string): void {
  const tokens = tokenize(expression);
  let position = 0;

  const found = (): string => {
    const token = tokens[position];
    return token === undefined ? 'end of expression' : `'${describeToken(token)}'`;
  };

  const expectClosing = (): void => {
    if (tokens[position]?.kind !== 'rparen') {
      throw new ExpressionError(`Expected ')', found ${found()}`, expression);
    }
    position++;
  };

  const parsePrimary = (): void => {
    const token = tokens[position];
    if (token === undefined) {
      throw new ExpressionError(`Expected an operand, found ${found()}`, expression);
    }
    switch (token.kind) {
      case 'literal':
      case 'identifier':
        position++;
        return;
      case 'lparen':
        position++;
        parseExpression();
        expectClosing();
        return;
      case 'function':
        position++;
        if (tokens[position]?.kind !== 'lparen') {
          throw new ExpressionError(`Function ${token.name} must be followed by '('`, expression);
        }
        position++;
        if (tokens[position]?.kind === 'rparen') {
          position++;
          return;
        }
        parseExpression();
        while (tokens[position]?.kind === 'comma') {
          position++;
          parseExpression();
        }
        expectClosing();
        return;
      default:
        throw new ExpressionError(`Expected an operand, found ${found()}`, expression);
    }
  };

  const parseUnary = (): void => {
    for (;;) {
      const token = tokens[position];
      if (token?.kind !== 'connective' || token.connective !== 'NOT') break;
      position++;
    }
    parsePrimary();
  };

  function parseExpression(): void {
    parseUnary();
    while (isBinaryOperator(tokens[position])) {
      position++;
      parseUnary();
    }
  }

  if (tokens.length === 0) {
    throw new ExpressionError('Empty expression', expression);
  }
  parseExpression();
  if (position < tokens.length) {
    throw new ExpressionError(`Unexpected ${found()}`, expression);
  }
}
