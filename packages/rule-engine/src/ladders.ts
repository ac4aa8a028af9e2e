/**
 * Severity and confidence ladders.
 *
 * Each ladder is scanned from the highest level down; the first expression
 * that evaluates to exactly true decides. Ties between levels therefore go to
 * the higher one. No match yields indeterminado, never null.
 */

import type { ExpressionEvaluator } from '@concursal/expression/evaluator';
import {
  CONFIDENCE_LABELS,
  CONFIDENCE_LEVELS,
  Confidence,
  SEVERITY_LABELS,
  SEVERITY_LEVELS,
  Severity,
} from '@concursal/domain/types';
import type { ConfidenceLogic, SeverityLogic } from '@concursal/rulebook/model';

type Evaluator = Pick<ExpressionEvaluator, 'evaluate'>;

export function resolveSeverity(logic: SeverityLogic, evaluator: Evaluator): Severity {
  for (const level of SEVERITY_LEVELS) {
    const expression = logic[level];
    if (expression !== undefined && evaluator.evaluate(expression) === true) {
      return SEVERITY_LABELS[level];
    }
  }
  return Severity.INDETERMINADO;
}

export function resolveConfidence(logic: ConfidenceLogic, evaluator: Evaluator): Confidence {
  for (const level of CONFIDENCE_LEVELS) {
    const expression = logic[level];
    if (expression !== undefined && evaluator.evaluate(expression) === true) {
      return CONFIDENCE_LABELS[level];
    }
  }
  return Confidence.INDETERMINADO;
}
