/**
 * @concursal/rule-engine
 *
 * Deterministic evaluation of TRLC rulebooks into legal risk findings,
 * hashable results and case-level assessments.
 *
 * @example
 * ```typescript
 * import { RuleEngine } from '@concursal/rule-engine';
 * import { loadDefaultRulebook } from '@concursal/rulebook';
 *
 * const engine = new RuleEngine(loadDefaultRulebook(), { legalContext });
 * const { result, resultHash, assessment } = engine.run('case-001', variables);
 * ```
 */

export {
  RuleEngine,
  evaluateRules,
  overallConfidence,
  NO_RISKS_CONCLUSION,
  SUMMARY_FLAGS,
} from './engine.js';
export type {
  RuleOutcome,
  RuleStatus,
  LegalAssessment,
  RuleEngineRun,
  RuleEngineOptions,
  SummaryFlag,
} from './engine.js';
export {
  RuleEngineResultBuilder,
  RULE_ENGINE_VERSION,
  computeResultHash,
  toDeterministicContent,
  validatePartition,
} from './result-builder.js';
export type {
  DecisionStatus,
  RuleDecision,
  SkippedRule,
  RuleEngineResult,
  ResultBuilderOptions,
} from './result-builder.js';
export { resolveSeverity, resolveConfidence } from './ladders.js';
export { renderTemplate, UNAVAILABLE } from './templates.js';
export { computeEvaluationCacheKey } from './cache-key.js';
export type { EvaluationCacheKeyInput } from './cache-key.js';
export { replayEvaluation } from './replay.js';
export type { ReplayInputs, ReplayReport } from './replay.js';
