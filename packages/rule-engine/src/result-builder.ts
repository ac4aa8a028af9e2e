/**
 * Deterministic Result Builder
 *
 * Accumulates per-rule decisions for one evaluation and produces the
 * immutable RuleEngineResult.
 *
 * CRITICAL INVARIANTS:
 * - triggeredRules ∪ discardedRules = evaluatedRules, with no overlap
 * - every list is sorted by rule id and summary flags by name, so the same
 *   inputs always produce the same result and the same hash
 * - evaluatedAt and executionTimeMs are excluded from the hash
 */

import type { CanonicalValue } from '@concursal/domain/canonical';
import { computeContentHash } from '@concursal/domain/canonical';
import type {
  CaseId,
  Confidence,
  ContentHash,
  EvidenceStatus,
  ISOTimestamp,
  RuleId,
  Severity,
} from '@concursal/domain/types';

export const RULE_ENGINE_VERSION = '2.0.0';

export type DecisionStatus = 'TRIGGERED' | 'DISCARDED' | 'ERRORED';

export interface RuleDecision {
  ruleId: RuleId;
  ruleName: string;
  riskType: string;
  status: DecisionStatus;
  /** True only for TRIGGERED */
  applies: boolean;
  severity: Severity | null;
  confidence: Confidence | null;
  evidenceStatus: EvidenceStatus | null;
  evidenceRequired: readonly string[];
  /** Required document types the case variables show as present */
  evidenceFound: readonly string[];
  legalArticles: readonly string[];
  discardedArticles: readonly string[];
  rationale: string;
}

export interface SkippedRule {
  ruleId: RuleId;
  missingVariables: readonly string[];
}

export interface RuleEngineResult {
  readonly caseId: CaseId;
  readonly engineVersion: string;
  readonly rulebookVersion: string;
  readonly evaluatedRules: readonly Readonly<RuleDecision>[];
  readonly triggeredRules: readonly Readonly<RuleDecision>[];
  readonly discardedRules: readonly Readonly<RuleDecision>[];
  readonly skippedRules: readonly Readonly<SkippedRule>[];
  readonly summaryFlags: Readonly<Record<string, boolean>>;
  readonly evaluatedAt: ISOTimestamp;
  readonly executionTimeMs: number;
}

export interface ResultBuilderOptions {
  now?: () => Date;
}

function byRuleId(a: { ruleId: RuleId }, b: { ruleId: RuleId }): number {
  return a.ruleId < b.ruleId ? -1 : a.ruleId > b.ruleId ? 1 : 0;
}

function freezeDecision(decision: RuleDecision): Readonly<RuleDecision> {
  return Object.freeze({
    ...decision,
    evidenceRequired: Object.freeze([...decision.evidenceRequired]),
    evidenceFound: Object.freeze([...decision.evidenceFound]),
    legalArticles: Object.freeze([...decision.legalArticles]),
    discardedArticles: Object.freeze([...decision.discardedArticles]),
  });
}

export class RuleEngineResultBuilder {
  private readonly decisions: RuleDecision[] = [];
  private readonly skipped: SkippedRule[] = [];
  private readonly flags = new Map<string, boolean>();
  private readonly now: () => Date;
  private readonly startedAt: number;

  constructor(
    private readonly caseId: CaseId,
    private readonly rulebookVersion: string,
    options: ResultBuilderOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.startedAt = performance.now();
  }

  addRuleDecision(decision: RuleDecision): this {
    if (decision.applies !== (decision.status === 'TRIGGERED')) {
      throw new Error(`Decision for ${decision.ruleId} has status ${decision.status} but applies=${decision.applies}`);
    }
    this.assertNew(decision.ruleId);
    this.decisions.push(decision);
    return this;
  }

  addSkippedRule(ruleId: RuleId, missingVariables: readonly string[]): this {
    this.assertNew(ruleId);
    this.skipped.push({ ruleId, missingVariables: [...missingVariables] });
    return this;
  }

  addFlag(name: string, value: boolean): this {
    this.flags.set(name, value);
    return this;
  }

  build(): RuleEngineResult {
    const evaluated = [...this.decisions].sort(byRuleId).map(freezeDecision);
    const summaryFlags: Record<string, boolean> = {};
    for (const name of [...this.flags.keys()].sort()) {
      summaryFlags[name] = this.flags.get(name) === true;
    }

    return Object.freeze({
      caseId: this.caseId,
      engineVersion: RULE_ENGINE_VERSION,
      rulebookVersion: this.rulebookVersion,
      evaluatedRules: Object.freeze(evaluated),
      triggeredRules: Object.freeze(evaluated.filter((decision) => decision.applies)),
      discardedRules: Object.freeze(evaluated.filter((decision) => !decision.applies)),
      skippedRules: Object.freeze(
        [...this.skipped].sort(byRuleId).map((rule) =>
          Object.freeze({ ruleId: rule.ruleId, missingVariables: Object.freeze([...rule.missingVariables]) })
        )
      ),
      summaryFlags: Object.freeze(summaryFlags),
      evaluatedAt: this.now().toISOString(),
      executionTimeMs: performance.now() - this.startedAt,
    });
  }

  private assertNew(ruleId: RuleId): void {
    if (this.decisions.some((decision) => decision.ruleId === ruleId) || this.skipped.some((rule) => rule.ruleId === ruleId)) {
      throw new Error(`Rule ${ruleId} was already recorded`);
    }
  }
}

function decisionToCanonical(decision: Readonly<RuleDecision>): CanonicalValue {
  return {
    rule_id: decision.ruleId,
    rule_name: decision.ruleName,
    risk_type: decision.riskType,
    status: decision.status,
    applies: decision.applies,
    severity: decision.severity,
    confidence: decision.confidence,
    evidence_status: decision.evidenceStatus,
    evidence_required: decision.evidenceRequired,
    evidence_found: decision.evidenceFound,
    legal_articles: decision.legalArticles,
    discarded_articles: decision.discardedArticles,
    rationale: decision.rationale,
  };
}

/**
 * Content that identifies a result: everything except evaluatedAt and
 * executionTimeMs.
 */
export function toDeterministicContent(result: RuleEngineResult): CanonicalValue {
  return {
    case_id: result.caseId,
    engine_version: result.engineVersion,
    rulebook_version: result.rulebookVersion,
    evaluated_rules: [...result.evaluatedRules].sort(byRuleId).map(decisionToCanonical),
    skipped_rules: [...result.skippedRules].sort(byRuleId).map((rule) => ({
      rule_id: rule.ruleId,
      missing_variables: rule.missingVariables,
    })),
    summary_flags: result.summaryFlags,
  };
}

/**
 * SHA-256 over the canonical JSON of the deterministic content.
 */
export function computeResultHash(result: RuleEngineResult): ContentHash {
  return computeContentHash(toDeterministicContent(result));
}

/**
 * Checks that triggered and discarded partition the evaluated rules and that
 * applies agrees with each list.
 */
export function validatePartition(result: RuleEngineResult): boolean {
  const evaluated = new Set(result.evaluatedRules.map((decision) => decision.ruleId));
  const triggered = new Set(result.triggeredRules.map((decision) => decision.ruleId));
  const discarded = new Set(result.discardedRules.map((decision) => decision.ruleId));

  if (evaluated.size !== result.evaluatedRules.length) return false;
  if ([...triggered].some((id) => !evaluated.has(id) || discarded.has(id))) return false;
  if ([...discarded].some((id) => !evaluated.has(id))) return false;
  if (triggered.size + discarded.size !== evaluated.size) return false;
  if (result.triggeredRules.some((decision) => !decision.applies)) return false;
  if (result.discardedRules.some((decision) => decision.applies)) return false;

  return true;
}
