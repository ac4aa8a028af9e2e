/**
 * Rule Engine
 *
 * Evaluates every rule of a rulebook against one case's variables and emits
 * LegalRisk findings. No language model is involved at any point.
 *
 * Per-rule lifecycle (terminal states):
 * - NOT_EVALUABLE: a required variable is absent
 * - DISCARDED: the trigger did not evaluate to exactly true
 * - TRIGGERED: severity, confidence, citations and texts resolved into a finding
 * - ERRORED: the trigger is malformed or anything above threw; the rule is
 *   skipped and the batch continues
 *
 * CRITICAL: each call builds its own evaluator over a frozen snapshot of the
 * variables. The engine holds no per-case state.
 */

import { extractAllowedArticles, filterLegalArticles } from '@concursal/citations/allow-list';
import type { LegalRisk } from '@concursal/domain/legal-risk';
import { createLegalRisk, deriveEvidenceStatus, findEvidence, isIndeterminate } from '@concursal/domain/legal-risk';
import type { EngineLogger } from '@concursal/domain/logger';
import { describeError } from '@concursal/domain/logger';
import type { CaseId } from '@concursal/domain/types';
import { Confidence, Severity } from '@concursal/domain/types';
import type { CaseVariables } from '@concursal/domain/variables';
import { missingVariables, snapshotVariables } from '@concursal/domain/variables';
import { ExpressionEvaluator } from '@concursal/expression/evaluator';
import { assertWellFormed } from '@concursal/expression/syntax';
import type { Rule, Rulebook } from '@concursal/rulebook/model';
import { resolveConfidence, resolveSeverity } from './ladders.js';
import type { RuleDecision, RuleEngineResult } from './result-builder.js';
import { computeResultHash, RuleEngineResultBuilder } from './result-builder.js';
import { renderTemplate } from './templates.js';

export type RuleOutcome =
  | { status: 'NOT_EVALUABLE'; rule: Rule; missingVariables: string[] }
  | { status: 'DISCARDED'; rule: Rule; triggerValue: boolean | null }
  | {
      status: 'TRIGGERED';
      rule: Rule;
      risk: LegalRisk;
      discardedArticles: string[];
      missingData?: string;
    }
  | { status: 'ERRORED'; rule: Rule; error: string };

export type RuleStatus = RuleOutcome['status'];

/**
 * Aggregate legal assessment for a case.
 */
export interface LegalAssessment {
  caseId: CaseId;
  legalRisks: LegalRisk[];
  legalConclusion: string;
  confidenceLevel: Confidence;
  missingData: string[];
  legalBasis: string[];
}

export interface RuleEngineRun {
  outcomes: RuleOutcome[];
  risks: LegalRisk[];
  result: RuleEngineResult;
  resultHash: string;
  assessment: LegalAssessment;
}

export interface RuleEngineOptions {
  /** Retrieved legal text; the citation allow-list is extracted from it */
  legalContext?: string;
  logger?: EngineLogger;
  now?: () => Date;
}

export const SUMMARY_FLAGS = [
  'has_triggered_rules',
  'has_critical_severity',
  'has_discarded_citations',
  'has_errored_rules',
  'has_not_evaluable_rules',
  'all_rules_evaluable',
] as const;
export type SummaryFlag = (typeof SUMMARY_FLAGS)[number];

export const NO_RISKS_CONCLUSION = 'No se detectaron riesgos legales específicos según las reglas evaluadas.';

const MAX_CONCLUSION_ARTICLES = 5;

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Overall confidence for a set of findings:
 * indeterminado if any finding is indeterminate in severity or confidence,
 * media if any finding is critica or alta, baja otherwise.
 */
export function overallConfidence(risks: readonly LegalRisk[]): Confidence {
  if (risks.length === 0) return Confidence.ALTA;
  if (risks.some(isIndeterminate)) return Confidence.INDETERMINADO;
  if (risks.some((risk) => risk.severity === Severity.CRITICA || risk.severity === Severity.ALTA)) {
    return Confidence.MEDIA;
  }
  return Confidence.BAJA;
}

export class RuleEngine {
  private readonly legalContext: string;
  private readonly allowedArticles: ReadonlySet<string>;
  private readonly logger: EngineLogger;
  private readonly now?: () => Date;

  constructor(
    private readonly rulebook: Rulebook,
    options: RuleEngineOptions = {}
  ) {
    this.legalContext = options.legalContext ?? '';
    this.allowedArticles = extractAllowedArticles(this.legalContext);
    this.logger = options.logger ?? console;
    this.now = options.now;
  }

  /**
   * Findings for every triggered rule, in rulebook order.
   */
  evaluateRules(variables: CaseVariables): LegalRisk[] {
    return this.evaluateOutcomes(variables).flatMap((outcome) =>
      outcome.status === 'TRIGGERED' ? [outcome.risk] : []
    );
  }

  /**
   * Terminal outcome of every rule, in rulebook order.
   */
  evaluateOutcomes(variables: CaseVariables): RuleOutcome[] {
    const snapshot = snapshotVariables(variables);
    const evaluator = new ExpressionEvaluator(snapshot, { logger: this.logger });
    return this.rulebook.rules.map((rule) => this.evaluateRule(rule, evaluator, snapshot));
  }

  /**
   * Evaluates the case and builds the deterministic result and the
   * aggregate assessment.
   */
  run(caseId: CaseId, variables: CaseVariables): RuleEngineRun {
    const builder = new RuleEngineResultBuilder(caseId, this.rulebook.metadata.version, { now: this.now });
    const outcomes = this.evaluateOutcomes(variables);
    const risks: LegalRisk[] = [];
    const notes: string[] = [];

    for (const outcome of outcomes) {
      const { rule } = outcome;
      switch (outcome.status) {
        case 'NOT_EVALUABLE':
          builder.addSkippedRule(rule.ruleId, outcome.missingVariables);
          notes.push(`Regla ${rule.ruleId}: faltan variables ${outcome.missingVariables.join(', ')}`);
          break;
        case 'DISCARDED':
          builder.addRuleDecision(
            this.decision(
              rule,
              'DISCARDED',
              `Condición no cumplida (${String(outcome.triggerValue)}): ${rule.trigger.condition}`,
              variables
            )
          );
          break;
        case 'ERRORED':
          builder.addRuleDecision(this.decision(rule, 'ERRORED', `Error de evaluación: ${outcome.error}`, variables));
          break;
        case 'TRIGGERED':
          risks.push(outcome.risk);
          builder.addRuleDecision({
            ...this.decision(rule, 'TRIGGERED', `Condición cumplida: ${rule.trigger.condition}`, variables),
            severity: outcome.risk.severity,
            confidence: outcome.risk.confidence,
            evidenceStatus: outcome.risk.evidenceStatus,
            legalArticles: outcome.risk.legalArticles,
            discardedArticles: outcome.discardedArticles,
          });
          if (outcome.discardedArticles.length > 0) {
            notes.push(
              `Regla ${rule.ruleId}: artículos descartados por no constar en el contexto legal: ${outcome.discardedArticles.join(', ')}`
            );
          }
          if (outcome.missingData !== undefined) {
            notes.push(outcome.missingData);
          }
          break;
      }
    }

    const count = (status: RuleStatus) => outcomes.filter((outcome) => outcome.status === status).length;
    const flags: Record<SummaryFlag, boolean> = {
      has_triggered_rules: risks.length > 0,
      has_critical_severity: risks.some((risk) => risk.severity === Severity.CRITICA),
      has_discarded_citations: outcomes.some(
        (outcome) => outcome.status === 'TRIGGERED' && outcome.discardedArticles.length > 0
      ),
      has_errored_rules: count('ERRORED') > 0,
      has_not_evaluable_rules: count('NOT_EVALUABLE') > 0,
      all_rules_evaluable: count('NOT_EVALUABLE') === 0,
    };
    for (const name of SUMMARY_FLAGS) {
      builder.addFlag(name, flags[name]);
    }

    const result = builder.build();
    this.logger.info(
      `[RuleEngine] Case ${caseId}: ${result.triggeredRules.length} triggered, ${result.discardedRules.length} discarded, ${result.skippedRules.length} not evaluable`
    );

    return {
      outcomes,
      risks,
      result,
      resultHash: computeResultHash(result),
      assessment: this.buildResult(caseId, risks, notes),
    };
  }

  /**
   * Aggregates findings into the case-level legal assessment.
   */
  buildResult(caseId: CaseId, risks: readonly LegalRisk[], notes: readonly string[] = []): LegalAssessment {
    const missingData = [...new Set(notes)];
    if (risks.length === 0) {
      return {
        caseId,
        legalRisks: [],
        legalConclusion: NO_RISKS_CONCLUSION,
        confidenceLevel: Confidence.ALTA,
        missingData,
        legalBasis: [],
      };
    }

    const legalBasis = [...new Set(risks.flatMap((risk) => risk.legalArticles))].sort(compareText);
    const conclusion = [`Se detectaron ${risks.length} riesgo(s) legal(es).`];
    if (legalBasis.length > 0) {
      conclusion.push(`Artículos relevantes: ${legalBasis.slice(0, MAX_CONCLUSION_ARTICLES).join(', ')}`);
    }

    return {
      caseId,
      legalRisks: [...risks],
      legalConclusion: conclusion.join(' '),
      confidenceLevel: overallConfidence(risks),
      missingData,
      legalBasis,
    };
  }

  private evaluateRule(rule: Rule, evaluator: ExpressionEvaluator, variables: CaseVariables): RuleOutcome {
    try {
      assertWellFormed(rule.trigger.condition);

      const missing = missingVariables(variables, rule.trigger.variablesRequired);
      if (missing.length > 0) {
        this.logger.debug(`[RuleEngine] Rule ${rule.ruleId} not evaluable, missing: ${missing.join(', ')}`);
        return { status: 'NOT_EVALUABLE', rule, missingVariables: missing };
      }

      const triggerValue = evaluator.evaluate(rule.trigger.condition);
      if (triggerValue !== true) {
        this.logger.debug(`[RuleEngine] Rule ${rule.ruleId} discarded (trigger ${String(triggerValue)})`);
        return { status: 'DISCARDED', rule, triggerValue };
      }

      const severity = resolveSeverity(rule.severityLogic, evaluator);
      let confidence = resolveConfidence(rule.confidenceLogic, evaluator);

      const citations = filterLegalArticles(rule.articleRefs, this.allowedArticles, this.legalContext, this.logger);
      if (citations.discarded.length > 0) {
        confidence = Confidence.INDETERMINADO;
      }

      const evidenceStatus = deriveEvidenceStatus({
        declaredArticles: rule.articleRefs.length,
        validArticles: citations.valid.length,
        discardedArticles: citations.discarded.length,
        confidence,
      });

      const risk = createLegalRisk({
        ruleId: rule.ruleId,
        riskType: rule.riskType,
        description: renderTemplate(rule.outputs.descriptionTemplate, variables),
        severity,
        confidence,
        legalArticles: citations.valid,
        jurisprudence: rule.jurisprudence,
        evidenceStatus,
        recommendation: renderTemplate(rule.outputs.recommendationTemplate, variables),
      });

      this.logger.debug(`[RuleEngine] Rule ${rule.ruleId} triggered (severity ${severity}, confidence ${confidence})`);
      return {
        status: 'TRIGGERED',
        rule,
        risk,
        discardedArticles: citations.discarded,
        missingData:
          rule.outputs.missingDataTemplate === undefined
            ? undefined
            : renderTemplate(rule.outputs.missingDataTemplate, variables),
      };
    } catch (error) {
      this.logger.error(`[RuleEngine] Rule ${rule.ruleId} failed: ${describeError(error)}`);
      return { status: 'ERRORED', rule, error: describeError(error) };
    }
  }

  private decision(
    rule: Rule,
    status: RuleDecision['status'],
    rationale: string,
    variables: CaseVariables
  ): RuleDecision {
    return {
      ruleId: rule.ruleId,
      ruleName: rule.name ?? rule.ruleId,
      riskType: rule.riskType,
      status,
      applies: status === 'TRIGGERED',
      severity: null,
      confidence: null,
      evidenceStatus: null,
      evidenceRequired: rule.evidenceRequired.documentTypes,
      evidenceFound: findEvidence(rule.evidenceRequired.documentTypes, variables),
      legalArticles: [],
      discardedArticles: [],
      rationale,
    };
  }
}

/**
 * One-shot evaluation with a fresh engine.
 */
export function evaluateRules(
  rulebook: Rulebook,
  variables: CaseVariables,
  options: RuleEngineOptions = {}
): LegalRisk[] {
  return new RuleEngine(rulebook, options).evaluateRules(variables);
}
