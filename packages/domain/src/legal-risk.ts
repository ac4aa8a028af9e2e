/**
 * LegalRisk (finding)
 *
 * The unit of output produced by a triggered rule.
 * IMMUTABLE: created only by the rule engine and frozen on creation.
 * Downstream consumers (explainer, persistence, reports) read it as-is.
 */

import type { RuleId } from './types.js';
import { Confidence, EvidenceStatus, Severity } from './types.js';
import type { CaseVariables } from './variables.js';
import { resolveVariable } from './variables.js';

export interface LegalRisk {
  readonly ruleId: RuleId;
  readonly riskType: string;
  readonly description: string;
  readonly severity: Severity;
  readonly confidence: Confidence;
  readonly legalArticles: readonly string[]; // post allow-list filter
  readonly jurisprudence: readonly string[];
  readonly evidenceStatus: EvidenceStatus;
  readonly recommendation: string;
}

export function createLegalRisk(input: {
  ruleId: RuleId;
  riskType: string;
  description: string;
  severity: Severity;
  confidence: Confidence;
  legalArticles: readonly string[];
  jurisprudence?: readonly string[];
  evidenceStatus: EvidenceStatus;
  recommendation: string;
}): LegalRisk {
  return Object.freeze({
    ruleId: input.ruleId,
    riskType: input.riskType,
    description: input.description,
    severity: input.severity,
    confidence: input.confidence,
    legalArticles: Object.freeze([...input.legalArticles]),
    jurisprudence: Object.freeze([...(input.jurisprudence ?? [])]),
    evidenceStatus: input.evidenceStatus,
    recommendation: input.recommendation,
  });
}

/**
 * Derives evidence status from the citation filter outcome.
 *
 * falta: the rule declared articles and none survived filtering
 * insuficiente: some citations were discarded, or confidence is indeterminate
 * suficiente: otherwise
 */
export function deriveEvidenceStatus(params: {
  declaredArticles: number;
  validArticles: number;
  discardedArticles: number;
  confidence: Confidence;
}): EvidenceStatus {
  if (params.declaredArticles > 0 && params.validArticles === 0) {
    return EvidenceStatus.FALTA;
  }
  if (params.discardedArticles > 0 || params.confidence === Confidence.INDETERMINADO) {
    return EvidenceStatus.INSUFICIENTE;
  }
  return EvidenceStatus.SUFICIENTE;
}

/**
 * Required document types the case holds, read from the `tiene_<type>` flags
 * the case variable builder sets.
 */
export function findEvidence(documentTypes: readonly string[], variables: CaseVariables): string[] {
  return documentTypes.filter((documentType) => resolveVariable(variables, `tiene_${documentType}`) === true);
}

export function isIndeterminate(risk: Pick<LegalRisk, 'severity' | 'confidence'>): boolean {
  return risk.severity === Severity.INDETERMINADO || risk.confidence === Confidence.INDETERMINADO;
}
