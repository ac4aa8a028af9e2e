/**
 * Shared Domain Types
 *
 * Vocabulary used by every package: identifiers, rule ladder levels and the
 * localized terms that appear in findings and results.
 *
 * CRITICAL: Findings only ever carry the localized terms (Severity,
 * Confidence, EvidenceStatus). Ladder levels are internal to rule evaluation.
 */

export type CaseId = string;
export type RuleId = string;
export type ContentHash = string; // SHA-256 hex
export type ISOTimestamp = string;

/**
 * Severity ladder levels, highest first
 */
export const SEVERITY_LEVELS = ['critical', 'high', 'medium', 'low'] as const;
export type SeverityLevel = (typeof SEVERITY_LEVELS)[number];

/**
 * Confidence ladder levels, highest first
 */
export const CONFIDENCE_LEVELS = ['high', 'medium', 'low', 'indeterminate'] as const;
export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number];

/**
 * Internal marker for "no ladder level matched"
 */
export const INDETERMINATE = 'indeterminate' as const;

export enum Severity {
  CRITICA = 'critica',
  ALTA = 'alta',
  MEDIA = 'media',
  BAJA = 'baja',
  INDETERMINADO = 'indeterminado',
}

export enum Confidence {
  ALTA = 'alta',
  MEDIA = 'media',
  BAJA = 'baja',
  INDETERMINADO = 'indeterminado',
}

export enum EvidenceStatus {
  SUFICIENTE = 'suficiente',
  INSUFICIENTE = 'insuficiente',
  FALTA = 'falta',
}

export const SEVERITY_LABELS: Record<SeverityLevel | typeof INDETERMINATE, Severity> = {
  critical: Severity.CRITICA,
  high: Severity.ALTA,
  medium: Severity.MEDIA,
  low: Severity.BAJA,
  indeterminate: Severity.INDETERMINADO,
};

export const CONFIDENCE_LABELS: Record<ConfidenceLevel, Confidence> = {
  high: Confidence.ALTA,
  medium: Confidence.MEDIA,
  low: Confidence.BAJA,
  indeterminate: Confidence.INDETERMINADO,
};
