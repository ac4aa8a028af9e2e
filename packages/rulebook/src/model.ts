/**
 * Rule Definition Model
 *
 * In-memory shape of a loaded rulebook. The declarative source uses
 * snake_case keys; the model is camelCase and deep-frozen by the loader.
 *
 * CRITICAL: a Rulebook is a value. It is passed explicitly into every
 * evaluation and never held in module state.
 */

import type { CanonicalValue } from '@concursal/domain/canonical';
import type { ConfidenceLevel, RuleId, SeverityLevel } from '@concursal/domain/types';

export interface Trigger {
  readonly condition: string;
  readonly variablesRequired: readonly string[];
}

/** Advisory only: never evaluated. */
export interface EvidenceRequired {
  readonly documentTypes: readonly string[];
  readonly descriptions: readonly string[];
}

/** Ladder expressions, scanned critical → low. */
export type SeverityLogic = Readonly<Partial<Record<SeverityLevel, string>>>;

/** Ladder expressions, scanned high → indeterminate. */
export type ConfidenceLogic = Readonly<Partial<Record<ConfidenceLevel, string>>>;

export interface RuleOutputs {
  readonly descriptionTemplate: string;
  readonly recommendationTemplate: string;
  readonly missingDataTemplate?: string;
}

export interface Rule {
  readonly ruleId: RuleId;
  readonly name?: string;
  readonly riskType: string;
  readonly articleRefs: readonly string[];
  readonly jurisprudence: readonly string[];
  readonly trigger: Trigger;
  readonly evidenceRequired: EvidenceRequired;
  readonly severityLogic: SeverityLogic;
  readonly confidenceLogic: ConfidenceLogic;
  readonly outputs: RuleOutputs;
}

export interface RulebookMetadata {
  readonly version: string;
  readonly [key: string]: CanonicalValue;
}

export interface Rulebook {
  readonly metadata: RulebookMetadata;
  readonly rules: readonly Rule[];
}

export const UNVERSIONED = 'unversioned';
